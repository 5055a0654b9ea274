/**
 * Telegram transport: the three calls the retrieval loop needs, backed by a
 * GramJS user session. Login happens elsewhere; this only reuses a saved
 * string session.
 */

import { Api, sessions, TelegramClient } from "telegram";
import type {
  ArchiveMessage,
  HistoryPageRequest,
  HistoryTransport,
  Logger,
  MediaDescriptor,
} from "../core/index.js";
import {
  AccessDeniedError,
  AuthorizationError,
  TransportError,
} from "../core/index.js";
import { mapTelegramError, streamChunks, toArchiveMessage } from "./transform.js";
import type { TelegramChannelHandle, TelegramCredentials } from "./types.js";

/** Bytes requested per download call. */
const DOWNLOAD_PART_BYTES = 512 * 1024;

/** Flood waits are raised to the caller, never slept inside the client. */
export function createTelegramClient(credentials: TelegramCredentials): TelegramClient {
  return new TelegramClient(
    new sessions.StringSession(credentials.session),
    credentials.apiId,
    credentials.apiHash,
    { connectionRetries: 5, floodSleepThreshold: 0 },
  );
}

export class TelegramTransport implements HistoryTransport<TelegramChannelHandle> {
  private readonly client: TelegramClient;
  private readonly logger: Logger;
  /** Media descriptors handed out by the current page, back to their message. */
  private readonly sources = new WeakMap<MediaDescriptor, Api.Message>();

  private constructor(client: TelegramClient, logger: Logger) {
    this.client = client;
    this.logger = logger;
  }

  static async connect(
    credentials: TelegramCredentials,
    logger: Logger,
  ): Promise<TelegramTransport> {
    const client = createTelegramClient(credentials);
    await client.connect();
    if (!(await client.checkAuthorization())) {
      await client.disconnect();
      throw new AuthorizationError(
        "TELEGRAM_SESSION is not authorized. Generate a fresh session string.",
      );
    }
    logger.info("Successfully connected to Telegram");
    return new TelegramTransport(client, logger);
  }

  async resolveChannel(identifier: string): Promise<TelegramChannelHandle> {
    try {
      const entity = await this.client.getEntity(identifier);
      if (
        entity instanceof Api.ChannelForbidden ||
        entity instanceof Api.ChatForbidden
      ) {
        throw new AccessDeniedError(identifier);
      }

      let title = identifier;
      if (entity instanceof Api.Channel || entity instanceof Api.Chat) {
        title = entity.title;
      } else if (entity instanceof Api.User) {
        title =
          [entity.firstName, entity.lastName].filter(Boolean).join(" ") ||
          entity.username ||
          identifier;
      }

      const peer = await this.client.getInputEntity(entity);
      return { id: entity.id.toString(), title, peer };
    } catch (err) {
      if (err instanceof AccessDeniedError) throw err;
      throw mapTelegramError(err, identifier);
    }
  }

  async fetchHistoryPage(
    handle: TelegramChannelHandle,
    request: HistoryPageRequest,
  ): Promise<ArchiveMessage[]> {
    let raw: Api.TypeMessage[];
    try {
      const batch = await this.client.getMessages(handle.peer, {
        limit: request.limit,
        offsetId: request.afterId,
        reverse: true,
      });
      raw = Array.from(batch);
    } catch (err) {
      throw mapTelegramError(err);
    }

    return raw.map((item) => {
      const message = toArchiveMessage(item);
      if (message.media && item instanceof Api.Message) {
        this.sources.set(message.media, item);
      }
      return message;
    });
  }

  async *fetchMedia(
    media: MediaDescriptor,
    signal: AbortSignal,
  ): AsyncGenerator<Uint8Array> {
    const source = this.sources.get(media);
    if (!source?.media) {
      throw new TransportError("Media does not belong to a fetched message");
    }
    let chunks: AsyncIterable<unknown>;
    try {
      chunks = this.client.iterDownload({
        file: source.media,
        requestSize: DOWNLOAD_PART_BYTES,
      });
    } catch (err) {
      throw mapTelegramError(err);
    }
    yield* streamChunks(chunks, signal);
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
    this.logger.info("Disconnected from Telegram");
  }
}
