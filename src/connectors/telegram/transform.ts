/**
 * GramJS objects → provider-neutral archive messages.
 */

import { Api, errors } from "telegram";
import type { ArchiveMessage, MediaDescriptor } from "../core/index.js";
import {
  AccessDeniedError,
  ChannelNotFoundError,
  ThrottlingSignal,
  TransportError,
  errorMessage,
} from "../core/index.js";

const NOT_FOUND_ERRORS = new Set([
  "USERNAME_NOT_OCCUPIED",
  "USERNAME_INVALID",
  "PEER_ID_INVALID",
]);

const ACCESS_DENIED_ERRORS = new Set([
  "CHANNEL_PRIVATE",
  "CHANNEL_INVALID",
  "CHAT_ADMIN_REQUIRED",
  "CHAT_FORBIDDEN",
  "USER_BANNED_IN_CHANNEL",
]);

export function peerLabel(peer: Api.TypePeer | undefined): string | null {
  if (peer instanceof Api.PeerUser) return `user:${peer.userId.toString()}`;
  if (peer instanceof Api.PeerChannel) {
    return `channel:${peer.channelId.toString()}`;
  }
  if (peer instanceof Api.PeerChat) return `chat:${peer.chatId.toString()}`;
  return null;
}

export function describeMedia(
  media: Api.TypeMessageMedia | undefined,
): MediaDescriptor | null {
  if (media instanceof Api.MessageMediaPhoto) {
    if (!(media.photo instanceof Api.Photo)) return null;
    return { kind: "photo", mimeType: "image/jpeg", fileName: null, size: null };
  }

  if (media instanceof Api.MessageMediaDocument) {
    const doc = media.document;
    if (!(doc instanceof Api.Document)) return null;

    let fileName: string | null = null;
    let voice = false;
    for (const attr of doc.attributes) {
      if (attr instanceof Api.DocumentAttributeFilename && !fileName) {
        fileName = attr.fileName;
      }
      if (attr instanceof Api.DocumentAttributeAudio && attr.voice) {
        voice = true;
      }
    }

    const size = Number(String(doc.size));
    return {
      kind: voice ? "voice" : "document",
      mimeType: doc.mimeType,
      fileName,
      size: Number.isFinite(size) ? size : null,
    };
  }

  // Link previews, locations, polls, contacts: nothing to save.
  return null;
}

export function toArchiveMessage(raw: Api.TypeMessage): ArchiveMessage {
  if (raw instanceof Api.Message) {
    return {
      id: raw.id,
      date: new Date(raw.date * 1000),
      sender: raw.postAuthor ?? peerLabel(raw.fromId) ?? peerLabel(raw.peerId),
      text: raw.message ?? "",
      media: describeMedia(raw.media),
      views: raw.views ?? null,
      forwards: raw.forwards ?? null,
      service: false,
    };
  }

  return {
    id: raw.id,
    date: raw instanceof Api.MessageService ? new Date(raw.date * 1000) : new Date(0),
    sender: null,
    text: "",
    media: null,
    views: null,
    forwards: null,
    service: true,
  };
}

/**
 * Translate a GramJS failure into the archive's error taxonomy. With an
 * identifier the failure came from resolving a channel, so lookup errors
 * mean the channel does not exist.
 */
export function mapTelegramError(err: unknown, identifier?: string): Error {
  if (err instanceof errors.FloodWaitError) {
    return new ThrottlingSignal(err.seconds * 1000, { cause: err });
  }

  const code = err instanceof errors.RPCError ? err.errorMessage : "";
  const target = identifier ?? "channel";
  if (ACCESS_DENIED_ERRORS.has(code)) {
    return new AccessDeniedError(target, { cause: err });
  }
  if (
    identifier !== undefined &&
    (NOT_FOUND_ERRORS.has(code) || /cannot find any entity|no user has/i.test(errorMessage(err)))
  ) {
    return new ChannelNotFoundError(identifier, { cause: err });
  }
  return new TransportError(errorMessage(err), { cause: err });
}

/**
 * Relays download chunks as they arrive. The stop signal is checked before
 * each chunk is requested, so an aborted download issues no further calls.
 */
export async function* streamChunks(
  chunks: AsyncIterable<unknown>,
  signal: AbortSignal,
): AsyncGenerator<Uint8Array> {
  try {
    signal.throwIfAborted();
    for await (const chunk of chunks) {
      if (!Buffer.isBuffer(chunk)) {
        throw new TransportError("Download returned a non-binary chunk");
      }
      yield chunk;
      signal.throwIfAborted();
    }
  } catch (err) {
    if (signal.aborted || err instanceof TransportError) throw err;
    throw mapTelegramError(err);
  }
}
