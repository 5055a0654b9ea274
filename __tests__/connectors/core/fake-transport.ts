import type {
  ArchiveMessage,
  ChannelHandle,
  HistoryPageRequest,
  HistoryTransport,
  MediaDescriptor,
} from "../../../src/connectors/core/types.js";

/** In-memory channel with scriptable failures. */
export class FakeTransport implements HistoryTransport {
  channel: ChannelHandle = { id: "1001", title: "Example Channel" };
  messages: ArchiveMessage[] = [];
  resolveErrors: unknown[] = [];
  /** One entry per page call; undefined lets the call succeed. */
  pageErrors: unknown[] = [];
  mediaErrors = new Map<number, unknown[]>();
  /** Page calls that never answer, counted from the next call. */
  hangPages = 0;
  /** Message ids whose next media download never answers. */
  hangMedia = new Set<number>();
  onPage: ((call: number) => void) | null = null;

  resolved: string[] = [];
  requests: HistoryPageRequest[] = [];
  mediaCalls: number[] = [];

  private readonly owners = new Map<MediaDescriptor, number>();
  private readonly payloads = new Map<number, string>();
  private pageCalls = 0;

  addText(id: number, text = `message ${id}`): this {
    this.messages.push(message(id, { text }));
    return this;
  }

  addMedia(
    id: number,
    media: Partial<MediaDescriptor> & Pick<MediaDescriptor, "kind" | "mimeType">,
    payload: string,
  ): this {
    const descriptor: MediaDescriptor = { fileName: null, size: null, ...media };
    this.owners.set(descriptor, id);
    this.payloads.set(id, payload);
    this.messages.push(message(id, { media: descriptor }));
    return this;
  }

  /** Replace fields of an added message; its media stays fetchable. */
  edit(id: number, overrides: Partial<ArchiveMessage>): this {
    this.messages = this.messages.map((m) => (m.id === id ? { ...m, ...overrides } : m));
    return this;
  }

  addService(id: number): this {
    this.messages.push(message(id, { service: true, text: "" }));
    return this;
  }

  async resolveChannel(identifier: string): Promise<ChannelHandle> {
    this.resolved.push(identifier);
    const err = this.resolveErrors.shift();
    if (err !== undefined) throw err;
    return this.channel;
  }

  async fetchHistoryPage(
    _handle: ChannelHandle,
    request: HistoryPageRequest,
    signal: AbortSignal,
  ): Promise<ArchiveMessage[]> {
    this.pageCalls++;
    this.requests.push(request);
    this.onPage?.(this.pageCalls);
    if (this.hangPages > 0) {
      this.hangPages--;
      await untilAborted(signal);
    }
    const err = this.pageErrors.shift();
    if (err !== undefined) throw err;
    return this.messages
      .filter((m) => m.id > request.afterId)
      .slice(0, request.limit);
  }

  async *fetchMedia(
    media: MediaDescriptor,
    signal: AbortSignal,
  ): AsyncGenerator<Uint8Array> {
    const owner = this.owners.get(media);
    if (owner === undefined) throw new Error("media of an unknown message");
    this.mediaCalls.push(owner);
    if (this.hangMedia.delete(owner)) await untilAborted(signal);
    const err = this.mediaErrors.get(owner)?.shift();
    if (err !== undefined) throw err;
    yield Buffer.from(this.payloads.get(owner) ?? "");
  }
}

/** Settles only by rejecting with the abort reason. */
function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

function message(id: number, overrides: Partial<ArchiveMessage>): ArchiveMessage {
  return {
    id,
    date: new Date(Date.UTC(2026, 0, 1, 0, 0, id % 60)),
    sender: "channel:1001",
    text: "",
    media: null,
    views: null,
    forwards: null,
    service: false,
    ...overrides,
  };
}
