export { createTelegramClient, TelegramTransport } from "./client.js";
export { loadCredentials } from "./config.js";
export {
  describeMedia,
  mapTelegramError,
  peerLabel,
  streamChunks,
  toArchiveMessage,
} from "./transform.js";
export type { TelegramChannelHandle, TelegramCredentials } from "./types.js";
