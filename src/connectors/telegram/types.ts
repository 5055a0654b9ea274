import type { Api } from "telegram";
import type { ChannelHandle } from "../core/index.js";

export interface TelegramChannelHandle extends ChannelHandle {
  /** Resolved once; reused for every page and download. */
  peer: Api.TypeInputPeer;
}

/** A saved user session; login happens outside this tool. */
export interface TelegramCredentials {
  apiId: number;
  apiHash: string;
  session: string;
}
