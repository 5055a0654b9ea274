import { ConfigError, type Env, parseInteger } from "../core/index.js";
import type { TelegramCredentials } from "./types.js";

const REQUIRED = ["TELEGRAM_API_ID", "TELEGRAM_API_HASH", "TELEGRAM_SESSION"];

export function loadCredentials(env: Env = process.env): TelegramCredentials {
  const missing = REQUIRED.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing ${missing.join(", ")}. See .env.example.`);
  }
  return {
    apiId: parseInteger("TELEGRAM_API_ID", env.TELEGRAM_API_ID, 0, { min: 1 }),
    apiHash: env.TELEGRAM_API_HASH ?? "",
    session: env.TELEGRAM_SESSION ?? "",
  };
}
