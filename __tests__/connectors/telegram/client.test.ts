import { describe, expect, it } from "vitest";
import { createTelegramClient } from "../../../src/connectors/telegram/client.js";

describe("createTelegramClient", () => {
  const credentials = { apiId: 12345, apiHash: "test-hash", session: "" };

  it("never sleeps through flood waits itself", () => {
    const client = createTelegramClient(credentials);
    expect(client.floodSleepThreshold).toBe(0);
  });
});
