/**
 * Filesystems cap a name at 255 bytes. Saved names also carry a
 * `_<messageId>` collision suffix and a `.N.part` suffix while streaming.
 */
export const MAX_NAME_BYTES = 180;

const MAX_EXTENSION_BYTES = 16;

/** Longest prefix of `text` within `maxBytes` of UTF-8, cut between code points. */
export function truncateBytes(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text) <= maxBytes) return text;
  let out = "";
  let used = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char);
    if (used + size > maxBytes) break;
    out += char;
    used += size;
  }
  return out;
}

/**
 * Sanitize a filename for safe filesystem use. Long names lose the end of
 * their stem; a short extension is kept.
 */
export function sanitizeFilename(name: string, maxBytes = MAX_NAME_BYTES): string {
  const safe = name
    .replace(/[/\\:*?"<>|\u0000-\u001f]/g, "_")
    .replace(/\s+/g, "_")
    .replace(/^\.+/, "");
  if (Buffer.byteLength(safe) <= maxBytes) return safe;

  const dot = safe.lastIndexOf(".");
  const ext = dot > 0 ? safe.slice(dot) : "";
  const extBytes = Buffer.byteLength(ext);
  if (ext === "" || extBytes > MAX_EXTENSION_BYTES || extBytes >= maxBytes) {
    return truncateBytes(safe, maxBytes);
  }
  return truncateBytes(safe.slice(0, dot), maxBytes - extBytes) + ext;
}

/**
 * Directory-safe form of a channel title. Letters from any script are kept.
 */
export function channelDirName(title: string, maxBytes = 80): string {
  const safe = sanitizeFilename(title.trim(), maxBytes).replace(/_+/g, "_");
  return safe.replace(/^_|_$/g, "") || "channel";
}

/** `@name`, `name`, `https://t.me/name` → `name`. */
export function normalizeChannelIdentifier(input: string): string {
  return input
    .trim()
    .replace(/^https?:\/\/(t\.me|telegram\.me)\//i, "")
    .replace(/^@/, "")
    .replace(/\/+$/, "");
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function runTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
