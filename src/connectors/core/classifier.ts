import { sanitizeFilename } from "./slugify.js";
import type { MediaCategory, MediaDescriptor, PayloadKind } from "./types.js";

export const CATEGORY_FOLDERS: Record<MediaCategory, string> = {
  photo: "photos",
  video: "videos",
  document: "documents",
  audio: "audio",
};

export const MEDIA_CATEGORIES: readonly MediaCategory[] = [
  "photo",
  "video",
  "document",
  "audio",
];

const MIME_EXTENSIONS: Record<string, string> = {
  "image/jpeg": "jpg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
  "image/heic": "heic",
  "image/svg+xml": "svg",
  "video/mp4": "mp4",
  "video/quicktime": "mov",
  "video/webm": "webm",
  "video/x-matroska": "mkv",
  "video/3gpp": "3gp",
  "audio/ogg": "ogg",
  "audio/mpeg": "mp3",
  "audio/mp4": "m4a",
  "audio/x-m4a": "m4a",
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/flac": "flac",
  "application/ogg": "ogg",
  "application/pdf": "pdf",
  "application/zip": "zip",
  "application/vnd.rar": "rar",
  "application/x-rar-compressed": "rar",
  "application/x-7z-compressed": "7z",
  "application/msword": "doc",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document":
    "docx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "application/x-tgsticker": "tgs",
  "application/octet-stream": "bin",
  "text/plain": "txt",
};

// ─── Category ───

function normalizeMime(mimeType: string): string {
  return mimeType.split(";")[0]?.trim().toLowerCase() ?? "";
}

export function classifyCategory(
  kind: PayloadKind,
  mimeType: string,
): MediaCategory {
  if (kind === "voice") return "audio";

  const mime = normalizeMime(mimeType);
  const [primary = "", subtype = ""] = mime.split("/");
  if (primary === "image") return "photo";
  if (primary === "video") return "video";
  if (primary === "audio" || subtype === "ogg") return "audio";
  if (!mime && kind === "photo") return "photo";
  return "document";
}

// ─── Filenames ───

export function extensionForMime(mimeType: string): string {
  const mime = normalizeMime(mimeType);
  const known = MIME_EXTENSIONS[mime];
  if (known) return known;

  const subtype = mime.split("/")[1] ?? "";
  const ext = subtype
    .replace(/^x-/, "")
    .replace(/\+.*$/, "")
    .replace(/[^a-z0-9]/g, "")
    .slice(0, 10);
  return ext || "bin";
}

export interface Classification {
  category: MediaCategory;
  fileName: string;
  synthesized: boolean;
}

/**
 * Category and preferred filename for an attachment. Pure: collisions are
 * resolved separately by a FilenameRegistry.
 */
export function classifyMedia(
  messageId: number,
  media: MediaDescriptor,
): Classification {
  const category = classifyCategory(media.kind, media.mimeType);
  const declared = media.fileName ? sanitizeFilename(media.fileName) : "";
  if (declared) {
    return { category, fileName: declared, synthesized: false };
  }
  const ext = extensionForMime(media.mimeType || defaultMimeFor(media.kind));
  return {
    category,
    fileName: `${category}_${messageId}.${ext}`,
    synthesized: true,
  };
}

function defaultMimeFor(kind: PayloadKind): string {
  if (kind === "photo") return "image/jpeg";
  if (kind === "voice") return "audio/ogg";
  return "application/octet-stream";
}

function splitExtension(fileName: string): { stem: string; ext: string } {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0) return { stem: fileName, ext: "" };
  return { stem: fileName.slice(0, dot), ext: fileName.slice(dot) };
}

/**
 * Names already taken in each category folder during a run, compared
 * case-insensitively.
 */
export class FilenameRegistry {
  private readonly taken = new Map<MediaCategory, Set<string>>();

  private folder(category: MediaCategory): Set<string> {
    let names = this.taken.get(category);
    if (!names) {
      names = new Set();
      this.taken.set(category, names);
    }
    return names;
  }

  has(category: MediaCategory, fileName: string): boolean {
    return this.folder(category).has(fileName.toLowerCase());
  }

  seed(category: MediaCategory, fileName: string): void {
    this.folder(category).add(fileName.toLowerCase());
  }

  /** Reserve `fileName`, or a variant suffixed with the message id. */
  claim(category: MediaCategory, fileName: string, messageId: number): string {
    let candidate = fileName;
    if (this.has(category, candidate)) {
      const { stem, ext } = splitExtension(fileName);
      candidate = `${stem}_${messageId}${ext}`;
      for (let n = 2; this.has(category, candidate); n++) {
        candidate = `${stem}_${messageId}_${n}${ext}`;
      }
    }
    this.seed(category, candidate);
    return candidate;
  }

  release(category: MediaCategory, fileName: string): void {
    this.folder(category).delete(fileName.toLowerCase());
  }

  size(category: MediaCategory): number {
    return this.folder(category).size;
  }
}

export interface MediaAssignment {
  category: MediaCategory;
  fileName: string;
  /** Path relative to the run directory, always with forward slashes. */
  relativePath: string;
}

export class MediaClassifier {
  private readonly registry: FilenameRegistry;

  constructor(registry: FilenameRegistry = new FilenameRegistry()) {
    this.registry = registry;
  }

  assign(messageId: number, media: MediaDescriptor): MediaAssignment {
    const { category, fileName } = classifyMedia(messageId, media);
    const unique = this.registry.claim(category, fileName, messageId);
    return {
      category,
      fileName: unique,
      relativePath: `${CATEGORY_FOLDERS[category]}/${unique}`,
    };
  }

  /** Mark a path from an earlier export as taken. */
  restore(relativePath: string): void {
    const [folder, ...rest] = relativePath.split("/");
    const category = MEDIA_CATEGORIES.find(
      (c) => CATEGORY_FOLDERS[c] === folder,
    );
    if (category && rest.length > 0) {
      this.registry.seed(category, rest.join("/"));
    }
  }

  /**
   * Give back a name whose file was never kept, so a retry of the same
   * message lands on the same name.
   */
  release(assignment: MediaAssignment): void {
    this.registry.release(assignment.category, assignment.fileName);
  }
}
