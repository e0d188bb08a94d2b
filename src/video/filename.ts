export const MAX_FILENAME_LENGTH = 100;
export const DEFAULT_FILENAME = "video";

const TRAILING_EXTENSION_RE = /\.[^.]+$/;
const RESERVED_CHARS_RE = /[<>:"/\\|?*]/g;
const NON_WORD_CHARS_RE = /[^\p{L}\p{M}\p{N}_\s-]/gu;
const WHITESPACE_RUN_RE = /\s+/g;
const EDGE_FILLER_RE = /^[ _]+|[ _]+$/g;
const TRAILING_FILLER_RE = /[ _]+$/;

/**
 * Turns free text (a caption, description or title) into a file name stem
 * that is safe on every common filesystem and in an HTTP header.
 */
export function sanitizeFilename(raw: unknown) {
  let name = String(raw ?? "");
  name = name.replace(TRAILING_EXTENSION_RE, "");
  name = name.replace(RESERVED_CHARS_RE, "");
  name = name.replace(NON_WORD_CHARS_RE, " ");
  name = name.replace(WHITESPACE_RUN_RE, " ");
  name = name.replace(EDGE_FILLER_RE, "");

  if (!name) {
    name = DEFAULT_FILENAME;
  }

  // Slice by code point so a surrogate pair is never split.
  name = Array.from(name).slice(0, MAX_FILENAME_LENGTH).join("");
  return name.replace(TRAILING_FILLER_RE, "");
}

export function toAsciiFilename(name: string) {
  return name
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/[^\x20-\x7e]|["\\]/g, "_");
}

function encodeRfc5987(value: string) {
  return encodeURIComponent(value).replace(/['()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

export function buildContentDisposition(filename: string) {
  return `attachment; filename="${toAsciiFilename(filename)}"; filename*=UTF-8''${encodeRfc5987(filename)}`;
}
