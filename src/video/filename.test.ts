import test from "node:test";
import assert from "node:assert/strict";
import { buildContentDisposition, MAX_FILENAME_LENGTH, sanitizeFilename, toAsciiFilename } from "./filename.ts";

test("sanitizeFilename drops the extension and reserved characters", () => {
  assert.equal(sanitizeFilename("My Video: Part 1/2?.mp4"), "My Video Part 12");
  assert.equal(sanitizeFilename("hello.world.txt"), "hello world");
});

test("sanitizeFilename keeps letters from any script and blanks out symbols", () => {
  assert.equal(sanitizeFilename("Café déjà vu!!! 🎉"), "Café déjà vu");
  assert.equal(sanitizeFilename("  multi\n\nline\tcaption  "), "multi line caption");
  assert.equal(sanitizeFilename("clip_name - take-2"), "clip_name - take-2");
});

test("sanitizeFilename falls back to a default when nothing usable remains", () => {
  assert.equal(sanitizeFilename("___ ***"), "video");
  assert.equal(sanitizeFilename(""), "video");
  assert.equal(sanitizeFilename(null), "video");
});

test("sanitizeFilename bounds the length and trims the cut edge", () => {
  assert.equal(sanitizeFilename("a".repeat(150)), "a".repeat(MAX_FILENAME_LENGTH));
  assert.equal(Array.from(sanitizeFilename("é".repeat(150))).length, MAX_FILENAME_LENGTH);

  const cutOnSpace = sanitizeFilename("abc ".repeat(30));
  assert.equal(cutOnSpace.length, 99);
  assert.equal(cutOnSpace.endsWith(" "), false);
});

test("sanitizeFilename never leaves path separators or quotes", () => {
  const inputs = ['../../etc/passwd', 'say "hi"', "C:\\Windows\\evil.bat", "<script>alert(1)</script>"];
  for (const input of inputs) {
    const result = sanitizeFilename(input);
    assert.equal(/[\\/"<>:|?*]/.test(result), false, result);
    assert.ok(result.length > 0);
  }
});

test("toAsciiFilename folds accents and replaces other non-ASCII characters", () => {
  assert.equal(toAsciiFilename("Café déjà vu.mp4"), "Cafe deja vu.mp4");
  assert.equal(toAsciiFilename("日本.mp4"), "__.mp4");
});

test("buildContentDisposition emits an ASCII fallback and an RFC 5987 name", () => {
  assert.equal(
    buildContentDisposition("My Video.mp4"),
    "attachment; filename=\"My Video.mp4\"; filename*=UTF-8''My%20Video.mp4"
  );
  assert.equal(
    buildContentDisposition("Café déjà vu.mp4"),
    "attachment; filename=\"Cafe deja vu.mp4\"; filename*=UTF-8''Caf%C3%A9%20d%C3%A9j%C3%A0%20vu.mp4"
  );
});
