import test from "node:test";
import assert from "node:assert/strict";
import { buildPlatformOptions, detectPlatform, toExtractorArgs } from "./platformOptions.ts";

test("detectPlatform recognizes hosts and their subdomains", () => {
  assert.equal(detectPlatform("https://youtu.be/AbC123xyz_1"), "youtube");
  assert.equal(detectPlatform("https://m.youtube.com/watch?v=AbC123xyz_1"), "youtube");
  assert.equal(detectPlatform("https://www.instagram.com/reel/Cx1/"), "instagram");
  assert.equal(detectPlatform("https://x.com/someone/status/1"), "twitter");
  assert.equal(detectPlatform("https://mobile.twitter.com/someone/status/1"), "twitter");
  assert.equal(detectPlatform("https://notx.com/watch/1"), "generic");
  assert.equal(detectPlatform("https://vimeo.com/123"), "generic");
  assert.equal(detectPlatform("not a url"), "generic");
});

test("buildPlatformOptions prefers mp4/m4a streams for youtube", () => {
  const options = buildPlatformOptions("https://www.youtube.com/watch?v=AbC123xyz_1");
  assert.equal(options.platform, "youtube");
  assert.equal(
    options.format,
    "bestvideo[height<=2160][ext=mp4]+bestaudio[ext=m4a]/bestvideo[height<=2160]+bestaudio/best[height<=2160]/best"
  );
  assert.equal(options.referer, "https://www.youtube.com/");
  assert.equal(options.maxAttempts, 2);
});

test("buildPlatformOptions shapes instagram headers and backoff", () => {
  const options = buildPlatformOptions("https://www.instagram.com/reel/Cx1/");
  assert.equal(options.referer, "https://www.instagram.com/");
  assert.equal(options.httpHeaders.Referer, "https://www.instagram.com/");
  assert.equal(options.httpHeaders["X-IG-App-ID"], "936619743392459");
  assert.equal(options.httpHeaders["X-Requested-With"], "XMLHttpRequest");
  assert.equal(options.retrySleep, "exp=2:60");
  assert.equal(options.maxAttempts, 3);
  assert.equal(options.format, "bestvideo[height<=2160]+bestaudio/best[height<=2160]/best");
});

test("buildPlatformOptions sets the twitter referer and keeps defaults elsewhere", () => {
  const twitter = buildPlatformOptions("https://x.com/someone/status/1");
  assert.equal(twitter.referer, "https://twitter.com/");
  assert.equal(twitter.httpHeaders.Referer, "https://twitter.com/");

  const generic = buildPlatformOptions("https://vimeo.com/123");
  assert.equal(generic.platform, "generic");
  assert.equal(generic.referer, "https://www.youtube.com/");
  assert.equal(generic.httpHeaders.Referer, undefined);
  assert.equal(generic.extractorRetries, 3);
  assert.equal(generic.socketTimeoutSeconds, 30);
  assert.equal(generic.retries, 5);
  assert.equal(generic.fragmentRetries, 5);
});

test("toExtractorArgs renders flags and headers", () => {
  const options = buildPlatformOptions("https://x.com/someone/status/1");
  const args = toExtractorArgs(options);

  const formatIndex = args.indexOf("--format");
  assert.equal(args[formatIndex + 1], "bestvideo[height<=2160]+bestaudio/best[height<=2160]/best");
  assert.equal(args[args.indexOf("--referer") + 1], "https://twitter.com/");
  assert.equal(args[args.indexOf("--retries") + 1], "5");
  assert.equal(args[args.indexOf("--merge-output-format") + 1], "mp4");
  assert.ok(args.includes("Referer:https://twitter.com/"));
  assert.ok(args.includes("--no-playlist"));
  assert.ok(args.includes("--skip-unavailable-fragments"));
  assert.ok(args.includes("--embed-metadata"));
  assert.equal(args.includes("--ffmpeg-location"), false);

  const withFfmpeg = toExtractorArgs(options, { ffmpegLocation: "/opt/ffmpeg/bin/ffmpeg" });
  assert.equal(withFfmpeg[withFfmpeg.indexOf("--ffmpeg-location") + 1], "/opt/ffmpeg/bin/ffmpeg");
});
