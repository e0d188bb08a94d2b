import test from "node:test";
import assert from "node:assert/strict";
import { loadAppConfig, normalizeHost } from "./config.ts";

test("loadAppConfig applies defaults for an empty environment", () => {
  const config = loadAppConfig({});
  assert.equal(config.port, 5000);
  assert.equal(config.host, "127.0.0.1");
  assert.equal(config.debug, false);
  assert.equal(config.updateYtDlp, false);
  assert.equal(config.issuesDir, "issues");
  assert.equal(config.ytDlpBin, "yt-dlp");
  assert.equal(config.ffmpegBin, "ffmpeg");
  assert.equal(config.ffprobeBin, "ffprobe");
  assert.equal(config.tempDirTtlMs, 300_000);
  assert.equal(config.downloadRateLimitPerMinute, 20);
  assert.equal(config.runtimeStructuredLogsEnabled, true);
  assert.equal(config.runtimeStructuredLogsFilePath, "data/logs/runtime-actions.ndjson");
});

test("loadAppConfig parses explicit env values", () => {
  const config = loadAppConfig({
    PORT: "8080",
    HOST: "0.0.0.0",
    FLASK_DEBUG: "True",
    UPDATE_YTDLP: "1",
    ISSUES_DIR: "/var/lib/reel-relay/issues",
    YT_DLP_BIN: "/usr/local/bin/yt-dlp",
    FFMPEG_BIN: "/opt/ffmpeg/ffmpeg",
    TEMP_DIR_TTL_SECONDS: "45",
    DOWNLOAD_RATE_LIMIT_PER_MINUTE: "0",
    RUNTIME_STRUCTURED_LOGS_STDOUT: "no",
    RUNTIME_STRUCTURED_LOGS_FILE_PATH: ""
  });
  assert.equal(config.port, 8080);
  assert.equal(config.host, "0.0.0.0");
  assert.equal(config.debug, true);
  assert.equal(config.updateYtDlp, true);
  assert.equal(config.issuesDir, "/var/lib/reel-relay/issues");
  assert.equal(config.ytDlpBin, "/usr/local/bin/yt-dlp");
  assert.equal(config.ffmpegBin, "/opt/ffmpeg/ffmpeg");
  assert.equal(config.tempDirTtlMs, 45_000);
  assert.equal(config.downloadRateLimitPerMinute, 0);
  assert.equal(config.runtimeStructuredLogsStdout, false);
  assert.equal(config.runtimeStructuredLogsFilePath, "");
});

test("loadAppConfig falls back on malformed values", () => {
  const config = loadAppConfig({
    PORT: "not-a-port",
    FLASK_DEBUG: "maybe",
    TEMP_DIR_TTL_SECONDS: "soon"
  });
  assert.equal(config.port, 5000);
  assert.equal(config.debug, false);
  assert.equal(config.tempDirTtlMs, 300_000);
  assert.equal(loadAppConfig({ PORT: "70000" }).port, 5000);
});

test("normalizeHost defaults blank values to loopback", () => {
  assert.equal(normalizeHost("  "), "127.0.0.1");
  assert.equal(normalizeHost(undefined), "127.0.0.1");
  assert.equal(normalizeHost(" 0.0.0.0 "), "0.0.0.0");
});
