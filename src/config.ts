import dotenv from "dotenv";
import { parseBooleanFlag, parseNumberOrFallback } from "./normalization/valueParsers.ts";

dotenv.config();

type EnvSource = Record<string, string | undefined>;

export type AppConfig = ReturnType<typeof loadAppConfig>;

export function loadAppConfig(env: EnvSource = process.env) {
  return {
    port: normalizePort(env.PORT),
    host: normalizeHost(env.HOST),
    debug: parseBooleanFlag(env.FLASK_DEBUG, false),
    updateYtDlp: parseBooleanFlag(env.UPDATE_YTDLP, false),
    issuesDir: String(env.ISSUES_DIR || "").trim() || "issues",
    ytDlpBin: String(env.YT_DLP_BIN || "").trim() || "yt-dlp",
    ffmpegBin: String(env.FFMPEG_BIN || "").trim() || "ffmpeg",
    ffprobeBin: String(env.FFPROBE_BIN || "").trim() || "ffprobe",
    tempDirTtlMs: Math.max(1, parseNumberOrFallback(env.TEMP_DIR_TTL_SECONDS, 300)) * 1000,
    downloadRateLimitPerMinute: Math.max(0, Math.floor(parseNumberOrFallback(env.DOWNLOAD_RATE_LIMIT_PER_MINUTE, 20))),
    runtimeStructuredLogsEnabled: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_ENABLED, true),
    runtimeStructuredLogsStdout: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_STDOUT, true),
    runtimeStructuredLogsFilePath: env.RUNTIME_STRUCTURED_LOGS_FILE_PATH ?? "data/logs/runtime-actions.ndjson"
  };
}

export const appConfig = loadAppConfig();

export function normalizeHost(value: unknown) {
  const normalized = String(value || "").trim();
  return normalized || "127.0.0.1";
}

function normalizePort(value: unknown) {
  const port = Math.floor(parseNumberOrFallback(value, 5000));
  if (port < 0 || port > 65_535) return 5000;
  return port;
}
