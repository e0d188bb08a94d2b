import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import { describeCommandFailure } from "../commandRunner.ts";
import { HttpError, mapExtractorError } from "../errors.ts";
import { isPlainRecord, readString } from "../normalization/valueParsers.ts";
import { readAttemptCount, runWithRetries } from "../retry.ts";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { assertPublicUrl, isBlockedHost, parseHttpUrl } from "../urlSafety.ts";
import { errorCode, errorMessage, sleep, truncateText } from "../utils.ts";
import { sanitizeFilename } from "./filename.ts";
import type { MediaToolkit } from "./mediaToolkit.ts";
import { buildPlatformOptions, type ExtractorOptions, type Platform } from "./platformOptions.ts";
import { TempWorkspace } from "./tempWorkspace.ts";
import { YtDlpMetadataError, type YtDlpClient } from "./ytDlp.ts";

const DEFAULT_TEMP_DIR_TTL_MS = 5 * 60_000;
const LOGGED_FORMAT_COUNT = 5;
const VIDEO_FILE_RE = /\.(mp4|m4v|mov)$/i;
const PARTIAL_FILE_RE = /\.(part|ytdl|temp)$/i;
const VIDEO_INFO_MISSING_MESSAGE =
  "Could not extract video information. The URL might be invalid or the video might be private.";
const DNS_FAILURE_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "ESERVFAIL"]);

export type PreparedDownload = {
  filePath: string;
  fileSize: number;
  downloadName: string;
  contentType: "video/mp4";
  platform: Platform;
  videoId: string;
  release: () => Promise<void>;
};

export type FormatSummary = {
  format_id: string | null;
  ext: string | null;
  resolution: string | null;
  vcodec: string | null;
  acodec: string | null;
  filesize: number | null;
  tbr: number | null;
};

export interface DownloadPreparer {
  prepareDownload(url: string): Promise<PreparedDownload>;
  listFormats(url: string): Promise<FormatSummary[]>;
}

type VideoDownloadServiceOptions = {
  ytDlp: Pick<YtDlpClient, "extractInfo" | "download">;
  tools: Pick<MediaToolkit, "hasFfmpeg" | "probeAudio">;
  logger: ActionLog;
  tempDirTtlMs?: number;
  assertUrl?: (url: string) => Promise<void>;
  createWorkspace?: (logger: ActionLog) => Promise<TempWorkspace>;
  wait?: (ms: number) => Promise<void>;
};

export class VideoDownloadService implements DownloadPreparer {
  ytDlp: Pick<YtDlpClient, "extractInfo" | "download">;
  tools: Pick<MediaToolkit, "hasFfmpeg" | "probeAudio">;
  logger: ActionLog;
  tempDirTtlMs: number;
  assertUrl: (url: string) => Promise<void>;
  createWorkspace: (logger: ActionLog) => Promise<TempWorkspace>;
  wait: (ms: number) => Promise<void>;

  constructor({
    ytDlp,
    tools,
    logger,
    tempDirTtlMs = DEFAULT_TEMP_DIR_TTL_MS,
    assertUrl = (url) => assertPublicUrl(url),
    createWorkspace = (workspaceLogger) => TempWorkspace.create("reel-relay-", { logger: workspaceLogger }),
    wait = sleep
  }: VideoDownloadServiceOptions) {
    this.ytDlp = ytDlp;
    this.tools = tools;
    this.logger = logger;
    this.tempDirTtlMs = tempDirTtlMs;
    this.assertUrl = assertUrl;
    this.createWorkspace = createWorkspace;
    this.wait = wait;
  }

  async prepareDownload(url: string): Promise<PreparedDownload> {
    await this.checkUrl(url);

    if (!(await this.tools.hasFfmpeg())) {
      throw new HttpError(500, "ffmpeg is required but not installed. Please install ffmpeg manually.");
    }

    const options = buildPlatformOptions(url);
    this.logger.logAction({
      kind: "download_request",
      content: "download_started",
      metadata: { url, platform: options.platform }
    });

    const workspace = await this.createWorkspace(this.logger);
    try {
      const info = await this.withExtractor(options, "extract_info", () => this.ytDlp.extractInfo(url, options));
      if (!isPlainRecord(info)) {
        this.logger.logAction({
          kind: "download_error",
          content: "video_info_missing",
          metadata: { url, received: info === null ? "null" : typeof info }
        });
        throw new HttpError(400, VIDEO_INFO_MISSING_MESSAGE);
      }
      this.logFormats(info);

      const videoId = readString(info, "id") || randomUUID().slice(0, 8);
      const rawCaption =
        readString(info, "description") || readString(info, "caption") || readString(info, "title") || `video_${videoId}`;
      const caption = sanitizeFilename(rawCaption);
      this.logger.logAction({
        kind: "download_metadata",
        content: "video_metadata_extracted",
        metadata: { videoId, rawCaption: truncateText(rawCaption, 200), caption }
      });

      await this.withExtractor(options, "download", () =>
        this.ytDlp.download(url, options, workspace.resolve("%(id)s.%(ext)s"))
      );

      const filePath = await this.pickDownloadedFile(workspace, options.platform);
      const { size } = await fs.stat(filePath);
      await this.tools.probeAudio(filePath);

      workspace.scheduleRemoval(this.tempDirTtlMs);
      this.logger.logAction({
        kind: "download_ready",
        content: "download_ready",
        metadata: { videoId, filePath, fileSize: size, platform: options.platform }
      });

      return {
        filePath,
        fileSize: size,
        downloadName: `${caption}.mp4`,
        contentType: "video/mp4",
        platform: options.platform,
        videoId,
        release: () => workspace.remove("response_closed")
      };
    } catch (error) {
      await workspace.remove("download_failed");
      throw this.toHttpError(error);
    }
  }

  async listFormats(url: string): Promise<FormatSummary[]> {
    await this.checkUrl(url);
    const options = buildPlatformOptions(url);

    let info: unknown = null;
    try {
      info = await this.ytDlp.extractInfo(url, options);
    } catch (error) {
      this.logger.logAction({
        kind: "download_formats_error",
        content: "format_listing_failed",
        metadata: { url, error: describeCommandFailure(error) }
      });
    }

    const formats = isPlainRecord(info) ? info.formats : null;
    if (!Array.isArray(formats)) {
      throw new HttpError(400, "Could not extract format information");
    }
    return formats.filter(isPlainRecord).map(summarizeFormat);
  }

  async checkUrl(url: string) {
    const parsed = parseHttpUrl(url);
    if (!parsed) {
      throw new HttpError(400, "Please provide a valid http(s) URL");
    }
    if (isBlockedHost(parsed.hostname)) {
      throw new HttpError(400, "This URL points to a host that cannot be downloaded from.");
    }
    try {
      await this.assertUrl(url);
    } catch (error) {
      if (DNS_FAILURE_CODES.has(errorCode(error))) {
        throw new HttpError(500, "Network connection error. Please check your internet connection.");
      }
      throw new HttpError(400, "This URL points to a host that cannot be downloaded from.");
    }
  }

  async withExtractor<T>(options: ExtractorOptions, step: string, run: () => Promise<T>) {
    try {
      return await runWithRetries({
        attempts: options.maxAttempts,
        baseDelayMs: options.retryBaseDelayMs,
        run,
        wait: this.wait,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.logAction({
            kind: "download_retry_warning",
            content: `${step}_retry`,
            metadata: {
              platform: options.platform,
              attempt,
              delayMs,
              error: truncateText(describeCommandFailure(error), 400)
            }
          });
        }
      });
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new HttpError(500, "yt-dlp is required but not installed.");
      }
      const message = describeCommandFailure(error);
      this.logger.logAction({
        kind: "download_error",
        content: `${step}_failed`,
        metadata: {
          platform: options.platform,
          attempts: readAttemptCount(error),
          error: truncateText(message, 1_000)
        }
      });
      if (error instanceof YtDlpMetadataError) {
        throw new HttpError(400, VIDEO_INFO_MISSING_MESSAGE);
      }
      const mapped = mapExtractorError(message);
      throw new HttpError(mapped.status, mapped.error);
    }
  }

  logFormats(info: Record<string, unknown>) {
    if (!Array.isArray(info.formats)) return;
    const formats = info.formats.filter(isPlainRecord);
    this.logger.logAction({
      kind: "download_formats",
      content: "formats_available",
      metadata: {
        count: formats.length,
        sample: formats.slice(0, LOGGED_FORMAT_COUNT).map((format) => {
          const summary = summarizeFormat(format);
          return `${summary.format_id} - ${summary.ext} - ${summary.resolution} - ${summary.vcodec} - ${summary.acodec}`;
        })
      }
    });
  }

  async pickDownloadedFile(workspace: TempWorkspace, platform: Platform) {
    const files = (await workspace.listFiles()).filter((name) => !PARTIAL_FILE_RE.test(name));
    const videoFile = files.find((name) => VIDEO_FILE_RE.test(name));
    if (videoFile) {
      return workspace.resolve(videoFile);
    }

    this.logger.logAction({
      kind: "download_error",
      content: "downloaded_file_missing",
      metadata: { dir: workspace.dir, files, platform }
    });

    // Instagram posts sometimes land with an unexpected container; take whatever arrived.
    if (platform === "instagram") {
      const first = files[0];
      if (first) {
        this.logger.logAction({
          kind: "download_file_fallback_warning",
          content: "using_first_available_file",
          metadata: { file: first }
        });
        return workspace.resolve(first);
      }
      throw new HttpError(
        500,
        "Video downloaded but file not found. The post might be private or not contain a video."
      );
    }
    throw new HttpError(500, "Video downloaded but file not found");
  }

  toHttpError(error: unknown) {
    if (error instanceof HttpError) return error;
    this.logger.logAction({
      kind: "download_error",
      content: "unexpected_download_error",
      metadata: { error: errorMessage(error) }
    });
    return new HttpError(500, `Unexpected error: ${errorMessage(error)}`);
  }
}

function readNullableString(record: Record<string, unknown>, key: string) {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function readNullableNumber(record: Record<string, unknown>, key: string) {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function summarizeFormat(format: Record<string, unknown>): FormatSummary {
  return {
    format_id: readNullableString(format, "format_id"),
    ext: readNullableString(format, "ext"),
    resolution: readNullableString(format, "resolution"),
    vcodec: readNullableString(format, "vcodec"),
    acodec: readNullableString(format, "acodec"),
    filesize: readNullableNumber(format, "filesize"),
    tbr: readNullableNumber(format, "tbr")
  };
}
