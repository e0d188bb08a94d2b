import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { fileURLToPath } from "node:url";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { normalizeHost, type AppConfig } from "./config.ts";
import { HttpError } from "./errors.ts";
import type { IssueStore } from "./issues/issueStore.ts";
import { isPlainRecord } from "./normalization/valueParsers.ts";
import { FixedWindowRateLimiter } from "./rateLimit.ts";
import type { ActionLog } from "./runtimeActionLogger.ts";
import { errorMessage } from "./utils.ts";
import type { DownloadPreparer, PreparedDownload } from "./video/downloadService.ts";
import { buildContentDisposition } from "./video/filename.ts";
import type { MediaToolkit } from "./video/mediaToolkit.ts";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const DEFAULT_PUBLIC_DIR = path.resolve(__dirname, "../public");
const JSON_BODY_LIMIT = "100kb";
const DOWNLOAD_RATE_WINDOW_MS = 60_000;

type ServerConfig = Pick<AppConfig, "host" | "port" | "downloadRateLimitPerMinute">;

type ServerDependencies = {
  appConfig: ServerConfig;
  downloads: DownloadPreparer;
  tools: Pick<MediaToolkit, "getToolAvailability">;
  issues: Pick<IssueStore, "report">;
  logger: ActionLog;
  publicDir?: string;
  openFile?: (filePath: string) => Readable;
};

export function createApp({
  appConfig,
  downloads,
  tools,
  issues,
  logger,
  publicDir = DEFAULT_PUBLIC_DIR,
  openFile = (filePath) => fs.createReadStream(filePath)
}: ServerDependencies) {
  const app = express();
  const downloadRateLimiter = new FixedWindowRateLimiter({
    windowMs: DOWNLOAD_RATE_WINDOW_MS,
    maxRequests: appConfig.downloadRateLimitPerMinute
  });

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      const status = res.statusCode;
      let kind = "http_request";
      if (status >= 500) kind = "http_request_error";
      else if (status >= 400) kind = "http_request_warning";
      logger.logAction({
        kind,
        content: `${req.method} ${req.path}`,
        metadata: {
          status,
          durationMs: Date.now() - startedAt
        }
      });
    });
    next();
  });

  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(express.urlencoded({ extended: false, limit: JSON_BODY_LIMIT }));

  app.post("/download", async (req, res) => {
    const clientKey = String(req.ip || req.socket.remoteAddress || "").trim() || "unknown";
    if (!downloadRateLimiter.consume(clientKey)) {
      return res.status(429).json({ error: "Too many download requests. Please wait a minute and try again." });
    }

    const url = readUrlField(req.body);
    if (!url) {
      return res.status(400).json({ error: "Please provide a URL" });
    }

    let prepared: PreparedDownload;
    try {
      prepared = await downloads.prepareDownload(url);
    } catch (error) {
      return sendError(res, error, "Unexpected error");
    }
    streamDownload(res, prepared, logger, openFile);
    return res;
  });

  app.get("/health", async (_req, res) => {
    const availability = await tools.getToolAvailability();
    res.json({
      status: "ok",
      message: "Video downloader is running",
      tools: availability
    });
  });

  app.post("/debug-formats", async (req, res) => {
    const url = readUrlField(req.body);
    if (!url) {
      return res.status(400).json({ error: "Please provide a URL" });
    }
    try {
      const formats = await downloads.listFormats(url);
      return res.json({ formats });
    } catch (error) {
      return sendError(res, error, "Debug error");
    }
  });

  app.post("/report-issue", async (req, res) => {
    try {
      const issue = await issues.report(req.body);
      return res.json({ message: "Issue reported successfully", id: issue.id });
    } catch (error) {
      if (error instanceof HttpError) {
        return res.status(error.status).json({ error: error.message });
      }
      logger.logAction({
        kind: "issue_error",
        content: "issue_report_failed",
        metadata: { error: errorMessage(error) }
      });
      return res.status(500).json({ error: "Failed to report issue" });
    }
  });

  app.get("/ads.txt", (_req, res) => {
    const adsPath = path.join(publicDir, "ads.txt");
    if (!fs.existsSync(adsPath)) {
      return res.status(404).type("text/plain").send("Not found.");
    }
    res.type("text/plain");
    return res.sendFile(adsPath);
  });

  app.use(express.static(publicDir));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found." });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const parserType = error && typeof error === "object" && "type" in error ? error.type : null;
    if (parserType === "entity.parse.failed") {
      return res.status(400).json({ error: "Invalid JSON body" });
    }
    if (parserType === "entity.too.large") {
      return res.status(413).json({ error: "Request body too large" });
    }
    logger.logAction({
      kind: "http_unhandled_error",
      content: "unhandled_request_error",
      metadata: { error }
    });
    return res.status(500).json({ error: `Server error: ${errorMessage(error)}` });
  });

  return app;
}

export function createHttpServer(dependencies: ServerDependencies) {
  const app = createApp(dependencies);
  const { appConfig, logger } = dependencies;
  const host = normalizeHost(appConfig.host);
  const server = app.listen(appConfig.port, host, () => {
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : appConfig.port;
    logger.logAction({
      kind: "runtime_server",
      content: "server_listening",
      metadata: { url: `http://${host}:${port}` }
    });
  });

  return { app, server };
}

function readUrlField(body: unknown) {
  if (!isPlainRecord(body)) return "";
  const value = body.url;
  return typeof value === "string" ? value.trim() : "";
}

function sendError(res: Response, error: unknown, fallbackPrefix: string) {
  if (error instanceof HttpError) {
    return res.status(error.status).json({ error: error.message });
  }
  return res.status(500).json({ error: `${fallbackPrefix}: ${errorMessage(error)}` });
}

function streamDownload(
  res: Response,
  prepared: PreparedDownload,
  logger: ActionLog,
  openFile: (filePath: string) => Readable
) {
  const stream = openFile(prepared.filePath);
  let released = false;
  // pipe() leaves the source open when the client disconnects.
  res.on("close", () => {
    if (!stream.destroyed) stream.destroy();
    if (released) return;
    released = true;
    void prepared.release();
  });

  res.status(200);
  res.setHeader("Content-Type", prepared.contentType);
  res.setHeader("Content-Length", String(prepared.fileSize));
  res.setHeader("Content-Disposition", buildContentDisposition(prepared.downloadName));
  res.setHeader("Cache-Control", "no-store");

  stream.on("error", (error) => {
    logger.logAction({
      kind: "download_stream_error",
      content: "file_stream_failed",
      metadata: { filePath: prepared.filePath, error: error.message }
    });
    if (res.headersSent) {
      res.destroy(error);
      return;
    }
    res.removeHeader("Content-Disposition");
    res.removeHeader("Content-Length");
    res.status(500).json({ error: "File transfer failed" });
  });
  stream.pipe(res);
}
