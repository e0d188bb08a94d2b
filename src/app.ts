import { appConfig } from "./config.ts";
import { IssueStore } from "./issues/issueStore.ts";
import { RuntimeActionLogger } from "./runtimeActionLogger.ts";
import { createHttpServer } from "./server.ts";
import { errorMessage } from "./utils.ts";
import { VideoDownloadService } from "./video/downloadService.ts";
import { MediaToolkit } from "./video/mediaToolkit.ts";
import { YtDlpClient } from "./video/ytDlp.ts";

async function main() {
  const logger = new RuntimeActionLogger({
    enabled: appConfig.runtimeStructuredLogsEnabled,
    debug: appConfig.debug,
    writeToStdout: appConfig.runtimeStructuredLogsStdout,
    logFilePath: appConfig.runtimeStructuredLogsFilePath
  });

  const ytDlp = new YtDlpClient({
    bin: appConfig.ytDlpBin,
    ffmpegLocation: appConfig.ffmpegBin === "ffmpeg" ? "" : appConfig.ffmpegBin
  });
  const tools = new MediaToolkit({
    ffmpegBin: appConfig.ffmpegBin,
    ffprobeBin: appConfig.ffprobeBin,
    ytDlpBin: appConfig.ytDlpBin,
    logger
  });

  if (appConfig.updateYtDlp) {
    const result = await ytDlp.update();
    logger.logAction({
      kind: result.updated ? "tools_update" : "tools_update_warning",
      content: result.updated ? "yt_dlp_updated" : "yt_dlp_update_failed",
      metadata: { method: result.method, output: result.output }
    });
  }

  await tools.logAvailability(ytDlp);

  const downloads = new VideoDownloadService({
    ytDlp,
    tools,
    logger,
    tempDirTtlMs: appConfig.tempDirTtlMs
  });
  const issues = new IssueStore({ issuesDir: appConfig.issuesDir, logger });

  const { server } = createHttpServer({ appConfig, downloads, tools, issues, logger });

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;

    logger.logAction({ kind: "runtime_shutdown", content: "shutting_down", metadata: { signal } });
    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Fatal startup error:", errorMessage(error));
  process.exit(1);
});
