import { runCommand, type CommandRunner } from "../commandRunner.ts";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { errorMessage } from "../utils.ts";

const FFPROBE_TIMEOUT_MS = 30_000;
const VERSION_PROBE_TIMEOUT_MS = 4_000;

export type ToolAvailability = {
  ytDlp: boolean;
  ffmpeg: boolean;
  ffprobe: boolean;
};

type MediaToolkitOptions = {
  ffmpegBin?: string;
  ffprobeBin?: string;
  ytDlpBin?: string;
  run?: CommandRunner;
  logger?: ActionLog | null;
};

export class MediaToolkit {
  ffmpegBin: string;
  ffprobeBin: string;
  ytDlpBin: string;
  run: CommandRunner;
  logger: ActionLog | null;
  toolAvailabilityPromise: Promise<ToolAvailability> | null;

  constructor({
    ffmpegBin = "ffmpeg",
    ffprobeBin = "ffprobe",
    ytDlpBin = "yt-dlp",
    run = runCommand,
    logger = null
  }: MediaToolkitOptions = {}) {
    this.ffmpegBin = ffmpegBin;
    this.ffprobeBin = ffprobeBin;
    this.ytDlpBin = ytDlpBin;
    this.run = run;
    this.logger = logger;
    this.toolAvailabilityPromise = null;
  }

  async getToolAvailability(): Promise<ToolAvailability> {
    if (!this.toolAvailabilityPromise) {
      this.toolAvailabilityPromise = Promise.all([
        this.commandAvailable(this.ytDlpBin, ["--version"]),
        this.commandAvailable(this.ffmpegBin, ["-version"]),
        this.commandAvailable(this.ffprobeBin, ["-version"])
      ]).then(([ytDlp, ffmpeg, ffprobe]) => ({ ytDlp, ffmpeg, ffprobe }));
    }
    const tools = await this.toolAvailabilityPromise;
    // A tool installed after startup should be picked up on the next probe.
    if (!tools.ytDlp || !tools.ffmpeg || !tools.ffprobe) {
      this.toolAvailabilityPromise = null;
    }
    return tools;
  }

  async hasFfmpeg() {
    const tools = await this.getToolAvailability();
    return tools.ffmpeg;
  }

  /** Logs the startup toolchain state; a failing version query is reported, not thrown. */
  async logAvailability(ytDlp: { version(): Promise<string> }) {
    const availability = await this.getToolAvailability();
    let ytDlpVersion: string | null = null;
    if (availability.ytDlp) {
      try {
        ytDlpVersion = (await ytDlp.version()) || null;
      } catch (error) {
        this.logger?.logAction({
          kind: "tools_version_warning",
          content: "yt_dlp_version_failed",
          metadata: { error: errorMessage(error) }
        });
      }
    }
    this.logger?.logAction({
      kind: availability.ytDlp && availability.ffmpeg ? "tools_availability" : "tools_availability_warning",
      content: "tool_availability_checked",
      metadata: { ...availability, ytDlpVersion }
    });
    return { ...availability, ytDlpVersion };
  }

  async commandAvailable(command: string, args: string[]) {
    try {
      await this.run({
        command,
        args,
        timeoutMs: VERSION_PROBE_TIMEOUT_MS
      });
      return true;
    } catch {
      return false;
    }
  }

  /** Reports whether the file carries at least one audio stream. Never throws. */
  async probeAudio(filePath: string) {
    try {
      const { stdout } = await this.run({
        command: this.ffprobeBin,
        args: ["-v", "quiet", "-show_streams", "-select_streams", "a", filePath],
        timeoutMs: FFPROBE_TIMEOUT_MS
      });
      const hasAudio = Boolean(stdout.trim());
      this.logger?.logAction({
        kind: hasAudio ? "download_audio_probe" : "download_audio_probe_warning",
        content: hasAudio ? "audio_stream_detected" : "no_audio_stream_detected",
        metadata: { filePath }
      });
      return hasAudio;
    } catch (error) {
      this.logger?.logAction({
        kind: "download_audio_probe_warning",
        content: "audio_probe_failed",
        metadata: { filePath, error: errorMessage(error) }
      });
      return false;
    }
  }
}
