import { runCommand, type CommandRunner } from "../commandRunner.ts";
import { safeJsonParse } from "../normalization/valueParsers.ts";
import { toExtractorArgs, type ExtractorOptions } from "./platformOptions.ts";

const YT_DLP_INFO_TIMEOUT_MS = 90_000;
const YT_DLP_DOWNLOAD_TIMEOUT_MS = 15 * 60_000;
const YT_DLP_UPDATE_TIMEOUT_MS = 180_000;

type YtDlpClientOptions = {
  bin?: string;
  ffmpegLocation?: string;
  pythonBin?: string;
  run?: CommandRunner;
  infoTimeoutMs?: number;
  downloadTimeoutMs?: number;
};

/** yt-dlp exited cleanly but printed no usable metadata document. */
export class YtDlpMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "YtDlpMetadataError";
  }
}

export type UpdateResult = {
  updated: boolean;
  method: "self-update" | "pip" | null;
  output: string;
};

export class YtDlpClient {
  bin: string;
  ffmpegLocation: string;
  pythonBin: string;
  run: CommandRunner;
  infoTimeoutMs: number;
  downloadTimeoutMs: number;

  constructor({
    bin = "yt-dlp",
    ffmpegLocation = "",
    pythonBin = "python3",
    run = runCommand,
    infoTimeoutMs = YT_DLP_INFO_TIMEOUT_MS,
    downloadTimeoutMs = YT_DLP_DOWNLOAD_TIMEOUT_MS
  }: YtDlpClientOptions = {}) {
    this.bin = bin;
    this.ffmpegLocation = ffmpegLocation;
    this.pythonBin = pythonBin;
    this.run = run;
    this.infoTimeoutMs = infoTimeoutMs;
    this.downloadTimeoutMs = downloadTimeoutMs;
  }

  async extractInfo(url: string, options: ExtractorOptions): Promise<unknown> {
    const { stdout } = await this.run({
      command: this.bin,
      args: [
        ...toExtractorArgs(options, { ffmpegLocation: this.ffmpegLocation }),
        "--skip-download",
        "--dump-single-json",
        "--",
        url
      ],
      timeoutMs: this.infoTimeoutMs
    });

    const output = stdout.trim();
    if (!output) {
      throw new YtDlpMetadataError("yt-dlp returned empty metadata.");
    }

    const parsed = safeJsonParse(output, undefined);
    if (parsed !== undefined) return parsed;

    // Stray warnings can precede the JSON document on stdout.
    const lastLine = output.split(/\r?\n/).filter(Boolean).at(-1) || "";
    const fromLastLine = safeJsonParse(lastLine, undefined);
    if (fromLastLine === undefined) {
      throw new YtDlpMetadataError("yt-dlp metadata JSON parse failed.");
    }
    return fromLastLine;
  }

  async download(url: string, options: ExtractorOptions, outputTemplate: string) {
    const { stderr } = await this.run({
      command: this.bin,
      args: [
        ...toExtractorArgs(options, { ffmpegLocation: this.ffmpegLocation }),
        "--output",
        outputTemplate,
        "--",
        url
      ],
      timeoutMs: this.downloadTimeoutMs
    });
    return { stderr };
  }

  async version() {
    const { stdout } = await this.run({
      command: this.bin,
      args: ["--version"],
      timeoutMs: 10_000
    });
    return stdout.split(/\r?\n/)[0]?.trim() || "";
  }

  /**
   * Self-update for standalone binaries; pip-managed installs refuse `-U`,
   * so those are upgraded through pip instead.
   */
  async update(): Promise<UpdateResult> {
    try {
      const { stdout } = await this.run({
        command: this.bin,
        args: ["-U"],
        timeoutMs: YT_DLP_UPDATE_TIMEOUT_MS
      });
      return { updated: true, method: "self-update", output: stdout };
    } catch (selfUpdateError) {
      try {
        const { stdout } = await this.run({
          command: this.pythonBin,
          args: ["-m", "pip", "install", "--upgrade", "yt-dlp"],
          timeoutMs: YT_DLP_UPDATE_TIMEOUT_MS
        });
        return { updated: true, method: "pip", output: stdout };
      } catch (pipError) {
        const reason = pipError instanceof Error ? pipError.message : String(pipError);
        const first = selfUpdateError instanceof Error ? selfUpdateError.message : String(selfUpdateError);
        return { updated: false, method: null, output: `${first}\n${reason}` };
      }
    }
  }
}
