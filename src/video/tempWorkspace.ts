import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { errorMessage } from "../utils.ts";

type RemoveDirectory = (dir: string) => Promise<void>;

const removeDirectory: RemoveDirectory = (dir) => fs.rm(dir, { recursive: true, force: true });

/** A scratch directory owned by one download; removal is idempotent. */
export class TempWorkspace {
  dir: string;
  logger: ActionLog | null;
  removed: boolean;
  removalTimer: NodeJS.Timeout | null;
  removeDir: RemoveDirectory;

  constructor(dir: string, { logger = null, removeDir = removeDirectory }: { logger?: ActionLog | null; removeDir?: RemoveDirectory } = {}) {
    this.dir = dir;
    this.logger = logger;
    this.removed = false;
    this.removalTimer = null;
    this.removeDir = removeDir;
  }

  static async create(prefix: string, options: { logger?: ActionLog | null; baseDir?: string } = {}) {
    const baseDir = options.baseDir || os.tmpdir();
    const dir = await fs.mkdtemp(path.join(baseDir, prefix));
    options.logger?.logAction({
      kind: "download_tempdir_debug",
      content: "temp_directory_created",
      metadata: { dir }
    });
    return new TempWorkspace(dir, { logger: options.logger });
  }

  resolve(...segments: string[]) {
    return path.join(this.dir, ...segments);
  }

  async listFiles() {
    const entries = await fs.readdir(this.dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  scheduleRemoval(delayMs: number) {
    if (this.removed || this.removalTimer) return;
    this.removalTimer = setTimeout(() => {
      this.removalTimer = null;
      void this.remove("timer");
    }, Math.max(0, delayMs));
    this.removalTimer.unref();
  }

  async remove(reason = "explicit") {
    if (this.removalTimer) {
      clearTimeout(this.removalTimer);
      this.removalTimer = null;
    }
    if (this.removed) return;
    this.removed = true;
    try {
      await this.removeDir(this.dir);
      this.logger?.logAction({
        kind: "download_tempdir",
        content: "temp_directory_removed",
        metadata: { dir: this.dir, reason }
      });
    } catch (error) {
      this.logger?.logAction({
        kind: "download_tempdir_warning",
        content: "temp_directory_remove_failed",
        metadata: { dir: this.dir, reason, error: errorMessage(error) }
      });
    }
  }
}
