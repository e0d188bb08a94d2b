import { spawn } from "node:child_process";

const MAX_COMMAND_OUTPUT_BYTES = 8 * 1024 * 1024;

export type CommandResult = {
  stdout: string;
  stderr: string;
};

export type RunCommandOptions = {
  command: string;
  args: string[];
  timeoutMs?: number;
  cwd?: string;
};

export type CommandRunner = (options: RunCommandOptions) => Promise<CommandResult>;

export class CommandError extends Error {
  command: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;

  constructor({
    command,
    exitCode,
    stdout = "",
    stderr = "",
    timedOut = false,
    message
  }: {
    command: string;
    exitCode: number | null;
    stdout?: string;
    stderr?: string;
    timedOut?: boolean;
    message: string;
  }) {
    super(message);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
    this.timedOut = timedOut;
  }
}

function appendCapped(current: string, chunk: string) {
  if (current.length >= MAX_COMMAND_OUTPUT_BYTES) return current;
  const next = current + chunk;
  return next.length > MAX_COMMAND_OUTPUT_BYTES ? next.slice(0, MAX_COMMAND_OUTPUT_BYTES) : next;
}

export function runCommand({ command, args, timeoutMs = 30_000, cwd }: RunCommandOptions) {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, Math.max(1, timeoutMs));

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      reject(error);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(
          new CommandError({
            command,
            exitCode: code,
            stdout,
            stderr,
            timedOut: true,
            message: `${command} timed out after ${timeoutMs}ms.`
          })
        );
        return;
      }
      if (code !== 0) {
        const detail = (stderr || stdout).replace(/\s+/g, " ").trim();
        reject(
          new CommandError({
            command,
            exitCode: code,
            stdout,
            stderr,
            message: `${command} exited with code ${code}${detail ? `: ${detail.slice(0, 400)}` : ""}`
          })
        );
        return;
      }
      resolve({
        stdout: stdout.trim(),
        stderr: stderr.trim()
      });
    });
  });
}

/** Text a CLI tool reported about its failure, preferring its own `ERROR:` lines. */
export function describeCommandFailure(error: unknown) {
  if (error instanceof CommandError) {
    const errorLines = error.stderr
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.startsWith("ERROR:"));
    if (errorLines.length) return errorLines.join(" ");
    return error.stderr.trim() || error.message;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
