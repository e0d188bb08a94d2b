import fs from "node:fs";
import path from "node:path";
import { nowIso, truncateText } from "./utils.ts";

const MAX_STRING_LENGTH = 2_000;
const MAX_DEPTH = 6;
const MAX_ARRAY_LENGTH = 80;
const MAX_OBJECT_KEYS = 80;
const REDACTED_VALUE = "[REDACTED]";
const OMISSION_VALUE = "[OMITTED]";
const CIRCULAR_VALUE = "[CIRCULAR]";
const TRUNCATED_VALUE = "[TRUNCATED]";
const SENSITIVE_KEY_PATTERN =
  /(api[-_]?key|token|secret|authorization|password|cookie|session|bearer|private[-_]?key)/i;

// ── ANSI helpers ───────────────────────────────────────────────────────
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const YELLOW = "\x1b[33m";
const WHITE = "\x1b[37m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_CYAN = "\x1b[46m";
const BG_MAGENTA = "\x1b[45m";
const BG_BLUE = "\x1b[44m";
const BLACK = "\x1b[30m";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type RuntimeAction = {
  kind: string;
  content?: string | null;
  metadata?: Record<string, unknown> | null;
  createdAt?: string | null;
};

export interface ActionLog {
  logAction(action: RuntimeAction): void;
}

export type RuntimeActionEvent = {
  ts: string;
  source: "runtime_action";
  level: LogLevel;
  kind: string;
  event: string;
  agent: string;
  content: string | null;
  metadata: unknown;
};

type AgentStyle = { bg: string; fg: string };

const AGENT_STYLES: Record<string, AgentStyle> = {
  download: { bg: BG_CYAN, fg: BLACK },
  tools: { bg: BG_MAGENTA, fg: BLACK },
  issue: { bg: BG_BLUE, fg: WHITE },
  http: { bg: BG_GREEN, fg: BLACK },
  runtime: { bg: `\x1b[100m`, fg: WHITE } // bright-black bg
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function formatAgentBadge(agent: string) {
  const style = AGENT_STYLES[agent] || AGENT_STYLES.runtime;
  const label = ` ${(agent || "runtime").padEnd(10)} `;
  return `${style.bg}${style.fg}${BOLD}${label}${RESET}`;
}

function formatMetadataInline(metadata: unknown) {
  if (!isPlainObject(metadata)) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(metadata)) {
    if (v === null || v === undefined) continue;
    const val = typeof v === "object" ? JSON.stringify(v) : String(v);
    if (val.length > 80) continue; // skip bulky values
    parts.push(`${DIM}${k}${RESET}${DIM}=${RESET}${val}`);
  }
  return parts.length > 0 ? `  ${parts.join("  ")}` : "";
}

function formatPrettyLine(payload: RuntimeActionEvent) {
  const time = payload.ts.slice(11, 19); // HH:MM:SS
  const timePart = `${DIM}${time}${RESET}`;
  const agentPart = formatAgentBadge(payload.agent);
  let eventPart = `${BOLD}${WHITE}${payload.event}${RESET}`;
  if (payload.level === "error") {
    eventPart = `${BG_RED}${WHITE}${BOLD} ${payload.event} ${RESET}`;
  } else if (payload.level === "warn") {
    eventPart = `${BOLD}${YELLOW}${payload.event}${RESET}`;
  } else if (payload.level === "debug") {
    eventPart = `${DIM}${payload.event}${RESET}`;
  }
  const metaPart = formatMetadataInline(payload.metadata);

  return `${timePart} ${agentPart} ${eventPart}${metaPart}\n`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  if (Array.isArray(value)) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

type SanitizeContext = {
  depth?: number;
  keyName?: string;
  seen?: WeakSet<object>;
};

export function sanitizeValue(value: unknown, { depth = 0, keyName = "", seen = new WeakSet() }: SanitizeContext = {}): unknown {
  if (keyName && SENSITIVE_KEY_PATTERN.test(keyName)) {
    return REDACTED_VALUE;
  }

  if (value === null || value === undefined) return null;

  if (typeof value === "string") {
    return truncateText(value, MAX_STRING_LENGTH);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "function" || typeof value === "symbol") {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: truncateText(value.name || "Error", 120),
      message: truncateText(value.message || "", 300),
      stack: truncateText(value.stack || "", 3_000)
    };
  }

  if (depth >= MAX_DEPTH) {
    return OMISSION_VALUE;
  }

  if (Array.isArray(value)) {
    const output: unknown[] = value
      .slice(0, MAX_ARRAY_LENGTH)
      .map((item) => sanitizeValue(item, { depth: depth + 1, keyName, seen }));
    if (value.length > MAX_ARRAY_LENGTH) {
      output.push(TRUNCATED_VALUE);
    }
    return output;
  }

  if (!isPlainObject(value)) {
    return truncateText(value, MAX_STRING_LENGTH);
  }

  if (seen.has(value)) {
    return CIRCULAR_VALUE;
  }
  seen.add(value);

  const output: Record<string, unknown> = {};
  const entries = Object.entries(value);
  for (const [entryKey, entryValue] of entries.slice(0, MAX_OBJECT_KEYS)) {
    output[entryKey] = sanitizeValue(entryValue, {
      depth: depth + 1,
      keyName: entryKey,
      seen
    });
  }
  if (entries.length > MAX_OBJECT_KEYS) {
    output._truncatedKeys = entries.length - MAX_OBJECT_KEYS;
  }
  seen.delete(value);
  return output;
}

function normalizeIdentifier(value: unknown, maxLength = 120) {
  const normalized = truncateText(value, maxLength).trim();
  return normalized || null;
}

export function resolveLevel(kind: string): LogLevel {
  const normalizedKind = kind.toLowerCase();
  if (normalizedKind.endsWith("_error")) return "error";
  if (normalizedKind.endsWith("_warning")) return "warn";
  if (normalizedKind.endsWith("_debug")) return "debug";
  return "info";
}

function resolveAgent(kind: string) {
  if (kind.startsWith("download_")) return "download";
  if (kind.startsWith("tools_")) return "tools";
  if (kind.startsWith("issue_")) return "issue";
  if (kind.startsWith("http_")) return "http";
  return "runtime";
}

export function normalizeRuntimeActionEvent(action: RuntimeAction): RuntimeActionEvent {
  const kind = normalizeIdentifier(action.kind, 120) || "runtime";
  const event = normalizeIdentifier(action.content, 180) || kind;

  return {
    ts: normalizeIdentifier(action.createdAt, 40) || nowIso(),
    source: "runtime_action",
    level: resolveLevel(kind),
    kind,
    event,
    agent: resolveAgent(kind),
    content: normalizeIdentifier(action.content, MAX_STRING_LENGTH),
    metadata: sanitizeValue(action.metadata, { keyName: "metadata" })
  };
}

function resolveLogFilePath(value: string) {
  const normalized = value.trim();
  if (!normalized) return "";
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}

type LineSink = (line: string, payload: RuntimeActionEvent) => void;

type RuntimeActionLoggerOptions = {
  enabled?: boolean;
  debug?: boolean;
  writeToStdout?: boolean;
  logFilePath?: string;
  writeLine?: LineSink | null;
};

export class RuntimeActionLogger implements ActionLog {
  enabled: boolean;
  minLevel: LogLevel;
  writeToStdout: boolean;
  writeLine: LineSink | null;
  logFilePath: string;
  fileStream: fs.WriteStream | null;

  constructor({
    enabled = true,
    debug = false,
    writeToStdout = true,
    logFilePath = "",
    writeLine = null
  }: RuntimeActionLoggerOptions = {}) {
    this.enabled = enabled;
    this.minLevel = debug ? "debug" : "info";
    this.writeToStdout = writeToStdout;
    this.writeLine = writeLine;
    this.logFilePath = resolveLogFilePath(logFilePath);
    this.fileStream = null;

    if (this.enabled && this.logFilePath) {
      fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
      this.fileStream = fs.createWriteStream(this.logFilePath, {
        flags: "a",
        encoding: "utf8"
      });
      this.fileStream.on("error", () => {
        this.fileStream = null;
      });
    }
  }

  logAction(action: RuntimeAction) {
    if (!this.enabled) return;
    const payload = normalizeRuntimeActionEvent(action);
    if (LEVEL_RANK[payload.level] < LEVEL_RANK[this.minLevel]) return;
    const line = `${JSON.stringify(payload)}\n`;

    if (this.writeLine) {
      try {
        this.writeLine(line, payload);
      } catch {
        // in-test sink should never break runtime logging
      }
    }

    if (this.writeToStdout) {
      try {
        process.stdout.write(formatPrettyLine(payload));
      } catch {
        // stdout failures should not interrupt request handling
      }
    }

    if (this.fileStream) {
      try {
        this.fileStream.write(line);
      } catch {
        // file failures should not interrupt request handling
      }
    }
  }

  close() {
    if (!this.fileStream) return;
    this.fileStream.end();
    this.fileStream = null;
  }
}
