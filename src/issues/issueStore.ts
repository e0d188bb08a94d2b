import fs from "node:fs/promises";
import path from "node:path";
import { HttpError } from "../errors.ts";
import { isPlainRecord } from "../normalization/valueParsers.ts";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { errorCode, errorMessage } from "../utils.ts";

export const REQUIRED_ISSUE_FIELDS = ["type", "url", "description"] as const;
const MAX_ID_COLLISIONS = 50;

export type IssueReport = {
  id: string;
  timestamp: string;
  type: string;
  url: string;
  description: string;
  status: "new";
};

type IssueStoreOptions = {
  issuesDir: string;
  logger: ActionLog;
  now?: () => Date;
};

function pad(value: number, width = 2) {
  return String(value).padStart(width, "0");
}

/** Local-time `YYYYMMDDHHMMSS`. */
export function formatIssueId(date: Date) {
  return [
    pad(date.getFullYear(), 4),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds())
  ].join("");
}

export function validateIssueBody(body: unknown) {
  const record = isPlainRecord(body) ? body : {};
  const values: Record<(typeof REQUIRED_ISSUE_FIELDS)[number], string> = {
    type: "",
    url: "",
    description: ""
  };
  for (const field of REQUIRED_ISSUE_FIELDS) {
    const value = record[field];
    const text = typeof value === "string" ? value.trim() : "";
    if (!text) {
      throw new HttpError(400, `Missing required field: ${field}`);
    }
    values[field] = text;
  }
  return values;
}

export class IssueStore {
  issuesDir: string;
  logger: ActionLog;
  now: () => Date;

  constructor({ issuesDir, logger, now = () => new Date() }: IssueStoreOptions) {
    this.issuesDir = path.resolve(issuesDir);
    this.logger = logger;
    this.now = now;
  }

  async report(body: unknown): Promise<IssueReport> {
    const fields = validateIssueBody(body);
    const createdAt = this.now();
    const baseId = formatIssueId(createdAt);

    try {
      await fs.mkdir(this.issuesDir, { recursive: true });
      for (let attempt = 0; attempt <= MAX_ID_COLLISIONS; attempt += 1) {
        const id = attempt === 0 ? baseId : `${baseId}-${attempt}`;
        const issue: IssueReport = {
          id,
          timestamp: createdAt.toISOString(),
          type: fields.type,
          url: fields.url,
          description: fields.description,
          status: "new"
        };
        try {
          await fs.writeFile(this.issuePath(id), `${JSON.stringify(issue, null, 2)}\n`, {
            encoding: "utf8",
            flag: "wx"
          });
        } catch (error) {
          if (errorCode(error) === "EEXIST") continue;
          throw error;
        }
        this.logger.logAction({
          kind: "issue_reported",
          content: "issue_reported",
          metadata: { id, type: issue.type }
        });
        return issue;
      }
      throw new Error(`too many issues reported within one second (${baseId})`);
    } catch (error) {
      this.logger.logAction({
        kind: "issue_error",
        content: "issue_write_failed",
        metadata: { error: errorMessage(error) }
      });
      throw new HttpError(500, "Failed to report issue");
    }
  }

  issuePath(id: string) {
    return path.join(this.issuesDir, `issue_${id}.json`);
  }
}
