export type ErrorPayload = {
  status: number;
  error: string;
};

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }

  toPayload(): ErrorPayload {
    return { status: this.status, error: this.message };
  }
}

type ExtractorErrorRule = {
  needles: string[];
  status: number;
  error: string;
};

// Matched in order against the extraction tool's own error text.
const EXTRACTOR_ERROR_RULES: ExtractorErrorRule[] = [
  {
    needles: ["Unable to download API page"],
    status: 400,
    error: "API access failed. The video might be region-blocked or private."
  },
  {
    needles: ["getaddrinfo failed", "Temporary failure in name resolution", "Name or service not known"],
    status: 500,
    error: "Network connection error. Please check your internet connection."
  },
  {
    needles: ["Private video"],
    status: 400,
    error: "This video is private and cannot be downloaded."
  },
  {
    needles: ["Video unavailable"],
    status: 400,
    error: "This video is unavailable or has been removed."
  },
  {
    needles: ["Unsupported URL"],
    status: 400,
    error: "This URL is not supported."
  },
  {
    needles: ["Sign in to confirm", "login required"],
    status: 400,
    error: "This video requires a signed-in account and cannot be downloaded."
  }
];

export function mapExtractorError(message: string): ErrorPayload {
  const text = String(message || "");
  for (const rule of EXTRACTOR_ERROR_RULES) {
    if (rule.needles.some((needle) => text.includes(needle))) {
      return { status: rule.status, error: rule.error };
    }
  }
  return { status: 500, error: `Download failed: ${text}` };
}
