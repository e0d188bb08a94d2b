export type Platform = "youtube" | "instagram" | "twitter" | "generic";

export type ExtractorOptions = {
  platform: Platform;
  format: string;
  referer: string;
  httpHeaders: Record<string, string>;
  extractorRetries: number;
  socketTimeoutSeconds: number;
  retries: number;
  fragmentRetries: number;
  retrySleep: string;
  skipUnavailableFragments: boolean;
  noPlaylist: boolean;
  noCheckCertificates: boolean;
  mergeOutputFormat: string;
  recodeVideo: string;
  embedMetadata: boolean;
  /** Whole-invocation attempts for transient failures, on top of the tool's own retries. */
  maxAttempts: number;
  retryBaseDelayMs: number;
};

const DEFAULT_FORMAT = "bestvideo[height<=2160]+bestaudio/best[height<=2160]/best";
const YOUTUBE_FORMAT =
  "bestvideo[height<=2160][ext=mp4]+bestaudio[ext=m4a]/bestvideo[height<=2160]+bestaudio/best[height<=2160]/best";

const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  "Accept-Encoding": "gzip, deflate"
};

const INSTAGRAM_APP_ID = "936619743392459";

const PLATFORM_HOSTS: Array<[Platform, string[]]> = [
  ["youtube", ["youtube.com", "youtu.be", "youtube-nocookie.com"]],
  ["instagram", ["instagram.com"]],
  ["twitter", ["twitter.com", "x.com"]]
];

function hostMatches(host: string, domain: string) {
  return host === domain || host.endsWith(`.${domain}`);
}

export function detectPlatform(rawUrl: string): Platform {
  let host = "";
  try {
    host = new URL(rawUrl).hostname.toLowerCase();
  } catch {
    return "generic";
  }
  for (const [platform, domains] of PLATFORM_HOSTS) {
    if (domains.some((domain) => hostMatches(host, domain))) return platform;
  }
  return "generic";
}

function baseOptions(platform: Platform): ExtractorOptions {
  return {
    platform,
    format: DEFAULT_FORMAT,
    referer: "https://www.youtube.com/",
    httpHeaders: { ...BROWSER_HEADERS },
    extractorRetries: 3,
    socketTimeoutSeconds: 30,
    retries: 5,
    fragmentRetries: 5,
    retrySleep: "exp=1:20",
    skipUnavailableFragments: true,
    noPlaylist: true,
    noCheckCertificates: true,
    mergeOutputFormat: "mp4",
    recodeVideo: "mp4",
    embedMetadata: true,
    maxAttempts: 2,
    retryBaseDelayMs: 750
  };
}

export function buildPlatformOptions(rawUrl: string): ExtractorOptions {
  const platform = detectPlatform(rawUrl);
  const options = baseOptions(platform);

  switch (platform) {
    case "youtube":
      return {
        ...options,
        format: YOUTUBE_FORMAT,
        referer: "https://www.youtube.com/"
      };
    case "instagram":
      // Instagram rate-limits aggressively; back off harder and try the whole call again.
      return {
        ...options,
        referer: "https://www.instagram.com/",
        httpHeaders: {
          ...BROWSER_HEADERS,
          Referer: "https://www.instagram.com/",
          "X-IG-App-ID": INSTAGRAM_APP_ID,
          "X-Requested-With": "XMLHttpRequest",
          "X-Instagram-AJAX": "1",
          "X-ASBD-ID": "198387"
        },
        retrySleep: "exp=2:60",
        maxAttempts: 3,
        retryBaseDelayMs: 2_000
      };
    case "twitter":
      return {
        ...options,
        referer: "https://twitter.com/",
        httpHeaders: {
          ...BROWSER_HEADERS,
          Referer: "https://twitter.com/"
        }
      };
    default:
      return options;
  }
}

/** Renders options as yt-dlp command-line flags (without the URL or output template). */
export function toExtractorArgs(options: ExtractorOptions, { ffmpegLocation = "" } = {}) {
  const args = [
    "--format",
    options.format,
    "--referer",
    options.referer,
    "--extractor-retries",
    String(options.extractorRetries),
    "--socket-timeout",
    String(options.socketTimeoutSeconds),
    "--retries",
    String(options.retries),
    "--fragment-retries",
    String(options.fragmentRetries),
    "--retry-sleep",
    options.retrySleep,
    "--merge-output-format",
    options.mergeOutputFormat,
    "--recode-video",
    options.recodeVideo,
    "--no-colors",
    "--no-progress",
    "--no-keep-video",
    "--no-write-thumbnail",
    "--no-write-subs",
    "--no-write-auto-subs"
  ];

  for (const [name, value] of Object.entries(options.httpHeaders)) {
    args.push("--add-header", `${name}:${value}`);
  }
  if (options.skipUnavailableFragments) args.push("--skip-unavailable-fragments");
  if (options.noPlaylist) args.push("--no-playlist");
  if (options.noCheckCertificates) args.push("--no-check-certificates");
  if (options.embedMetadata) args.push("--embed-metadata");
  if (ffmpegLocation) args.push("--ffmpeg-location", ffmpegLocation);

  return args;
}
