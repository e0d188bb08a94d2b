import dns from "node:dns/promises";
import net from "node:net";

export type HostLookup = (host: string) => Promise<Array<{ address: string }>>;

const defaultLookup: HostLookup = (host) => dns.lookup(host, { all: true });

export function isPrivateIp(value: string) {
  const compact = value.replace(/^\[|\]$/g, "").toLowerCase();
  const ipType = net.isIP(compact);
  if (!ipType) return false;

  if (ipType === 4) {
    const parts = compact.split(".").map((part) => Number(part || 0));
    if (parts[0] === 10 || parts[0] === 127 || parts[0] === 0) return true;
    if (parts[0] === 169 && parts[1] === 254) return true;
    if (parts[0] === 172 && parts[1] >= 16 && parts[1] <= 31) return true;
    if (parts[0] === 192 && parts[1] === 168) return true;
    return false;
  }

  if (compact === "::1" || compact === "::") return true;
  if (compact.startsWith("::ffff:")) return isPrivateIp(compact.slice("::ffff:".length));
  if (compact.startsWith("fc") || compact.startsWith("fd")) return true;
  return compact.startsWith("fe80");
}

export function isBlockedHost(hostname: string) {
  const host = hostname.toLowerCase();
  if (!host) return true;
  if (host === "localhost" || host.endsWith(".localhost") || host.endsWith(".local")) return true;
  return isPrivateIp(host);
}

export function parseHttpUrl(rawUrl: string) {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return null;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
  return parsed;
}

export async function assertPublicUrl(rawUrl: string, lookup: HostLookup = defaultLookup) {
  const parsed = parseHttpUrl(rawUrl);
  if (!parsed) {
    throw new Error("not an http(s) URL");
  }
  const host = parsed.hostname.toLowerCase();
  if (isBlockedHost(host)) {
    throw new Error(`blocked host: ${host}`);
  }

  const records = await lookup(host);
  for (const record of records) {
    if (isPrivateIp(record.address)) {
      throw new Error(`blocked private address for host ${host}`);
    }
  }
}
