import { URL } from "url";
import * as net from "net";
import { AuditError } from "./errors";

// Second-level labels under which registrations happen one level deeper,
// e.g. example.co.uk. Not a full public suffix list.
const SECOND_LEVEL_SUFFIXES = new Set(["co", "com", "org", "net", "ac", "gov", "edu", "ne", "or", "go"]);

const NON_NAVIGABLE_PREFIXES = ["#", "javascript:", "mailto:", "tel:", "data:"];

export type LinkKind = "internal" | "external" | "other";

export function normalizeTargetUrl(rawUrl: string): string {
  let url = rawUrl.trim();
  if (!url) {
    throw AuditError.invalidUrl(rawUrl, "URL is empty");
  }

  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    url = `https://${url}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw AuditError.invalidUrl(rawUrl);
  }

  if (!["http:", "https:"].includes(parsed.protocol)) {
    throw AuditError.invalidUrl(rawUrl, `Unsupported protocol: ${parsed.protocol}`);
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, "");
  if (!hostname.includes(".") && hostname !== "localhost" && !net.isIP(hostname)) {
    throw AuditError.invalidUrl(rawUrl, `Hostname "${parsed.hostname}" is not a domain`);
  }

  parsed.hash = "";
  return parsed.toString();
}

export function getRegistrableDomain(hostname: string): string {
  const host = hostname.toLowerCase().replace(/\.$/, "");
  if (net.isIP(host.replace(/^\[|\]$/g, ""))) return host;

  const labels = host.split(".").filter(Boolean);
  if (labels.length <= 2) return labels.join(".");

  const tld = labels[labels.length - 1];
  const second = labels[labels.length - 2];
  if (tld.length === 2 && SECOND_LEVEL_SUFFIXES.has(second)) {
    return labels.slice(-3).join(".");
  }
  return labels.slice(-2).join(".");
}

export function isSameSite(url1: string, url2: string): boolean {
  try {
    const parsed1 = new URL(url1);
    const parsed2 = new URL(url2);
    return getRegistrableDomain(parsed1.hostname) === getRegistrableDomain(parsed2.hostname);
  } catch {
    return false;
  }
}

/**
 * Relative links count as internal; http(s) links are internal when they share
 * the page's registrable domain. Anchors and pseudo-protocols are "other".
 */
export function classifyLink(href: string, pageUrl: string): LinkKind {
  const trimmed = href.trim();
  const lower = trimmed.toLowerCase();
  if (!trimmed || NON_NAVIGABLE_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    return "other";
  }

  if (/^https?:\/\//.test(lower) || lower.startsWith("//")) {
    let absolute: string;
    try {
      absolute = new URL(trimmed, pageUrl).toString();
    } catch {
      return "other";
    }
    return isSameSite(absolute, pageUrl) ? "internal" : "external";
  }

  if (/^[a-z][a-z0-9+.-]*:/.test(lower)) {
    return "other";
  }

  return "internal";
}

export function isHttps(url: string): boolean {
  try {
    return new URL(url).protocol === "https:";
  } catch {
    return false;
  }
}
