import { TextDecoder } from "util";
import type { AuditConfig, AuditTarget } from "./types";
import { AuditError } from "./errors";
import { logger } from "../logger";

export const MAX_REDIRECTS = 5;

const ACCEPT_HEADER = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

function collectHeaders(headers: Headers): Record<string, string> {
  const collected: Record<string, string> = {};
  headers.forEach((value, name) => {
    collected[name.toLowerCase()] = value;
  });
  return collected;
}

function decodeBody(body: ArrayBuffer, contentType: string): string {
  const charset = /charset=["']?([^;"'\s]+)/i.exec(contentType)?.[1] ?? "utf-8";
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error) {
    logger.debug("Fetcher", `Unknown charset "${charset}", decoding as UTF-8`, error);
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(body);
}

/**
 * Fetches the page once, following up to MAX_REDIRECTS redirects by hand so
 * the final URL is known. The timeout covers the whole exchange, body included.
 */
export async function fetchTarget(
  config: Pick<AuditConfig, "url" | "timeoutMs" | "userAgent">
): Promise<AuditTarget> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);
  const startTime = Date.now();

  try {
    let currentUrl = config.url;
    let redirectCount = 0;

    while (redirectCount <= MAX_REDIRECTS) {
      logger.debug("Fetcher", `GET ${currentUrl}`);

      const response = await fetch(currentUrl, {
        signal: controller.signal,
        headers: {
          "User-Agent": config.userAgent,
          Accept: ACCEPT_HEADER,
          "Accept-Language": "en-US,en;q=0.5",
        },
        redirect: "manual",
      });

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location");
        if (!location) {
          throw AuditError.httpStatus(currentUrl, response.status, "redirect without a Location header");
        }
        await response.body?.cancel();
        currentUrl = new URL(location, currentUrl).toString();
        redirectCount++;
        logger.debug("Fetcher", `Redirected (${response.status}) to ${currentUrl}`);
        continue;
      }

      if (response.status >= 400) {
        throw AuditError.httpStatus(currentUrl, response.status, response.statusText);
      }

      const contentType = response.headers.get("content-type") || "";
      if (contentType && !contentType.includes("html") && !contentType.includes("xml")) {
        logger.warn("Fetcher", `Unexpected content type "${contentType}", auditing it as HTML anyway`);
      }

      const body = await response.arrayBuffer();
      const html = decodeBody(body, contentType);
      const elapsedMs = Date.now() - startTime;

      return Object.freeze({
        url: config.url,
        html,
        response: Object.freeze({
          requestedUrl: config.url,
          finalUrl: currentUrl,
          status: response.status,
          headers: Object.freeze(collectHeaders(response.headers)),
          elapsedMs,
          bodyBytes: body.byteLength,
          redirectCount,
        }),
      });
    }

    throw AuditError.tooManyRedirects(config.url, MAX_REDIRECTS);
  } catch (e) {
    if (e instanceof AuditError) throw e;
    throw AuditError.fromFetchError(e, config.url, config.timeoutMs);
  } finally {
    clearTimeout(timeoutId);
  }
}
