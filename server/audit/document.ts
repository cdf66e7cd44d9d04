import * as cheerio from "cheerio";
import type {
  DocumentModel,
  HeadingLevel,
  JsonLdBlock,
  PageHeading,
  PageImage,
  PageLink,
  PageScript,
  PageStylesheet,
} from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectJsonLdTypes(data: unknown, types: string[]): void {
  if (Array.isArray(data)) {
    data.forEach((item) => collectJsonLdTypes(item, types));
    return;
  }
  if (!isRecord(data)) return;

  const typeVal = data["@type"];
  if (typeof typeVal === "string") {
    types.push(typeVal);
  } else if (Array.isArray(typeVal)) {
    types.push(...typeVal.filter((t): t is string => typeof t === "string"));
  }

  for (const [key, value] of Object.entries(data)) {
    if (key !== "@type" && typeof value === "object" && value !== null) {
      collectJsonLdTypes(value, types);
    }
  }
}

export function parseJsonLd(body: string): JsonLdBlock {
  const trimmed = body.trim();
  if (!trimmed) return { valid: false, types: [] };
  try {
    const data: unknown = JSON.parse(trimmed);
    const types: string[] = [];
    collectJsonLdTypes(data, types);
    return { valid: true, types: Array.from(new Set(types)) };
  } catch {
    return { valid: false, types: [] };
  }
}

function splitTokens(value: string | undefined): string[] {
  if (!value) return [];
  return value.toLowerCase().split(/\s+/).filter(Boolean);
}

function toHeadingLevel(tagName: string | undefined): HeadingLevel | null {
  const level = parseInt((tagName ?? "").charAt(1), 10);
  if (level === 1 || level === 2 || level === 3 || level === 4 || level === 5 || level === 6) {
    return level;
  }
  return null;
}

/**
 * Builds a DocumentModel from raw HTML. Never throws: missing elements
 * become empty strings, empty lists or nulls.
 */
export function parseDocument(html: string): DocumentModel {
  const $ = cheerio.load(html);

  const title = $("title").first().text().trim();

  const meta = new Map<string, string>();
  $("meta").each((_, el) => {
    const $el = $(el);
    const content = $el.attr("content");
    if (content === undefined) return;
    for (const attr of ["name", "property"]) {
      const key = $el.attr(attr)?.trim().toLowerCase();
      if (key && !meta.has(key)) {
        meta.set(key, content.trim());
      }
    }
  });

  const headings: PageHeading[] = [];
  $("h1, h2, h3, h4, h5, h6").each((_, el) => {
    const level = toHeadingLevel($(el).prop("tagName"));
    if (level) {
      headings.push({ level, text: $(el).text().replace(/\s+/g, " ").trim() });
    }
  });

  const links: PageLink[] = [];
  $("a[href]").each((_, el) => {
    const $el = $(el);
    links.push({
      href: ($el.attr("href") ?? "").trim(),
      text: $el.text().replace(/\s+/g, " ").trim(),
      rel: splitTokens($el.attr("rel")),
    });
  });

  const images: PageImage[] = [];
  $("img").each((_, el) => {
    const $el = $(el);
    images.push({
      src: ($el.attr("src") ?? "").trim(),
      alt: $el.attr("alt") ?? null,
      loading: $el.attr("loading")?.trim().toLowerCase() ?? null,
    });
  });

  const scripts: PageScript[] = [];
  const jsonLd: JsonLdBlock[] = [];
  $("script").each((_, el) => {
    const $el = $(el);
    const type = $el.attr("type")?.trim().toLowerCase() ?? null;
    scripts.push({
      src: $el.attr("src") ?? null,
      type,
      async: $el.attr("async") !== undefined,
      defer: $el.attr("defer") !== undefined,
    });
    if (type === "application/ld+json") {
      jsonLd.push(parseJsonLd($el.text()));
    }
  });

  const stylesheets: PageStylesheet[] = [];
  $("link[rel]").each((_, el) => {
    const $el = $(el);
    if (splitTokens($el.attr("rel")).includes("stylesheet")) {
      stylesheets.push({
        href: $el.attr("href") ?? null,
        media: $el.attr("media")?.trim().toLowerCase() ?? null,
      });
    }
  });

  const inlineStyles: string[] = [];
  $("style").each((_, el) => {
    inlineStyles.push($(el).text());
  });
  $("[style]").each((_, el) => {
    inlineStyles.push($(el).attr("style") ?? "");
  });

  return Object.freeze({
    title,
    meta,
    headings: Object.freeze(headings),
    links: Object.freeze(links),
    images: Object.freeze(images),
    scripts: Object.freeze(scripts),
    jsonLd: Object.freeze(jsonLd),
    stylesheets: Object.freeze(stylesheets),
    inlineStyles: Object.freeze(inlineStyles),
    viewport: meta.get("viewport") ?? null,
    microdataCount: $("[itemscope]").length,
  });
}
