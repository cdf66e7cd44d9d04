import type { DocumentModel, ResponseMetadata } from "./types";

export function makeDoc(overrides: Partial<DocumentModel> = {}): DocumentModel {
  return {
    title: "",
    meta: new Map(),
    headings: [],
    links: [],
    images: [],
    scripts: [],
    jsonLd: [],
    stylesheets: [],
    inlineStyles: [],
    viewport: null,
    microdataCount: 0,
    ...overrides,
  };
}

export function makeResponse(overrides: Partial<ResponseMetadata> = {}): ResponseMetadata {
  return {
    requestedUrl: "https://www.example.com/",
    finalUrl: "https://www.example.com/",
    status: 200,
    headers: {},
    elapsedMs: 12,
    bodyBytes: 0,
    redirectCount: 0,
    ...overrides,
  };
}

export const ALL_SECURITY_HEADERS: Record<string, string> = {
  "strict-transport-security": "max-age=31536000",
  "content-security-policy": "default-src 'self'",
  "x-frame-options": "DENY",
  "x-content-type-options": "nosniff",
  "referrer-policy": "no-referrer",
};

/** Scores 100 in every category when served over HTTPS with ALL_SECURITY_HEADERS. */
export const GOOD_PAGE = `<!doctype html>
<html lang="en">
<head>
  <title>Handmade Stoneware Bowls and Mugs | Portland Pottery Co</title>
  <meta name="description" content="Wheel-thrown stoneware bowls, mugs and vases made in small batches in our Portland studio. Food safe glazes, free local pickup and careful shipping nationwide.">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <meta property="og:title" content="Portland Pottery Co">
  <meta property="og:description" content="Handmade stoneware from Portland">
  <meta property="og:image" content="https://example.com/og.webp">
  <meta property="og:url" content="https://example.com/">
  <meta property="og:type" content="website">
  <meta name="twitter:card" content="summary_large_image">
  <link rel="stylesheet" href="/site.css">
  <script type="application/ld+json">{"@context":"https://schema.org","@type":"Organization","name":"Portland Pottery Co"}</script>
  <script type="application/ld+json">{"@context":"https://schema.org","@type":"WebSite","url":"https://example.com/"}</script>
  <script type="application/ld+json">{"@context":"https://schema.org","@type":"BreadcrumbList","itemListElement":[]}</script>
</head>
<body>
  <h1>Portland Pottery Co</h1>
  <h2>Bowls</h2>
  <h3>Glazes</h3>
  <a href="/shop">Shop</a>
  <a href="/about">About</a>
  <a href="/contact">Contact</a>
  <img src="/bowl.webp" alt="Speckled stoneware bowl">
</body>
</html>`;

/** A string of exactly `length` characters with no generic words in it. */
export function textOfLength(length: number): string {
  return "Stoneware".padEnd(length, "s").slice(0, length);
}
