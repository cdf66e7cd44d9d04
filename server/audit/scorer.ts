import type { CategoryKey } from "../../shared/audit-types";
import { CATEGORY_KEYS, CATEGORY_NAMES } from "../../shared/audit-types";
import type { CategoryResult, DocumentModel, Evaluator, PageLink, ResponseMetadata } from "./types";
import { clampScore } from "./grading";
import { classifyLink, isHttps } from "./url-utils";
import { getErrorMessage } from "./errors";
import { logger } from "../logger";

const MAX_SCORE = 100;

const GENERIC_TITLE_WORDS = ["home", "untitled", "index", "page", "website", "welcome", "default"];
const GENERIC_DESCRIPTION_PHRASES = ["this is a website", "welcome to", "click here", "learn more", "lorem ipsum"];

export const SECURITY_HEADERS: ReadonlyArray<{ header: string; description: string }> = [
  { header: "Strict-Transport-Security", description: "HSTS forces HTTPS connections" },
  { header: "Content-Security-Policy", description: "CSP mitigates XSS attacks" },
  { header: "X-Frame-Options", description: "prevents clickjacking" },
  { header: "X-Content-Type-Options", description: "prevents MIME sniffing" },
  { header: "Referrer-Policy", description: "controls referrer information leakage" },
];

export const OPEN_GRAPH_TAGS: ReadonlyArray<{ tag: string; description: string }> = [
  { tag: "og:title", description: "title for social sharing" },
  { tag: "og:description", description: "description for social sharing" },
  { tag: "og:image", description: "image displayed when shared" },
  { tag: "og:url", description: "canonical URL" },
  { tag: "og:type", description: "content type (website, article, ...)" },
];

export const RECOGNIZED_SCHEMA_TYPES = new Set([
  "Organization",
  "Corporation",
  "LocalBusiness",
  "Person",
  "WebSite",
  "WebPage",
  "AboutPage",
  "ContactPage",
  "Article",
  "NewsArticle",
  "BlogPosting",
  "BreadcrumbList",
  "Product",
  "Offer",
  "Review",
  "AggregateRating",
  "FAQPage",
  "HowTo",
  "Event",
  "Recipe",
  "VideoObject",
  "ImageObject",
  "SoftwareApplication",
  "Service",
  "Course",
  "JobPosting",
  "ItemList",
]);

const MODERN_IMAGE_FORMAT = /\.(webp|avif)(\?|#|$)/i;
const LARGE_FIXED_WIDTH = /(?:^|[^-\w])width\s*:\s*\d{4,}px/i;

function createResult(
  key: CategoryKey,
  score: number,
  findings: string[],
  recommendations: string[]
): CategoryResult {
  return {
    key,
    name: CATEGORY_NAMES[key],
    score: clampScore(score),
    findings,
    recommendations,
  };
}

function matchesWord(text: string, word: string): boolean {
  return new RegExp(`\\b${word}\\b`, "i").test(text);
}

export function scoreTitle(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const title = doc.title;
  if (!title) {
    return createResult("title", 0, ["No title tag found"], ["Add a <title> tag to your <head> section"]);
  }

  const length = [...title].length;
  findings.push(`Title found: "${title}"`);
  findings.push(`Title length: ${length} characters`);

  let score: number;
  if (length >= 50 && length <= 60) {
    score = MAX_SCORE;
    findings.push("Title length is optimal for search engines");
  } else if ((length >= 30 && length < 50) || (length > 60 && length <= 70)) {
    score = 80;
    findings.push("Title length is acceptable but could be improved");
    recommendations.push("Aim for 50-60 characters for optimal display");
  } else if (length < 30) {
    score = 50;
    findings.push("Title is too short");
    recommendations.push("Expand your title to 50-60 characters");
  } else {
    score = 60;
    findings.push("Title is too long and may be truncated in search results");
    recommendations.push("Shorten your title to 50-60 characters");
  }

  if (GENERIC_TITLE_WORDS.some((word) => matchesWord(title, word))) {
    score -= 30;
    findings.push("Title appears to be generic");
    recommendations.push("Use a descriptive, unique title that describes your page content");
  }

  return createResult("title", score, findings, recommendations);
}

export function scoreMetaDescription(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const content = doc.meta.get("description");
  if (content === undefined) {
    return createResult(
      "meta_description",
      0,
      ["No meta description found"],
      ['Add a meta description: <meta name="description" content="...">']
    );
  }

  const length = [...content].length;
  findings.push("Meta description found");
  findings.push(`Description length: ${length} characters`);

  if (!content) {
    findings.push("Meta description is empty");
    recommendations.push("Add meaningful content to your meta description");
    return createResult("meta_description", 10, findings, recommendations);
  }

  let score: number;
  if (length >= 150 && length <= 160) {
    score = MAX_SCORE;
    findings.push("Description length is optimal");
  } else if ((length >= 120 && length < 150) || (length > 160 && length <= 170)) {
    score = 85;
    findings.push("Description length is good");
    recommendations.push("Aim for 150-160 characters for optimal display");
  } else if (length < 120) {
    score = 60;
    findings.push("Description is too short");
    recommendations.push("Expand your description to 150-160 characters");
  } else {
    score = 70;
    findings.push("Description is too long and may be truncated");
    recommendations.push("Shorten your description to 150-160 characters");
  }

  const lower = content.toLowerCase();
  if (GENERIC_DESCRIPTION_PHRASES.some((phrase) => lower.includes(phrase))) {
    score -= 20;
    findings.push("Description appears to be generic");
    recommendations.push("Write a compelling, unique description that entices clicks");
  }

  return createResult("meta_description", score, findings, recommendations);
}

export function scoreHeadings(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const count = (level: number) => doc.headings.filter((h) => h.level === level).length;
  const h1s = doc.headings.filter((h) => h.level === 1);
  const h2Count = count(2);
  const h3Count = count(3);

  findings.push(`Found ${h1s.length} H1, ${h2Count} H2, ${h3Count} H3 tags`);

  if (doc.headings.length === 0) {
    findings.push("No heading tags found at all");
    recommendations.push("Structure your content with proper heading tags (H1-H6)");
    return createResult("headings", 0, findings, recommendations);
  }

  let score = MAX_SCORE;

  if (h1s.length === 0) {
    score -= 40;
    findings.push("No H1 tag found - every page needs one main heading");
    recommendations.push("Add an H1 tag that describes your main content");
  } else if (h1s.length > 1) {
    score -= 20;
    findings.push(`Multiple H1 tags found (${h1s.length}). Use only one H1 per page.`);
    recommendations.push("Consolidate to a single H1 tag");
  } else if (!h1s[0].text) {
    score -= 15;
    findings.push("H1 tag is empty");
    recommendations.push("Add text content to your H1 tag");
  } else {
    const text = h1s[0].text;
    findings.push(`H1 content: "${text.length > 50 ? `${text.slice(0, 50)}...` : text}"`);
  }

  if (h2Count === 0 && h3Count === 0) {
    score -= 10;
    findings.push("No H2 or H3 subheadings found");
    recommendations.push("Break your content into sections with H2 and H3 subheadings");
  }

  // The walk starts above H1, so a page opening on H2 or lower counts as a skip.
  const skipped: string[] = [];
  let prev = 0;
  for (const { level } of doc.headings) {
    if (level > prev + 1) {
      skipped.push(`${prev === 0 ? "page start" : `H${prev}`} -> H${level}`);
    }
    prev = level;
  }

  if (skipped.length > 0) {
    score -= 10;
    findings.push(`Skipped heading levels detected: ${skipped.slice(0, 3).join(", ")}`);
    recommendations.push("Maintain proper heading hierarchy (don't skip from H1 to H3)");
  }

  return createResult("headings", score, findings, recommendations);
}

export function scoreImages(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const total = doc.images.length;
  findings.push(`Found ${total} image(s)`);

  if (total === 0) {
    findings.push("No images on page, nothing to check");
    return createResult("images", MAX_SCORE, findings, recommendations);
  }

  const missingAlt = doc.images.filter((img) => img.alt === null).length;
  const emptyAlt = doc.images.filter((img) => img.alt !== null && !img.alt.trim()).length;
  const withAlt = total - missingAlt - emptyAlt;

  findings.push(`Images with alt text: ${withAlt}/${total}`);
  if (missingAlt > 0) findings.push(`Missing alt attributes: ${missingAlt}`);
  if (emptyAlt > 0) findings.push(`Empty alt attributes: ${emptyAlt}`);

  let score = Math.floor((withAlt / total) * 100);

  if (missingAlt > 0) {
    score -= 10;
    recommendations.push(`Add alt attributes to ${missingAlt} image(s)`);
  }
  if (emptyAlt > 0) {
    score -= 5;
    recommendations.push(`Add descriptive alt text to ${emptyAlt} image(s)`);
  }

  const lazyLoaded = doc.images.filter((img) => img.loading === "lazy").length;
  if (total > 5 && lazyLoaded < total * 0.5) {
    score -= 5;
    findings.push(`Only ${lazyLoaded}/${total} images are lazy-loaded`);
    recommendations.push('Add loading="lazy" to images below the fold');
  }

  const modern = doc.images.filter((img) => MODERN_IMAGE_FORMAT.test(img.src)).length;
  if (total > 3 && modern === 0) {
    score -= 5;
    findings.push("No images use modern formats (WebP/AVIF)");
    recommendations.push("Serve images as WebP or AVIF for better compression");
  }

  return createResult("images", score, findings, recommendations);
}

export function scoreMobile(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];
  let score = MAX_SCORE;

  const viewport = doc.viewport;
  if (viewport === null) {
    score -= 40;
    findings.push("No viewport meta tag found");
    recommendations.push('Add: <meta name="viewport" content="width=device-width, initial-scale=1">');
  } else {
    findings.push(`Viewport found: ${viewport}`);
    const normalized = viewport.toLowerCase().replace(/\s+/g, "");

    if (!normalized.includes("width=device-width")) {
      score -= 20;
      findings.push("Viewport missing 'width=device-width'");
      recommendations.push("Add width=device-width to viewport content");
    }
    if (/user-scalable=(no|0)/.test(normalized) || /maximum-scale=1(\.0*)?(,|$)/.test(normalized)) {
      score -= 10;
      findings.push("Viewport prevents users from zooming");
      recommendations.push("Remove user-scalable=no and maximum-scale=1 so users can zoom");
    }
  }

  const mediaQueries = doc.inlineStyles.reduce((sum, css) => sum + (css.match(/@media\b/gi) ?? []).length, 0);
  if (mediaQueries > 0) {
    findings.push(`Found ${mediaQueries} media query reference(s)`);
  }

  if (doc.inlineStyles.some((css) => LARGE_FIXED_WIDTH.test(css))) {
    score -= 15;
    findings.push("Fixed widths >1000px detected - may cause horizontal scrolling on mobile");
    recommendations.push("Use relative units (%, vw, rem) instead of large fixed pixel widths");
  }

  return createResult("mobile", score, findings, recommendations);
}

export function scoreSslSecurity(_doc: DocumentModel, response: ResponseMetadata): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];
  let score = MAX_SCORE;

  if (!isHttps(response.finalUrl)) {
    score -= 50;
    findings.push("Site is not using HTTPS");
    recommendations.push("Enable HTTPS - certificates are free and it is essential for security");
  } else {
    findings.push("HTTPS is enabled");
  }

  const missing = SECURITY_HEADERS.filter(({ header }) => !(header.toLowerCase() in response.headers));
  const found = SECURITY_HEADERS.length - missing.length;

  findings.push(`Security headers found: ${found}/${SECURITY_HEADERS.length}`);

  if (missing.length > 0) {
    score -= Math.min(30, missing.length * 6);
    findings.push(`Missing headers: ${missing.map(({ header }) => header).join(", ")}`);
    for (const { header, description } of missing.slice(0, 3)) {
      recommendations.push(`Add ${header} header: ${description}`);
    }
  }

  return createResult("ssl_security", score, findings, recommendations);
}

export function scorePerformance(doc: DocumentModel, response: ResponseMetadata): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];
  let score = MAX_SCORE;

  const sizeKb = response.bodyBytes / 1024;
  findings.push(`Page size: ${sizeKb.toFixed(1)} KB`);

  if (sizeKb > 2000) {
    score -= 30;
    findings.push("Page is very large (>2MB)");
    recommendations.push("Optimize images and minify CSS/JS to reduce page size");
  } else if (sizeKb > 1000) {
    score -= 15;
    findings.push("Page is quite large (>1MB)");
    recommendations.push("Consider compressing images and lazy loading");
  } else if (sizeKb > 500) {
    score -= 5;
    findings.push("Page is moderately large");
  }

  const cssFiles = doc.stylesheets.length;
  const jsFiles = doc.scripts.filter((s) => s.src).length;
  const imageCount = doc.images.length;

  findings.push(`External resources: ${cssFiles} CSS, ${jsFiles} JS, ${imageCount} images`);

  const totalExternal = cssFiles + jsFiles;
  if (totalExternal > 20) {
    score -= 15;
    findings.push(`Excessive external resources (${totalExternal})`);
    recommendations.push("Combine and minify CSS/JS files to reduce HTTP requests");
  } else if (totalExternal > 10) {
    score -= 5;
    findings.push("Many external resources");
    recommendations.push("Consider combining some CSS/JS files");
  }

  const blockingCss = doc.stylesheets.filter((s) => s.media !== "print").length;
  const blockingJs = doc.scripts.filter((s) => s.src && !s.async && !s.defer && s.type !== "module").length;
  const blocking = blockingCss + blockingJs;
  if (blocking > 5) {
    score -= 5;
    findings.push(`${blocking} render-blocking resources`);
    recommendations.push("Load non-critical CSS asynchronously and add defer to scripts");
  }

  if (imageCount > 50) {
    score -= 5;
    findings.push(`Heavy image usage (${imageCount} images)`);
    recommendations.push("Reduce the number of images or lazy-load them");
  }

  return createResult("performance", score, findings, recommendations);
}

export function scoreLinks(doc: DocumentModel, response: ResponseMetadata): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const total = doc.links.length;
  findings.push(`Found ${total} link(s)`);

  if (total === 0) {
    findings.push("No links found on page");
    recommendations.push("Add navigation links to help users explore your site");
    return createResult("links", 10, findings, recommendations);
  }

  let internal = 0;
  const externalLinks: PageLink[] = [];
  for (const link of doc.links) {
    const kind = classifyLink(link.href, response.finalUrl);
    if (kind === "internal") internal++;
    else if (kind === "external") externalLinks.push(link);
  }

  findings.push(`Internal links: ${internal}`);
  findings.push(`External links: ${externalLinks.length}`);

  let score = MAX_SCORE;

  if (total < 3) {
    score -= 30;
    findings.push("Very few links on page");
    recommendations.push("Add more navigation links to improve site structure");
  }

  if (externalLinks.length > 0) {
    const qualified = externalLinks.filter((l) => l.rel.includes("nofollow") || l.rel.includes("sponsored")).length;
    findings.push(`External links marked nofollow/sponsored: ${qualified}`);

    // noreferrer implies noopener
    const withoutNoopener = externalLinks.filter(
      (l) => !l.rel.includes("noopener") && !l.rel.includes("noreferrer")
    ).length;
    if (withoutNoopener > 0) {
      score -= 10;
      findings.push(`${withoutNoopener} external link(s) missing rel="noopener noreferrer"`);
      recommendations.push('Add rel="noopener noreferrer" to external links');
    }
  }

  return createResult("links", score, findings, recommendations);
}

export function scoreOpenGraph(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const missing = OPEN_GRAPH_TAGS.filter(({ tag }) => !doc.meta.get(tag));
  const present = OPEN_GRAPH_TAGS.length - missing.length;

  findings.push(`Open Graph tags found: ${present}/${OPEN_GRAPH_TAGS.length}`);
  if (missing.length > 0) {
    findings.push(`Missing: ${missing.map(({ tag }) => tag).join(", ")}`);
  }

  for (const { tag, description } of missing.slice(0, 3)) {
    recommendations.push(`Add ${tag}: ${description}`);
  }

  if (doc.meta.has("twitter:card")) {
    findings.push("Twitter Card tags also present");
  } else {
    recommendations.push("Consider adding Twitter Card meta tags for better X/Twitter sharing");
  }

  return createResult("open_graph", (present / OPEN_GRAPH_TAGS.length) * 100, findings, recommendations);
}

export function scoreSchema(doc: DocumentModel): CategoryResult {
  const findings: string[] = [];
  const recommendations: string[] = [];

  const valid = doc.jsonLd.filter((block) => block.valid);
  const invalid = doc.jsonLd.length - valid.length;

  findings.push(`Found ${valid.length} valid JSON-LD block(s)`);
  if (invalid > 0) {
    findings.push(`${invalid} JSON-LD block(s) could not be parsed`);
    recommendations.push("Fix the JSON syntax of your structured data blocks");
  }

  if (valid.length === 0) {
    findings.push("No structured data found");
    recommendations.push("Add JSON-LD structured data for better search visibility");
    recommendations.push("Consider Organization, WebSite, or Article schema types");
    return createResult("schema", 0, findings, recommendations);
  }

  let score = Math.min(MAX_SCORE, 40 + valid.length * 20);

  const types = Array.from(new Set(valid.flatMap((block) => block.types)));
  if (types.length > 0) {
    findings.push(`Schema types found: ${types.slice(0, 5).join(", ")}`);
  }

  if (!types.some((type) => RECOGNIZED_SCHEMA_TYPES.has(type.replace(/^(https?:\/\/)?schema\.org\//, "")))) {
    score -= 20;
    findings.push("No recognized schema.org @type found");
    recommendations.push("Declare a standard @type such as Organization, WebSite, or Article");
  }

  if (doc.microdataCount > 0) {
    findings.push(`Also found ${doc.microdataCount} microdata element(s)`);
  }

  if (valid.length < 2) {
    recommendations.push("Consider adding more structured data types (BreadcrumbList, Article, etc.)");
  }

  return createResult("schema", score, findings, recommendations);
}

export const EVALUATORS: Record<CategoryKey, Evaluator> = {
  title: scoreTitle,
  meta_description: scoreMetaDescription,
  headings: scoreHeadings,
  images: scoreImages,
  mobile: scoreMobile,
  ssl_security: scoreSslSecurity,
  performance: scorePerformance,
  links: scoreLinks,
  open_graph: scoreOpenGraph,
  schema: scoreSchema,
};

/**
 * Runs every evaluator in category order. A throwing evaluator yields a zero
 * score for its category instead of aborting the audit.
 */
export function evaluateAll(
  doc: DocumentModel,
  response: ResponseMetadata,
  evaluators: Record<CategoryKey, Evaluator> = EVALUATORS
): CategoryResult[] {
  return CATEGORY_KEYS.map((key) => {
    try {
      return evaluators[key](doc, response);
    } catch (error) {
      const message = getErrorMessage(error);
      logger.warn("Scorer", `${CATEGORY_NAMES[key]} evaluator failed`, error);
      return createResult(key, 0, [`Could not evaluate ${CATEGORY_NAMES[key]}: ${message}`], []);
    }
  });
}
