import { describe, it, expect, vi, afterEach } from "vitest";
import { CATEGORY_KEYS } from "../../shared/audit-types";
import {
  EVALUATORS,
  evaluateAll,
  scoreHeadings,
  scoreImages,
  scoreLinks,
  scoreMetaDescription,
  scoreMobile,
  scoreOpenGraph,
  scorePerformance,
  scoreSchema,
  scoreSslSecurity,
  scoreTitle,
} from "./scorer";
import { parseDocument } from "./document";
import type { PageImage, PageScript, PageStylesheet } from "./types";
import { ALL_SECURITY_HEADERS, makeDoc, makeResponse, textOfLength } from "./test-utils";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("scoreTitle", () => {
  it("scores a missing title as zero", () => {
    const result = scoreTitle(makeDoc());
    expect(result.score).toBe(0);
    expect(result.findings).toEqual(["No title tag found"]);
  });

  it.each([
    [55, 100],
    [50, 100],
    [60, 100],
    [40, 80],
    [65, 80],
    [20, 50],
    [80, 60],
  ])("scores a %i character title as %i", (length, expected) => {
    expect(scoreTitle(makeDoc({ title: textOfLength(length) })).score).toBe(expected);
  });

  it("counts characters rather than UTF-16 units", () => {
    const result = scoreTitle(makeDoc({ title: `${textOfLength(59)}🔥` }));
    expect(result.score).toBe(100);
    expect(result.findings[1]).toBe("Title length: 60 characters");
  });

  it("penalises generic titles by whole word only", () => {
    expect(scoreTitle(makeDoc({ title: "Home" }))).toMatchObject({
      score: 20,
      findings: ['Title found: "Home"', "Title length: 4 characters", "Title is too short", "Title appears to be generic"],
    });
    expect(scoreTitle(makeDoc({ title: "Homemade pottery" })).score).toBe(50);
  });
});

describe("scoreMetaDescription", () => {
  it("distinguishes a missing description from an empty one", () => {
    expect(scoreMetaDescription(makeDoc())).toMatchObject({ score: 0, findings: ["No meta description found"] });
    expect(scoreMetaDescription(makeDoc({ meta: new Map([["description", ""]]) }))).toMatchObject({
      score: 10,
      findings: ["Meta description found", "Description length: 0 characters", "Meta description is empty"],
    });
  });

  it.each([
    [155, 100],
    [130, 85],
    [165, 85],
    [100, 60],
    [200, 70],
  ])("scores a %i character description as %i", (length, expected) => {
    const doc = makeDoc({ meta: new Map([["description", textOfLength(length)]]) });
    expect(scoreMetaDescription(doc).score).toBe(expected);
  });

  it("measures descriptions in characters", () => {
    const doc = makeDoc({ meta: new Map([["description", `${textOfLength(159)}🔥`]]) });
    const result = scoreMetaDescription(doc);
    expect(result.score).toBe(100);
    expect(result.findings[1]).toBe("Description length: 160 characters");
  });

  it("penalises boilerplate phrasing", () => {
    const doc = makeDoc({ meta: new Map([["description", "Welcome to our shop"]]) });
    const result = scoreMetaDescription(doc);
    expect(result.score).toBe(40);
    expect(result.findings).toContain("Description appears to be generic");
  });
});

describe("scoreHeadings", () => {
  it("scores a page without headings as zero", () => {
    expect(scoreHeadings(makeDoc())).toMatchObject({
      score: 0,
      findings: ["Found 0 H1, 0 H2, 0 H3 tags", "No heading tags found at all"],
    });
  });

  it("gives a clean outline full marks", () => {
    const doc = makeDoc({
      headings: [
        { level: 1, text: "Studio" },
        { level: 2, text: "Bowls" },
        { level: 3, text: "Glazes" },
      ],
    });
    expect(scoreHeadings(doc)).toMatchObject({
      score: 100,
      findings: ["Found 1 H1, 1 H2, 1 H3 tags", 'H1 content: "Studio"'],
      recommendations: [],
    });
  });

  it("penalises a missing H1 and skipped levels", () => {
    const doc = makeDoc({
      headings: [
        { level: 2, text: "Bowls" },
        { level: 4, text: "Sizes" },
      ],
    });
    const result = scoreHeadings(doc);
    expect(result.score).toBe(50);
    expect(result.findings).toContain("Skipped heading levels detected: page start -> H2, H2 -> H4");
  });

  it("flags a page that opens on a lower level before its H1", () => {
    const result = scoreHeadings(parseDocument("<h3>Intro</h3><h1>Main</h1><h2>Section</h2>"));
    expect(result).toMatchObject({
      score: 90,
      findings: [
        "Found 1 H1, 1 H2, 1 H3 tags",
        'H1 content: "Main"',
        "Skipped heading levels detected: page start -> H3",
      ],
    });

    const noH1 = scoreHeadings(parseDocument("<h3>a</h3><h2>b</h2>"));
    expect(noH1.score).toBe(50);
  });

  it("penalises several H1s and a flat outline", () => {
    const doc = makeDoc({
      headings: [
        { level: 1, text: "A" },
        { level: 1, text: "B" },
      ],
    });
    const result = scoreHeadings(doc);
    expect(result.score).toBe(70);
    expect(result.findings).toContain("Multiple H1 tags found (2). Use only one H1 per page.");
  });

  it("penalises an empty H1", () => {
    expect(scoreHeadings(makeDoc({ headings: [{ level: 1, text: "" }] })).score).toBe(75);
  });

  it("truncates long H1 text and lists at most three skips", () => {
    const long = textOfLength(60);
    const doc = makeDoc({
      headings: [
        { level: 1, text: long },
        { level: 3, text: "a" },
        { level: 6, text: "b" },
        { level: 2, text: "c" },
        { level: 5, text: "d" },
        { level: 1, text: "e" },
        { level: 4, text: "f" },
      ],
    });
    const result = scoreHeadings(doc);
    expect(result.findings).toContain("Skipped heading levels detected: H1 -> H3, H3 -> H6, H2 -> H5");
    expect(result.findings).not.toContain(`H1 content: "${long.slice(0, 50)}..."`);

    const single = scoreHeadings(makeDoc({ headings: [{ level: 1, text: long }, { level: 2, text: "x" }] }));
    expect(single.findings).toContain(`H1 content: "${long.slice(0, 50)}..."`);
    expect(single.score).toBe(100);
  });
});

describe("scoreImages", () => {
  const image = (src: string, alt: string | null, loading: string | null = null): PageImage => ({ src, alt, loading });

  it("treats a page without images as nothing to fix", () => {
    expect(scoreImages(makeDoc())).toMatchObject({
      score: 100,
      findings: ["Found 0 image(s)", "No images on page, nothing to check"],
    });
  });

  it("scores by alt coverage and penalises missing attributes", () => {
    const result = scoreImages(makeDoc({ images: [image("/bowl.webp", "Bowl"), image("/mug.webp", null)] }));
    expect(result).toMatchObject({
      score: 40,
      findings: ["Found 2 image(s)", "Images with alt text: 1/2", "Missing alt attributes: 1"],
    });
  });

  it("counts blank alt text separately", () => {
    const images = [image("/a.webp", "a"), image("/b.webp", "b"), image("/c.webp", "c"), image("/d.webp", "  ")];
    const result = scoreImages(makeDoc({ images }));
    expect(result.score).toBe(70);
    expect(result.findings).toContain("Empty alt attributes: 1");
  });

  it("penalises eager loading and legacy formats on image-heavy pages", () => {
    const images = Array.from({ length: 6 }, (_, i) => image(`/photo-${i}.jpg`, `Photo ${i}`));
    const result = scoreImages(makeDoc({ images }));
    expect(result.score).toBe(90);
    expect(result.findings).toEqual([
      "Found 6 image(s)",
      "Images with alt text: 6/6",
      "Only 0/6 images are lazy-loaded",
      "No images use modern formats (WebP/AVIF)",
    ]);
  });

  it("accepts modern formats behind a query string", () => {
    const images = Array.from({ length: 6 }, (_, i) => image(`/photo-${i}.avif?w=400`, `Photo ${i}`, "lazy"));
    expect(scoreImages(makeDoc({ images })).score).toBe(100);
  });
});

describe("scoreMobile", () => {
  it("penalises a missing viewport", () => {
    expect(scoreMobile(makeDoc())).toMatchObject({ score: 60, findings: ["No viewport meta tag found"] });
  });

  it("gives a responsive viewport full marks", () => {
    expect(scoreMobile(makeDoc({ viewport: "width=device-width, initial-scale=1" }))).toMatchObject({
      score: 100,
      findings: ["Viewport found: width=device-width, initial-scale=1"],
    });
  });

  it("penalises viewports that block zooming or omit device width", () => {
    expect(scoreMobile(makeDoc({ viewport: "width=device-width, maximum-scale=1, user-scalable=no" })).score).toBe(90);
    expect(scoreMobile(makeDoc({ viewport: "width=device-width, maximum-scale=1.5" })).score).toBe(100);
    expect(scoreMobile(makeDoc({ viewport: "initial-scale=1" })).score).toBe(80);
  });

  it("reports media queries and large fixed widths in inline CSS", () => {
    const result = scoreMobile(
      makeDoc({ inlineStyles: ["@media print { a { color: red } } @media (min-width: 40em) {}", ".wrap { width: 1400px }"] })
    );
    expect(result.score).toBe(45);
    expect(result.findings).toEqual([
      "No viewport meta tag found",
      "Found 2 media query reference(s)",
      "Fixed widths >1000px detected - may cause horizontal scrolling on mobile",
    ]);
  });

  it("ignores max-width declarations", () => {
    const doc = makeDoc({ viewport: "width=device-width", inlineStyles: [".wrap { max-width: 1400px }"] });
    expect(scoreMobile(doc).score).toBe(100);
  });
});

describe("scoreSslSecurity", () => {
  it("gives HTTPS with every header full marks", () => {
    expect(scoreSslSecurity(makeDoc(), makeResponse({ headers: ALL_SECURITY_HEADERS }))).toMatchObject({
      score: 100,
      findings: ["HTTPS is enabled", "Security headers found: 5/5"],
      recommendations: [],
    });
  });

  it("penalises plain HTTP and missing headers", () => {
    const result = scoreSslSecurity(makeDoc(), makeResponse({ finalUrl: "http://www.example.com/" }));
    expect(result.score).toBe(20);
    expect(result.findings).toEqual([
      "Site is not using HTTPS",
      "Security headers found: 0/5",
      "Missing headers: Strict-Transport-Security, Content-Security-Policy, X-Frame-Options, X-Content-Type-Options, Referrer-Policy",
    ]);
    expect(result.recommendations).toHaveLength(4);
  });

  it("charges six points per missing header", () => {
    const headers = {
      "strict-transport-security": "max-age=60",
      "x-frame-options": "SAMEORIGIN",
      "referrer-policy": "same-origin",
    };
    expect(scoreSslSecurity(makeDoc(), makeResponse({ headers })).score).toBe(88);
  });

  it("judges the final URL after redirects", () => {
    const response = makeResponse({
      requestedUrl: "http://www.example.com/",
      finalUrl: "https://www.example.com/",
      redirectCount: 1,
      headers: ALL_SECURITY_HEADERS,
    });
    expect(scoreSslSecurity(makeDoc(), response).score).toBe(100);
  });
});

describe("scorePerformance", () => {
  const stylesheet = (media: string | null = null): PageStylesheet => ({ href: "/s.css", media });
  const script = (overrides: Partial<PageScript> = {}): PageScript => ({
    src: "/s.js",
    type: null,
    async: false,
    defer: false,
    ...overrides,
  });

  it("gives a small page full marks", () => {
    expect(scorePerformance(makeDoc(), makeResponse({ bodyBytes: 10240 }))).toMatchObject({
      score: 100,
      findings: ["Page size: 10.0 KB", "External resources: 0 CSS, 0 JS, 0 images"],
    });
  });

  it.each([
    [600, 95],
    [1500, 85],
    [3000, 70],
  ])("penalises a %i KB page down to %i", (kb, expected) => {
    expect(scorePerformance(makeDoc(), makeResponse({ bodyBytes: kb * 1024 })).score).toBe(expected);
  });

  it("penalises many render-blocking resources", () => {
    const doc = makeDoc({
      stylesheets: Array.from({ length: 8 }, () => stylesheet()),
      scripts: Array.from({ length: 4 }, () => script()),
    });
    const result = scorePerformance(doc, makeResponse());
    expect(result.score).toBe(90);
    expect(result.findings).toContain("12 render-blocking resources");
  });

  it("does not count deferred scripts, modules, inline scripts or print CSS as blocking", () => {
    const doc = makeDoc({
      stylesheets: Array.from({ length: 3 }, () => stylesheet("print")),
      scripts: [
        script({ defer: true }),
        script({ async: true }),
        script({ type: "module" }),
        script({ src: null }),
        script({ defer: true }),
        script({ defer: true }),
        script({ defer: true }),
      ],
    });
    const result = scorePerformance(doc, makeResponse());
    expect(result.score).toBe(100);
    expect(result.findings).toContain("External resources: 3 CSS, 6 JS, 0 images");
  });

  it("penalises image-heavy pages", () => {
    const images = Array.from({ length: 51 }, (_, i): PageImage => ({ src: `/${i}.webp`, alt: "x", loading: "lazy" }));
    expect(scorePerformance(makeDoc({ images }), makeResponse()).score).toBe(95);
  });
});

describe("scoreLinks", () => {
  it("scores a page without links as ten", () => {
    expect(scoreLinks(makeDoc(), makeResponse())).toMatchObject({
      score: 10,
      findings: ["Found 0 link(s)", "No links found on page"],
    });
  });

  it("classifies links against the final URL", () => {
    const doc = makeDoc({
      links: [
        { href: "/a", text: "A", rel: [] },
        { href: "/b", text: "B", rel: [] },
        { href: "https://blog.example.com/", text: "Blog", rel: [] },
        { href: "https://other.org/", text: "Other", rel: [] },
        { href: "https://ads.net/", text: "Ad", rel: ["sponsored", "noopener"] },
        { href: "#top", text: "Top", rel: [] },
      ],
    });
    const result = scoreLinks(doc, makeResponse());
    expect(result.score).toBe(90);
    expect(result.findings).toEqual([
      "Found 6 link(s)",
      "Internal links: 3",
      "External links: 2",
      "External links marked nofollow/sponsored: 1",
      '1 external link(s) missing rel="noopener noreferrer"',
    ]);
  });

  it("accepts noreferrer in place of noopener", () => {
    const doc = makeDoc({
      links: [
        { href: "/a", text: "A", rel: [] },
        { href: "/b", text: "B", rel: [] },
        { href: "https://other.org/", text: "Other", rel: ["noreferrer"] },
      ],
    });
    const result = scoreLinks(doc, makeResponse());
    expect(result.score).toBe(100);
    expect(result.findings).toEqual([
      "Found 3 link(s)",
      "Internal links: 2",
      "External links: 1",
      "External links marked nofollow/sponsored: 0",
    ]);
  });

  it("penalises pages with very few links", () => {
    const doc = makeDoc({
      links: [
        { href: "/a", text: "A", rel: [] },
        { href: "/b", text: "B", rel: [] },
      ],
    });
    expect(scoreLinks(doc, makeResponse())).toMatchObject({
      score: 70,
      findings: ["Found 2 link(s)", "Internal links: 2", "External links: 0", "Very few links on page"],
    });
  });
});

describe("scoreOpenGraph", () => {
  it("scores by the share of core tags present", () => {
    const meta = new Map([
      ["og:title", "Studio"],
      ["og:image", "https://www.example.com/og.png"],
    ]);
    expect(scoreOpenGraph(makeDoc({ meta }))).toMatchObject({
      score: 40,
      findings: ["Open Graph tags found: 2/5", "Missing: og:description, og:url, og:type"],
    });
  });

  it("finds tags that carry both name and property", () => {
    const doc = parseDocument(`<head>
      <meta name="title" property="og:title" content="Studio">
      <meta name="description" property="og:description" content="Handmade stoneware">
      <meta property="og:image" content="https://www.example.com/og.png">
      <meta property="og:url" content="https://www.example.com/">
      <meta property="og:type" content="website">
    </head>`);
    expect(scoreOpenGraph(doc).score).toBe(100);
  });

  it("gives a complete set full marks and notes Twitter cards", () => {
    const meta = new Map([
      ["og:title", "t"],
      ["og:description", "d"],
      ["og:image", "i"],
      ["og:url", "u"],
      ["og:type", "website"],
      ["twitter:card", "summary"],
    ]);
    expect(scoreOpenGraph(makeDoc({ meta }))).toMatchObject({
      score: 100,
      findings: ["Open Graph tags found: 5/5", "Twitter Card tags also present"],
      recommendations: [],
    });
  });

  it("scores a page without tags as zero", () => {
    expect(scoreOpenGraph(makeDoc()).score).toBe(0);
  });
});

describe("scoreSchema", () => {
  it("scores a page without structured data as zero", () => {
    expect(scoreSchema(makeDoc())).toMatchObject({
      score: 0,
      findings: ["Found 0 valid JSON-LD block(s)", "No structured data found"],
    });
  });

  it("adds twenty points per valid block up to 100", () => {
    const block = { valid: true, types: ["Organization"] };
    expect(scoreSchema(makeDoc({ jsonLd: [block] }))).toMatchObject({
      score: 60,
      findings: ["Found 1 valid JSON-LD block(s)", "Schema types found: Organization"],
    });
    expect(scoreSchema(makeDoc({ jsonLd: [block, block, block, block] })).score).toBe(100);
  });

  it("recognises full schema.org type URLs", () => {
    const doc = makeDoc({ jsonLd: [{ valid: true, types: ["https://schema.org/Product"] }] });
    expect(scoreSchema(doc).score).toBe(60);
  });

  it("penalises unknown types and reports unparseable blocks", () => {
    const doc = makeDoc({
      jsonLd: [
        { valid: true, types: ["CustomThing"] },
        { valid: false, types: [] },
      ],
    });
    expect(scoreSchema(doc)).toMatchObject({
      score: 40,
      findings: [
        "Found 1 valid JSON-LD block(s)",
        "1 JSON-LD block(s) could not be parsed",
        "Schema types found: CustomThing",
        "No recognized schema.org @type found",
      ],
    });
  });

  it("mentions microdata alongside JSON-LD", () => {
    const doc = makeDoc({ jsonLd: [{ valid: true, types: ["WebSite"] }], microdataCount: 2 });
    expect(scoreSchema(doc).findings).toContain("Also found 2 microdata element(s)");
  });
});

describe("evaluateAll", () => {
  it("returns one result per category in fixed order", () => {
    const results = evaluateAll(makeDoc(), makeResponse());
    expect(results.map((r) => r.key)).toEqual([...CATEGORY_KEYS]);
    for (const result of results) {
      expect(Number.isInteger(result.score)).toBe(true);
      expect(result.score).toBeGreaterThanOrEqual(0);
      expect(result.score).toBeLessThanOrEqual(100);
    }
  });

  it("scores an empty plain-HTTP page deterministically", () => {
    const response = makeResponse({ finalUrl: "http://www.example.com/" });
    const scores = evaluateAll(makeDoc(), response).map((r) => r.score);
    expect(scores).toEqual([0, 0, 0, 100, 60, 20, 100, 10, 0, 0]);
    expect(evaluateAll(makeDoc(), response)).toEqual(evaluateAll(makeDoc(), response));
  });

  it("isolates a failing evaluator", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const evaluators = {
      ...EVALUATORS,
      images: () => {
        throw new Error("boom");
      },
    };
    const results = evaluateAll(makeDoc(), makeResponse(), evaluators);
    expect(results).toHaveLength(10);
    expect(results[3]).toEqual({
      key: "images",
      name: "Images",
      score: 0,
      findings: ["Could not evaluate Images: boom"],
      recommendations: [],
    });
    expect(results[4].key).toBe("mobile");
    expect(console.error).toHaveBeenCalledWith("[Scorer] Images evaluator failed", expect.any(Error));
  });
});
