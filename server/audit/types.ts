import { z } from "zod";
import type { CategoryKey, Grade } from "../../shared/audit-types";

export const DEFAULT_USER_AGENT = "site-roast/1.0 (Website Auditor)";

export const AuditConfigSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "URL must use http or https"),
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  verbose: z.boolean().default(false),
  roast: z.boolean().default(true),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;

export interface ResponseMetadata {
  requestedUrl: string;
  finalUrl: string;
  status: number;
  // Header names are lower-case.
  headers: Record<string, string>;
  elapsedMs: number;
  bodyBytes: number;
  redirectCount: number;
}

export interface AuditTarget {
  url: string;
  response: ResponseMetadata;
  html: string;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface PageHeading {
  level: HeadingLevel;
  text: string;
}

export interface PageLink {
  href: string;
  text: string;
  rel: string[];
}

export interface PageImage {
  src: string;
  /** `null` when the attribute is missing, as opposed to present but blank. */
  alt: string | null;
  loading: string | null;
}

export interface PageScript {
  src: string | null;
  type: string | null;
  async: boolean;
  defer: boolean;
}

export interface JsonLdBlock {
  valid: boolean;
  types: string[];
}

export interface PageStylesheet {
  href: string | null;
  media: string | null;
}

/**
 * Read-only view over a parsed HTML page. Evaluators only see this interface,
 * so the parser behind it can be swapped.
 */
export interface DocumentModel {
  readonly title: string;
  readonly meta: ReadonlyMap<string, string>;
  readonly headings: readonly PageHeading[];
  readonly links: readonly PageLink[];
  readonly images: readonly PageImage[];
  readonly scripts: readonly PageScript[];
  readonly jsonLd: readonly JsonLdBlock[];
  readonly stylesheets: readonly PageStylesheet[];
  readonly inlineStyles: readonly string[];
  readonly viewport: string | null;
  readonly microdataCount: number;
}

export interface CategoryResult {
  key: CategoryKey;
  name: string;
  score: number;
  findings: string[];
  recommendations: string[];
}

export type Evaluator = (doc: DocumentModel, response: ResponseMetadata) => CategoryResult;

export interface CategoryReport {
  key: CategoryKey;
  name: string;
  score: number;
  findings: string[];
  recommendations?: string[];
  comment: string;
  context?: string;
}

export interface AuditReport {
  url: string;
  finalUrl: string;
  fetchedAt: string;
  durationMs: number;
  categories: CategoryReport[];
  overallScore: number;
  grade: Grade;
  gradeDescription: string;
  comment: string;
  verbose: boolean;
  roast: boolean;
}
