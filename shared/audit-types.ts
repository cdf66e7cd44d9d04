export const CATEGORY_KEYS = [
  "title",
  "meta_description",
  "headings",
  "images",
  "mobile",
  "ssl_security",
  "performance",
  "links",
  "open_graph",
  "schema",
] as const;

export type CategoryKey = (typeof CATEGORY_KEYS)[number];

export const CATEGORY_NAMES: Record<CategoryKey, string> = {
  title: "Title Tag",
  meta_description: "Meta Description",
  headings: "Headings",
  images: "Images",
  mobile: "Mobile",
  ssl_security: "SSL/Security",
  performance: "Performance",
  links: "Links",
  open_graph: "Open Graph",
  schema: "Schema/Structured Data",
};

export function mapCategories<T>(build: (key: CategoryKey) => T): Record<CategoryKey, T> {
  return {
    title: build("title"),
    meta_description: build("meta_description"),
    headings: build("headings"),
    images: build("images"),
    mobile: build("mobile"),
    ssl_security: build("ssl_security"),
    performance: build("performance"),
    links: build("links"),
    open_graph: build("open_graph"),
    schema: build("schema"),
  };
}

export type Grade =
  | "A+"
  | "A"
  | "A-"
  | "B+"
  | "B"
  | "B-"
  | "C+"
  | "C"
  | "C-"
  | "D+"
  | "D"
  | "D-"
  | "F";

export type OutputFormat = "terminal" | "json" | "markdown";

export interface CategoryJson {
  name: string;
  score: number;
  findings: string[];
  recommendations?: string[];
  comment: string;
  context?: string;
}

// Shape of `--json` output. Field names are snake_case because downstream
// tooling parses them.
export interface AuditReportJson {
  url: string;
  final_url: string;
  timestamp: string;
  duration_ms: number;
  overall_score: number;
  overall_grade: Grade;
  grade_description: string;
  overall_comment: string;
  categories: Record<CategoryKey, CategoryJson>;
}
