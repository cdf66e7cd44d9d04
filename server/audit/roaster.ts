import { z } from "zod";
import type { CategoryKey, Grade } from "../../shared/audit-types";
import { CATEGORY_NAMES } from "../../shared/audit-types";
import { clampScore } from "./grading";
import roastData from "./data/roasts.json";

const CommentPool = z.array(z.string().min(1)).min(1);

const ContextLines = z.object({ low: z.string().min(1), mid: z.string().min(1) });

const RoastPoolsSchema = z.object({
  tiers: z
    .array(
      z.object({
        min: z.number().int().min(0).max(100),
        max: z.number().int().min(0).max(100),
        comments: CommentPool,
      })
    )
    .min(1),
  grades: z.object({
    "A+": CommentPool,
    A: CommentPool,
    "A-": CommentPool,
    "B+": CommentPool,
    B: CommentPool,
    "B-": CommentPool,
    "C+": CommentPool,
    C: CommentPool,
    "C-": CommentPool,
    "D+": CommentPool,
    D: CommentPool,
    "D-": CommentPool,
    F: CommentPool,
  }),
  contexts: z.object({
    title: ContextLines,
    meta_description: ContextLines,
    headings: ContextLines,
    images: ContextLines,
    mobile: ContextLines,
    ssl_security: ContextLines,
    performance: ContextLines,
    links: ContextLines,
    open_graph: ContextLines,
    schema: ContextLines,
  }),
});

export type RoastPools = z.infer<typeof RoastPoolsSchema>;

export const ROAST_POOLS: RoastPools = RoastPoolsSchema.parse(roastData);

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

export interface RoasterOptions {
  roast: boolean;
  random?: RandomSource;
  pools?: RoastPools;
}

export interface Roaster {
  readonly roast: boolean;
  categoryComment(key: CategoryKey, score: number): string;
  categoryContext(key: CategoryKey, score: number): string | undefined;
  overallComment(grade: Grade, score: number): string;
}

function pick(pool: readonly string[], random: RandomSource): string {
  const index = Math.min(pool.length - 1, Math.max(0, Math.floor(random() * pool.length)));
  return pool[index];
}

export function tierFor(score: number, pools: RoastPools = ROAST_POOLS): readonly string[] {
  const clamped = clampScore(score);
  const tier = pools.tiers.find((t) => clamped >= t.min && clamped <= t.max);
  return tier ? tier.comments : pools.tiers[pools.tiers.length - 1].comments;
}

export function seriousComment(score: number): string {
  if (score >= 95) return "Excellent. This category meets or exceeds best practices.";
  if (score >= 80) return "Good. Minor improvements could push this to excellent.";
  if (score >= 60) return "Acceptable. Some issues present but functional.";
  if (score >= 40) return "Below average. Several issues need attention.";
  if (score >= 20) return "Poor. Significant problems affecting this category.";
  return "Critical. Immediate attention required for this area.";
}

export function createRoaster(options: RoasterOptions): Roaster {
  const random = options.random ?? Math.random;
  const pools = options.pools ?? ROAST_POOLS;

  return {
    roast: options.roast,

    categoryComment(key, score) {
      if (!options.roast) {
        return `${CATEGORY_NAMES[key]} (${clampScore(score)}/100): ${seriousComment(score)}`;
      }
      return pick(tierFor(score, pools), random);
    },

    categoryContext(key, score) {
      if (!options.roast) return undefined;
      if (score < 40) return pools.contexts[key].low;
      if (score < 70) return pools.contexts[key].mid;
      return undefined;
    },

    overallComment(grade, score) {
      if (!options.roast) {
        return `Overall score: ${clampScore(score)}/100 (grade ${grade})`;
      }
      return pick(pools.grades[grade], random);
    },
  };
}
