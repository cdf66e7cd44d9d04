import type { Grade } from "../../shared/audit-types";

// Lower bound of each grade, best first. Published contract: do not reorder
// or retune without a major version bump.
export const GRADE_TABLE: ReadonlyArray<{ min: number; max: number; grade: Grade }> = [
  { min: 97, max: 100, grade: "A+" },
  { min: 93, max: 96, grade: "A" },
  { min: 90, max: 92, grade: "A-" },
  { min: 87, max: 89, grade: "B+" },
  { min: 83, max: 86, grade: "B" },
  { min: 80, max: 82, grade: "B-" },
  { min: 77, max: 79, grade: "C+" },
  { min: 73, max: 76, grade: "C" },
  { min: 70, max: 72, grade: "C-" },
  { min: 67, max: 69, grade: "D+" },
  { min: 63, max: 66, grade: "D" },
  { min: 60, max: 62, grade: "D-" },
  { min: 0, max: 59, grade: "F" },
];

const GRADE_DESCRIPTIONS: Record<Grade, string> = {
  "A+": "Exceptional - exceeds all expectations",
  A: "Excellent - meets best practices",
  "A-": "Very good - minor improvements needed",
  "B+": "Good - above average",
  B: "Above average - competent work",
  "B-": "Average plus - acceptable with room for improvement",
  "C+": "Slightly above average - meets minimum standards",
  C: "Average - acceptable but unremarkable",
  "C-": "Below average - needs work",
  "D+": "Poor - significant issues present",
  D: "Very poor - major improvements needed",
  "D-": "Critical - barely functional",
  F: "Failing - requires complete overhaul",
};

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(100, Math.max(0, Math.round(score)));
}

/** Arithmetic mean rounded half-up; 0 for an empty list. */
export function calculateOverallScore(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  const total = scores.reduce((sum, score) => sum + score, 0);
  return clampScore(Math.floor(total / scores.length + 0.5));
}

export function scoreToGrade(score: number): Grade {
  const clamped = clampScore(score);
  for (const row of GRADE_TABLE) {
    if (clamped >= row.min) return row.grade;
  }
  return "F";
}

export function gradeDescription(grade: Grade): string {
  return GRADE_DESCRIPTIONS[grade];
}

export function gradeRank(grade: Grade): number {
  return GRADE_TABLE.length - GRADE_TABLE.findIndex((row) => row.grade === grade);
}

/** Coarse per-category letter used in the Markdown summary table. */
export function scoreToMiniGrade(score: number): "A" | "B" | "C" | "D" | "F" {
  if (score >= 93) return "A";
  if (score >= 85) return "B";
  if (score >= 75) return "C";
  if (score >= 65) return "D";
  return "F";
}

export type ScoreStatus = "Good" | "Needs Work" | "Poor";

export function scoreStatus(score: number): ScoreStatus {
  if (score >= 80) return "Good";
  if (score >= 60) return "Needs Work";
  return "Poor";
}
