import type { AuditReport, AuditTarget, CategoryReport, CategoryResult } from "./types";
import type { Roaster } from "./roaster";
import { CATEGORY_KEYS } from "../../shared/audit-types";
import { calculateOverallScore, gradeDescription, scoreToGrade } from "./grading";

export interface AssembleReportInput {
  target: AuditTarget;
  results: CategoryResult[];
  roaster: Roaster;
  durationMs: number;
  verbose: boolean;
  fetchedAt: Date;
}

export function assembleReport(input: AssembleReportInput): AuditReport {
  const { target, roaster, verbose } = input;

  const categories: CategoryReport[] = CATEGORY_KEYS.map((key) => {
    const result = input.results.find((r) => r.key === key);
    if (!result) {
      throw new Error(`Missing result for category "${key}"`);
    }

    const report: CategoryReport = {
      key,
      name: result.name,
      score: result.score,
      findings: [...result.findings],
      comment: roaster.categoryComment(key, result.score),
    };
    if (verbose) {
      report.recommendations = [...result.recommendations];
    }
    const context = roaster.categoryContext(key, result.score);
    if (context) {
      report.context = context;
    }
    return report;
  });

  const overallScore = calculateOverallScore(categories.map((c) => c.score));
  const grade = scoreToGrade(overallScore);

  return {
    url: target.url,
    finalUrl: target.response.finalUrl,
    fetchedAt: input.fetchedAt.toISOString(),
    durationMs: input.durationMs,
    categories,
    overallScore,
    grade,
    gradeDescription: gradeDescription(grade),
    comment: roaster.overallComment(grade, overallScore),
    verbose,
    roast: roaster.roast,
  };
}
