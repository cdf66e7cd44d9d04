import type { AuditReport } from "./audit/types";
import type { AuditReportJson, CategoryJson, Grade } from "../shared/audit-types";
import { mapCategories } from "../shared/audit-types";
import { GRADE_TABLE, scoreStatus, scoreToMiniGrade } from "./audit/grading";

export function toReportJson(report: AuditReport): AuditReportJson {
  const categories = mapCategories((key): CategoryJson => {
    const category = report.categories.find((c) => c.key === key);
    if (!category) {
      throw new Error(`Report has no "${key}" category`);
    }
    return {
      name: category.name,
      score: category.score,
      findings: category.findings,
      ...(category.recommendations ? { recommendations: category.recommendations } : {}),
      comment: category.comment,
      ...(category.context ? { context: category.context } : {}),
    };
  });

  return {
    url: report.url,
    final_url: report.finalUrl,
    timestamp: report.fetchedAt,
    duration_ms: report.durationMs,
    overall_score: report.overallScore,
    overall_grade: report.grade,
    grade_description: report.gradeDescription,
    overall_comment: report.comment,
    categories,
  };
}

export function generateJson(report: AuditReport): string {
  return JSON.stringify(toReportJson(report), null, 2);
}

function gradeEmoji(grade: Grade): string {
  if (grade.startsWith("A")) return "🌟";
  if (grade.startsWith("B")) return "✅";
  if (grade.startsWith("C")) return "⚠️";
  if (grade.startsWith("D")) return "🔧";
  return "💀";
}

const STATUS_LABELS = {
  Good: "✅ Good",
  "Needs Work": "⚠️ Needs Work",
  Poor: "🔴 Poor",
} as const;

function escapeTableCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

export function generateMarkdown(report: AuditReport): string {
  const lines: string[] = [];

  lines.push("# 🔥 Site Roast Report");
  lines.push("");
  lines.push(`**Target:** \`${report.url}\`  `);
  if (report.finalUrl !== report.url) {
    lines.push(`**Final URL:** \`${report.finalUrl}\`  `);
  }
  lines.push(`**Audited:** ${report.fetchedAt}  `);
  lines.push(`**Duration:** ${report.durationMs}ms`);
  lines.push("");

  lines.push(`## ${gradeEmoji(report.grade)} Overall Grade: **${report.grade}** (${report.overallScore}/100)`);
  lines.push("");
  lines.push(`> ${report.comment}`);
  lines.push("");

  lines.push("## 📊 Category Summary");
  lines.push("");
  lines.push("| Category | Score | Grade | Status |");
  lines.push("|----------|-------|-------|--------|");
  for (const category of report.categories) {
    lines.push(
      `| ${escapeTableCell(category.name)} | ${category.score}/100 | ${scoreToMiniGrade(category.score)} | ${
        STATUS_LABELS[scoreStatus(category.score)]
      } |`
    );
  }
  lines.push("");

  lines.push("## 🔍 Detailed Analysis");
  lines.push("");
  for (const category of report.categories) {
    lines.push(`### ${category.name}: ${category.score}/100`);
    lines.push("");
    lines.push(`*${category.comment}*`);
    lines.push("");
    if (category.context) {
      lines.push(`> ${category.context}`);
      lines.push("");
    }
    if (category.findings.length > 0) {
      lines.push("**Findings:**");
      for (const finding of category.findings) {
        lines.push(`- ${finding}`);
      }
      lines.push("");
    }
    if (category.recommendations && category.recommendations.length > 0) {
      lines.push("**Recommendations:**");
      for (const rec of category.recommendations) {
        lines.push(`- ${rec}`);
      }
      lines.push("");
    }
  }

  lines.push("## 📐 Grade Scale");
  lines.push("");
  lines.push("| Score | Grade |");
  lines.push("|-------|-------|");
  for (const row of GRADE_TABLE) {
    lines.push(`| ${row.min}-${row.max} | ${row.grade} |`);
  }
  lines.push("");
  lines.push("---");
  lines.push("");
  lines.push("*Generated by site-roast*");

  return lines.join("\n");
}
