import chalk from "chalk";
import type { AuditReport, CategoryReport } from "./audit/types";
import type { Grade } from "../shared/audit-types";

const BAR_WIDTH = 20;
const MAX_FINDINGS = 4;
const MAX_RECOMMENDATIONS = 3;
const RULE = "═".repeat(64);

export interface TerminalRenderOptions {
  color?: boolean;
}

function scoreColor(c: chalk.Chalk, score: number): chalk.Chalk {
  if (score >= 80) return c.green;
  if (score >= 60) return c.yellow;
  if (score >= 40) return c.ansi256(208);
  return c.red;
}

function gradeColor(c: chalk.Chalk, grade: Grade): chalk.Chalk {
  switch (grade.charAt(0)) {
    case "A":
      return c.green;
    case "B":
      return c.cyan;
    case "C":
      return c.yellow;
    case "D":
      return c.ansi256(208);
    default:
      return c.red;
  }
}

export function progressBar(score: number, width = BAR_WIDTH): string {
  const filled = Math.max(0, Math.min(width, Math.floor((width * score) / 100)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}

function formatCategory(c: chalk.Chalk, category: CategoryReport): string {
  const lines: string[] = [];
  const color = scoreColor(c, category.score);

  lines.push("");
  lines.push(`${c.cyan("▶")} ${c.bold(category.name)}`);
  lines.push(`  Score: ${color(`${category.score}/100`)} ${color(progressBar(category.score))}`);
  lines.push(`  ${c.magenta("💬")} ${category.comment}`);
  if (category.context) {
    lines.push(`     ${c.dim(category.context)}`);
  }

  if (category.findings.length > 0) {
    lines.push(`  ${c.dim("Findings:")}`);
    for (const finding of category.findings.slice(0, MAX_FINDINGS)) {
      lines.push(`    ${c.blue("•")} ${finding}`);
    }
  }

  if (category.recommendations && category.recommendations.length > 0) {
    lines.push(`  ${c.yellow("💡")} Recommendations:`);
    for (const rec of category.recommendations.slice(0, MAX_RECOMMENDATIONS)) {
      lines.push(`    ${c.green("→")} ${rec}`);
    }
  }

  return lines.join("\n");
}

export function generateTerminal(report: AuditReport, options: TerminalRenderOptions = {}): string {
  const c = options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
  const lines: string[] = [];

  lines.push(c.red(RULE));
  lines.push(`  ${c.yellow("🔥")} ${c.bold.red("SITE ROAST")}  ${c.yellow("Heuristic SEO, UX and security audit")}`);
  lines.push(c.red(RULE));
  lines.push("");
  lines.push(`${c.bold("Target:")} ${c.cyan(report.url)}`);
  if (report.finalUrl !== report.url) {
    lines.push(`${c.bold("Final URL:")} ${c.cyan(report.finalUrl)}`);
  }
  lines.push(c.dim(`Audit completed in ${report.durationMs}ms`));

  for (const category of report.categories) {
    lines.push(formatCategory(c, category));
  }

  lines.push("");
  lines.push(c.red(RULE));
  lines.push("");
  lines.push(`  ${c.bold("FINAL GRADE")}  ${c.bold(gradeColor(c, report.grade)(report.grade))}  ${c.dim(`(${report.overallScore}/100)`)}`);
  lines.push(`  ${c.dim(report.gradeDescription)}`);
  lines.push("");
  lines.push(`  ${c.cyan(report.comment)}`);
  lines.push("");
  lines.push(c.red(RULE));

  return lines.join("\n");
}
