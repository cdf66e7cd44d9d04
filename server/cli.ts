#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import chalk from "chalk";
import { Command, InvalidArgumentError, Option } from "commander";
import { runAudit, DEFAULT_USER_AGENT } from "./audit";
import type { AuditReport } from "./audit/types";
import { AuditError, getErrorMessage, isAuditError } from "./audit/errors";
import type { OutputFormat } from "../shared/audit-types";
import { generateJson, generateMarkdown } from "./export";
import { generateTerminal } from "./terminal";
import { logger, setLogLevel } from "./logger";

export const VERSION = "1.0.0";

export interface CliOptions {
  json?: boolean;
  markdown?: boolean;
  md?: boolean;
  roast: boolean;
  verbose?: boolean;
  timeout: number;
  userAgent: string;
  output?: string;
  debug?: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds.");
  }
  return seconds;
}

export function detectOutputFormat(outputPath: string | undefined): OutputFormat | null {
  if (!outputPath) return null;
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".md" || ext === ".markdown") return "markdown";
  return null;
}

export function resolveOutputFormat(options: Pick<CliOptions, "json" | "markdown" | "md" | "output">): OutputFormat {
  if (options.json) return "json";
  if (options.markdown || options.md) return "markdown";
  return detectOutputFormat(options.output) ?? "terminal";
}

export function renderReport(report: AuditReport, format: OutputFormat, color = true): string {
  switch (format) {
    case "json":
      return generateJson(report);
    case "markdown":
      return generateMarkdown(report);
    case "terminal":
      return generateTerminal(report, { color });
  }
}

export function writeReport(outputPath: string, content: string): void {
  try {
    fs.writeFileSync(outputPath, content.endsWith("\n") ? content : `${content}\n`, "utf8");
  } catch (error) {
    throw AuditError.outputWrite(outputPath, error);
  }
}

function reportError(error: unknown, format: OutputFormat, io: CliIO): void {
  if (format === "json") {
    const body = isAuditError(error)
      ? { error: true, ...error.toJSON() }
      : { error: true, code: "UNKNOWN", message: getErrorMessage(error) || "Unknown error occurred" };
    io.stderr(JSON.stringify(body, null, 2));
    return;
  }

  io.stderr(chalk.red(`💥 Audit failed: ${getErrorMessage(error)}`));
  if (isAuditError(error) && error.details) {
    io.stderr(chalk.dim(`   ${error.details}`));
  }
}

/** Runs one audit and returns the process exit code. */
export async function runCli(url: string, options: CliOptions, io: CliIO = processIO): Promise<number> {
  if (options.debug) {
    setLogLevel("debug");
  }
  const format = resolveOutputFormat(options);

  try {
    const report = await runAudit({
      url,
      timeoutMs: Math.round(options.timeout * 1000),
      userAgent: options.userAgent,
      verbose: options.verbose ?? false,
      roast: options.roast,
    });

    if (options.output) {
      writeReport(options.output, renderReport(report, format, false));
      io.stderr(`Report saved to: ${options.output}`);
    } else {
      io.stdout(renderReport(report, format));
    }
    return 0;
  } catch (error) {
    logger.debug("CLI", "Audit aborted", error);
    reportError(error, format, io);
    return isAuditError(error) ? error.exitCode : 1;
  }
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("site-roast")
    .description("Roast a web page's SEO, performance and security with actual scores")
    .version(VERSION, "--version", "Output the version number")
    .argument("<url>", "The page to audit (https:// is assumed when no scheme is given)")
    .option("--json", "Output results as JSON")
    .option("--markdown", "Output results as a Markdown report")
    .addOption(new Option("--md", "Alias for --markdown").hideHelp())
    .option("--no-roast", "Serious mode: neutral comments instead of jokes")
    .option("-v, --verbose", "Include recommendations for each category")
    .option("--timeout <seconds>", "Request timeout in seconds", parseSeconds, 30)
    .option("--user-agent <string>", "User-Agent header for the request", DEFAULT_USER_AGENT)
    .option("-o, --output <path>", "Write the report to a file (format follows .json/.md when no flag is given)")
    .option("--debug", "Log pipeline details to stderr")
    .action(async (url: string, options: CliOptions) => {
      process.exitCode = await runCli(url, options, io);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error("CLI", getErrorMessage(error));
      process.exitCode = 1;
    });
}
