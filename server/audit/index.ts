import type { AuditConfigInput, AuditReport, AuditTarget } from "./types";
import { AuditConfigSchema } from "./types";
import { normalizeTargetUrl } from "./url-utils";
import { fetchTarget } from "./fetcher";
import { parseDocument } from "./document";
import { evaluateAll } from "./scorer";
import type { RandomSource } from "./roaster";
import { createRoaster } from "./roaster";
import { assembleReport } from "./report";
import { AuditError } from "./errors";
import { logger } from "../logger";

export interface AuditDocumentOptions {
  verbose?: boolean;
  roast?: boolean;
  random?: RandomSource;
  startTime?: number;
  fetchedAt?: Date;
}

/** Parses, scores and assembles a report for an already fetched page. */
export function auditDocument(target: AuditTarget, options: AuditDocumentOptions = {}): AuditReport {
  const startTime = options.startTime ?? Date.now();

  const doc = parseDocument(target.html);
  const results = evaluateAll(doc, target.response);

  for (const result of results) {
    logger.debug("Audit", `${result.name}: ${result.score}/100`);
  }

  return assembleReport({
    target,
    results,
    roaster: createRoaster({ roast: options.roast ?? true, random: options.random }),
    durationMs: Date.now() - startTime,
    verbose: options.verbose ?? false,
    fetchedAt: options.fetchedAt ?? new Date(startTime),
  });
}

export async function runAudit(
  config: AuditConfigInput,
  options: Pick<AuditDocumentOptions, "random"> = {}
): Promise<AuditReport> {
  const startTime = Date.now();

  const parsed = AuditConfigSchema.safeParse({ ...config, url: normalizeTargetUrl(config.url) });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue?.path[0] === "url") {
      throw AuditError.invalidUrl(config.url, issue.message);
    }
    throw AuditError.invalidOption(issue?.path.join(".") ?? "config", issue?.message ?? parsed.error.message);
  }
  const validatedConfig = parsed.data;

  logger.info("Audit", `Auditing ${validatedConfig.url}`);
  const target = await fetchTarget(validatedConfig);
  logger.debug("Audit", `Fetched ${target.response.bodyBytes} bytes in ${target.response.elapsedMs}ms`);

  return auditDocument(target, {
    verbose: validatedConfig.verbose,
    roast: validatedConfig.roast,
    random: options.random,
    startTime,
  });
}

export { AuditConfigSchema, DEFAULT_USER_AGENT } from "./types";
export type { AuditConfig, AuditConfigInput, AuditReport, AuditTarget, CategoryResult, DocumentModel } from "./types";
export { AuditError, isAuditError } from "./errors";
export { parseDocument } from "./document";
export { evaluateAll } from "./scorer";
