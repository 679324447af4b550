/**
 * Cluster audit: pick namespaces, scan each, merge the results.
 */

import pLimit from "p-limit";

import { ALL_NAMESPACES } from "../config/config.js";
import { NamespaceScanError, SetupError, describeError } from "../errors.js";
import type { ExposureVerdict, RunResult } from "../types.js";
import { scanNamespace, type NamespaceScanResult, type ScanContext } from "./namespace-scanner.js";

export interface ClusterAuditOptions {
  /** A namespace name, or `ALL`. */
  namespace: string;
  /** Namespaces scanned at once; 1 means sequential. */
  concurrency: number;
}

export type ClusterAuditResult = RunResult<ExposureVerdict> & {
  namespaces: string[];
};

/**
 * Resolve the namespaces to scan. Failing to list them, or a requested
 * namespace that cannot be fetched, is fatal.
 */
export async function selectNamespaces(ctx: ScanContext, requested: string): Promise<string[]> {
  if (requested !== ALL_NAMESPACES) {
    ctx.logger.info(`user specified namespace: ${requested}`);
    try {
      return [await ctx.client.getNamespace(requested)];
    } catch (err) {
      throw new SetupError(`unable to fetch namespace "${requested}": ${describeError(err)}`, { cause: err });
    }
  }

  try {
    return await ctx.client.listNamespaces();
  } catch (err) {
    throw new SetupError(`unable to list namespaces: ${describeError(err)}`, { cause: err });
  }
}

export async function auditCluster(
  options: ClusterAuditOptions,
  ctx: ScanContext,
): Promise<ClusterAuditResult> {
  const namespaces = await selectNamespaces(ctx, options.namespace);

  const limit = pLimit(Math.max(1, options.concurrency));
  const results = await Promise.all(
    namespaces.map((namespace) => limit(() => scanNamespace(namespace, ctx))),
  );

  return mergeResults(namespaces, results);
}

/** Single merge point: namespace order is kept whatever order scans finished in. */
export function mergeResults(namespaces: string[], results: NamespaceScanResult[]): ClusterAuditResult {
  const verdicts: ExposureVerdict[] = [];
  const errors: Error[] = [];

  for (const result of results) {
    verdicts.push(...result.verdicts);
    if (result.errors.length > 0) {
      errors.push(new NamespaceScanError(result.namespace, result.errors));
    }
  }

  return {
    namespaces,
    verdicts,
    errors,
    exposureFound: verdicts.some((v) => v.mounted),
  };
}
