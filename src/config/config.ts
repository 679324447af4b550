/**
 * Audit configuration: defaults < environment < command-line flags,
 * validated with Zod.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";

export const ALL_NAMESPACES = "ALL";

export const DEFAULT_TARGET = "docker.sock";

// =============================================================================
// Zod Schemas
// =============================================================================

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn"]);

/** Regular expression source applied to log lines; matches become [REDACTED]. */
export const redactPatternSchema = z.string().min(1).refine(isValidPattern, "invalid regular expression");

export const clientKindSchema = z.enum(["api", "kubectl"]);

export const auditConfigSchema = z.object({
  namespace: z.string().min(1).default(ALL_NAMESPACES),
  filename: z.string().min(1).optional(),
  exitWithError: z.boolean().default(false),
  verbose: z.boolean().default(false),
  target: z.string().min(1).default(DEFAULT_TARGET),
  client: clientKindSchema.default("api"),
  kubeconfig: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().positive().default(1),
  json: z.boolean().default(false),
  logLevel: logLevelSchema.default("warn"),
  logFile: z.string().min(1).optional(),
  redact: z.array(redactPatternSchema).default([]),
});

export type AuditConfig = z.infer<typeof auditConfigSchema>;

export type AuditConfigInput = z.input<typeof auditConfigSchema>;

export type ClientKind = z.infer<typeof clientKindSchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * Read configuration from environment variables. Unset variables are omitted
 * so schema defaults still apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  const set = (key: keyof AuditConfigInput, value: string | undefined) => {
    if (value !== undefined && value !== "") input[key] = value;
  };

  set("target", env.SOCK_AUDIT_TARGET);
  set("client", env.SOCK_AUDIT_CLIENT);
  set("concurrency", env.SOCK_AUDIT_CONCURRENCY);
  set("logLevel", env.SOCK_AUDIT_LOG_LEVEL);
  set("logFile", env.SOCK_AUDIT_LOG_FILE);
  set("kubeconfig", env.KUBECONFIG);

  const redact = env.SOCK_AUDIT_REDACT?.split(",")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern !== "");
  if (redact && redact.length > 0) input.redact = redact;

  return input;
}

/**
 * Merge layers left to right (later wins, `undefined` never overrides) and
 * validate the result.
 */
export function resolveConfig(...layers: Array<Record<string, unknown>>): AuditConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const result = auditConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return result.data;
}

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}
