/**
 * Error types for the audit.
 *
 * Setup errors abort the run. Lookup, chain and file errors are collected
 * per namespace (or per file tree) and reported after the table.
 */

export type LookupFailureReason = "not-found" | "forbidden" | "transient";

/** Fatal: configuration, client construction, namespace or path not available. */
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetupError";
  }
}

/** Invalid configuration value. */
export class ConfigError extends SetupError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** A single fetch against the cluster failed. */
export class ClusterLookupError extends Error {
  readonly reason: LookupFailureReason;
  readonly resource: string;
  readonly namespace?: string;
  readonly resourceName?: string;

  constructor(params: {
    reason: LookupFailureReason;
    resource: string;
    namespace?: string;
    name?: string;
    detail?: string;
    cause?: unknown;
  }) {
    const target = params.name ? `${params.resource} "${params.name}"` : params.resource;
    const where = params.namespace ? ` in namespace "${params.namespace}"` : "";
    const detail = params.detail ? `: ${params.detail}` : "";
    super(`unable to fetch ${target}${where} (${params.reason})${detail}`, { cause: params.cause });
    this.name = "ClusterLookupError";
    this.reason = params.reason;
    this.resource = params.resource;
    this.namespace = params.namespace;
    this.resourceName = params.name;
  }
}

/** An intermediate owner does not lead where it should. */
export class OwnerChainError extends Error {
  readonly namespace: string;
  readonly ownerKind: string;
  readonly ownerName: string;

  constructor(namespace: string, ownerKind: string, ownerName: string, message: string) {
    super(`${ownerKind} "${ownerName}" in namespace "${namespace}": ${message}`);
    this.name = "OwnerChainError";
    this.namespace = namespace;
    this.ownerKind = ownerKind;
    this.ownerName = ownerName;
  }
}

/** A file, or a directory below the scanned root, that could not be read. */
export class FileScanError extends Error {
  readonly file: string;
  readonly entry: "file" | "directory";

  constructor(file: string, cause: unknown, entry: "file" | "directory" = "file") {
    super(`unable to read ${entry} ${file}: ${describeError(cause)}`, { cause });
    this.name = "FileScanError";
    this.file = file;
    this.entry = entry;
  }
}

/** All errors recorded while scanning one namespace. */
export class NamespaceScanError extends Error {
  readonly namespace: string;
  readonly errors: Error[];

  constructor(namespace: string, errors: Error[]) {
    super(`namespace "${namespace}": ${formatErrorList(errors)}`);
    this.name = "NamespaceScanError";
    this.namespace = namespace;
    this.errors = errors;
  }
}

/**
 * Several errors combined into one. Nested aggregates are flattened.
 */
export class AggregateScanError extends Error {
  readonly errors: Error[];

  constructor(errors: Error[]) {
    const flat = flattenErrors(errors);
    super(formatErrorList(flat));
    this.name = "AggregateScanError";
    this.errors = flat;
  }
}

/** Combine errors; `undefined` when there is nothing to report. */
export function aggregateErrors(errors: Error[]): AggregateScanError | undefined {
  return errors.length > 0 ? new AggregateScanError(errors) : undefined;
}

function flattenErrors(errors: Error[]): Error[] {
  const out: Error[] = [];
  for (const err of errors) {
    if (err instanceof AggregateScanError) out.push(...err.errors);
    else out.push(err);
  }
  return out;
}

function formatErrorList(errors: Error[]): string {
  if (errors.length === 1) return errors[0]?.message ?? "";
  return `[${errors.map((e) => e.message).join(", ")}]`;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
