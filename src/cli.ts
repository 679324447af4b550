/**
 * sock-audit command line.
 *
 * Audits every namespace (or one) for workloads mounting the container
 * runtime socket, or scans local manifest files with `-f`. The report goes
 * to stdout; diagnostics and the error summary go to stderr.
 */

import { Command, CommanderError } from "commander";

import { auditCluster } from "./audit/cluster-audit.js";
import type { ClusterClient, ClusterClientOptions } from "./cluster/client.js";
import { KubeApiClient } from "./cluster/api-client.js";
import { KubectlClient } from "./cluster/kubectl-client.js";
import { type AuditConfig, type ClientKind, configFromEnv, resolveConfig } from "./config/config.js";
import { SetupError, aggregateErrors } from "./errors.js";
import { scanFiles } from "./files/file-scanner.js";
import { type LineSink, type Logger, createLogger } from "./logging/logger.js";
import { renderClusterReport, renderFileReport } from "./report/report-writer.js";
import type { RunResult } from "./types.js";
import { VERSION } from "./version.js";

export interface CliRuntime {
  stdout: LineSink;
  stderr: LineSink;
  env: NodeJS.ProcessEnv;
  /** ANSI colours in log lines. */
  colors: boolean;
  createClient(kind: ClientKind, options: ClusterClientOptions): ClusterClient;
}

export function createClusterClient(kind: ClientKind, options: ClusterClientOptions): ClusterClient {
  return kind === "kubectl" ? new KubectlClient(options) : KubeApiClient.fromKubeConfig(options);
}

export const defaultRuntime: CliRuntime = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  colors: Boolean(process.stderr.isTTY),
  createClient: createClusterClient,
};

/** Flags as commander hands them over; absent flags stay undefined. */
type CliFlags = {
  namespace?: string;
  filename?: string;
  exitWithError?: boolean;
  verbose?: boolean;
  target?: string;
  client?: string;
  kubeconfig?: string;
  context?: string;
  concurrency?: string;
  json?: boolean;
  logLevel?: string;
  logFile?: string;
  redact?: string[];
};

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function buildProgram(runtime: CliRuntime, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("sock-audit")
    .description("Find workloads that mount the container runtime socket from the host")
    .version(VERSION, "-V, --version")
    .option("-n, --namespace <name>", "namespace to audit, or ALL (default: ALL)")
    .option("-f, --filename <path>", "scan a file or directory instead of a cluster")
    .option("-e, --exit-with-error", "exit 1 when any exposure is found")
    .option("-v, --verbose", "include not-mounted rows in the report")
    .option("-t, --target <substring>", "host path substring to look for (default: docker.sock)")
    .option("--client <kind>", "cluster client: api or kubectl (default: api)")
    .option("--kubeconfig <path>", "kubeconfig file")
    .option("--context <name>", "kubeconfig context")
    .option("--concurrency <n>", "namespaces scanned in parallel (default: 1)")
    .option("--json", "print the report as JSON")
    .option("--log-level <level>", "trace|debug|info|warn (default: warn)")
    .option("--log-file <path>", "also append log lines to a file")
    .option("--redact <pattern>", "mask matches of a regular expression in log lines (repeatable)", collect)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => runtime.stdout.write(str),
      writeErr: (str) => runtime.stderr.write(str),
    })
    .action(async () => {
      onExit(await runAudit(program.opts<CliFlags>(), runtime));
    });

  return program;
}

/**
 * Parse `args` (without the node and script entries) and run. Resolves to
 * the process exit code.
 */
export async function runCli(args: string[], runtime: CliRuntime = defaultRuntime): Promise<number> {
  let code = 0;
  const program = buildProgram(runtime, (exitCode) => {
    code = exitCode;
  });

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof SetupError) {
      runtime.stderr.write(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
  return code;
}

async function runAudit(flags: CliFlags, runtime: CliRuntime): Promise<number> {
  const config = resolveConfig(configFromEnv(runtime.env), { ...flags });
  const logger = createLogger("sock-audit", {
    level: config.logLevel,
    file: config.logFile,
    colors: runtime.colors,
    redactPatterns: config.redact,
    sink: runtime.stderr,
  });
  await logger.open();

  try {
    const result = config.filename
      ? await runFileScan(config, config.filename, runtime, logger)
      : await runClusterAudit(config, runtime, logger);

    const summary = aggregateErrors(result.errors);
    if (summary) runtime.stderr.write(`error: ${summary.message}\n`);

    return config.exitWithError && result.exposureFound ? 1 : 0;
  } finally {
    await logger.close();
  }
}

async function runFileScan(
  config: AuditConfig,
  path: string,
  runtime: CliRuntime,
  logger: Logger,
): Promise<RunResult<unknown>> {
  const result = await scanFiles(path, config.target, logger.child("files"));
  runtime.stdout.write(renderFileReport(result.verdicts, config));
  return result;
}

async function runClusterAudit(
  config: AuditConfig,
  runtime: CliRuntime,
  logger: Logger,
): Promise<RunResult<unknown>> {
  const client = runtime.createClient(config.client, {
    kubeconfig: config.kubeconfig,
    context: config.context,
  });
  const result = await auditCluster(
    { namespace: config.namespace, concurrency: config.concurrency },
    { client, target: config.target, logger: logger.child("cluster") },
  );
  logger.debug(`scanned ${result.namespaces.length} namespaces`);
  runtime.stdout.write(renderClusterReport(result.verdicts, config));
  return result;
}
