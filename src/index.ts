export { auditCluster, mergeResults, selectNamespaces } from "./audit/cluster-audit.js";
export type { ClusterAuditOptions, ClusterAuditResult } from "./audit/cluster-audit.js";
export { ControllerAggregator } from "./audit/aggregator.js";
export { scanNamespace } from "./audit/namespace-scanner.js";
export type { NamespaceScanResult, ScanContext } from "./audit/namespace-scanner.js";
export { classifyOwnerKind, resolveOwner } from "./audit/owner-resolver.js";
export { inspectVolumes, inspectWorkload } from "./audit/volume-inspector.js";
export { KubeApiClient, loadKubeConfig } from "./cluster/api-client.js";
export type { ClusterClient, ClusterClientOptions } from "./cluster/client.js";
export { KubectlClient } from "./cluster/kubectl-client.js";
export { ALL_NAMESPACES, DEFAULT_TARGET, auditConfigSchema, configFromEnv, resolveConfig } from "./config/config.js";
export type { AuditConfig, ClientKind } from "./config/config.js";
export * from "./errors.js";
export { collectFiles, scanFiles, searchFile } from "./files/file-scanner.js";
export type { CollectedFiles, FileScanResult } from "./files/file-scanner.js";
export { createLogger, createSilentLogger } from "./logging/logger.js";
export type { LogLevel, Logger } from "./logging/logger.js";
export { TableWriter, renderClusterReport, renderFileReport } from "./report/report-writer.js";
export { runCli } from "./cli.js";
export type { CliRuntime } from "./cli.js";
export type * from "./types.js";
export { WORKLOAD_KINDS } from "./types.js";
export { VERSION } from "./version.js";
