/**
 * The read-only cluster capability the audit consumes.
 *
 * Implementations throw {@link ClusterLookupError} for failed fetches.
 */

import type { OwnedObject, PodInstance, WorkloadObject } from "../types.js";

export interface ClusterClient {
  listNamespaces(): Promise<string[]>;
  /** Resolves to the namespace name; throws when it does not exist. */
  getNamespace(name: string): Promise<string>;
  listPods(namespace: string): Promise<PodInstance[]>;

  getReplicaSet(namespace: string, name: string): Promise<OwnedObject>;
  getDeployment(namespace: string, name: string): Promise<WorkloadObject>;
  getDaemonSet(namespace: string, name: string): Promise<WorkloadObject>;
  getStatefulSet(namespace: string, name: string): Promise<WorkloadObject>;
  getJob(namespace: string, name: string): Promise<WorkloadObject>;
  getCronJob(namespace: string, name: string): Promise<WorkloadObject>;
}

export interface ClusterClientOptions {
  kubeconfig?: string;
  context?: string;
}
