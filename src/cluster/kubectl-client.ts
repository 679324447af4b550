/**
 * ClusterClient backed by the kubectl binary.
 */

import { ClusterLookupError, type LookupFailureReason } from "../errors.js";
import type { OwnedObject, PodInstance, WorkloadObject } from "../types.js";
import { kubectlGet, kubectlGetNamespaces, kubectlStderr, type KubectlOptions } from "./cli-wrapper.js";
import type { ClusterClient, ClusterClientOptions } from "./client.js";
import {
  ManifestParseError,
  parseCronJob,
  parseNamespace,
  parseNamespaceList,
  parseOwnedObject,
  parsePodList,
  parseTemplatedWorkload,
} from "./manifest-parser.js";

/** Map kubectl's "Error from server (Reason)" prefix to a lookup failure reason. */
export function classifyKubectlError(stderr: string): LookupFailureReason {
  if (/\(NotFound\)/.test(stderr)) return "not-found";
  if (/\((Forbidden|Unauthorized)\)/.test(stderr)) return "forbidden";
  return "transient";
}

export class KubectlClient implements ClusterClient {
  private readonly base: KubectlOptions;

  constructor(options: ClusterClientOptions = {}) {
    this.base = { context: options.context, kubeconfig: options.kubeconfig };
  }

  async listNamespaces(): Promise<string[]> {
    return this.fetch("namespaces", {}, () => kubectlGetNamespaces(this.base), parseNamespaceList);
  }

  async getNamespace(name: string): Promise<string> {
    return this.fetch(
      "namespace",
      { name },
      () => kubectlGet("namespace", { ...this.base, name }),
      parseNamespace,
    );
  }

  async listPods(namespace: string): Promise<PodInstance[]> {
    return this.fetch(
      "pods",
      { namespace },
      () => kubectlGet("pods", { ...this.base, namespace }),
      parsePodList,
    );
  }

  async getReplicaSet(namespace: string, name: string): Promise<OwnedObject> {
    return this.fetch(
      "replicaset",
      { namespace, name },
      () => kubectlGet("replicaset", { ...this.base, namespace, name }),
      (json) => parseOwnedObject(json, "replicaset"),
    );
  }

  async getDeployment(namespace: string, name: string): Promise<WorkloadObject> {
    return this.getTemplated("deployment", namespace, name);
  }

  async getDaemonSet(namespace: string, name: string): Promise<WorkloadObject> {
    return this.getTemplated("daemonset", namespace, name);
  }

  async getStatefulSet(namespace: string, name: string): Promise<WorkloadObject> {
    return this.getTemplated("statefulset", namespace, name);
  }

  async getJob(namespace: string, name: string): Promise<WorkloadObject> {
    return this.getTemplated("job", namespace, name);
  }

  async getCronJob(namespace: string, name: string): Promise<WorkloadObject> {
    return this.fetch(
      "cronjob",
      { namespace, name },
      () => kubectlGet("cronjob", { ...this.base, namespace, name }),
      parseCronJob,
    );
  }

  private getTemplated(resource: string, namespace: string, name: string): Promise<WorkloadObject> {
    return this.fetch(
      resource,
      { namespace, name },
      () => kubectlGet(resource, { ...this.base, namespace, name }),
      (json) => parseTemplatedWorkload(json, resource),
    );
  }

  private async fetch<T>(
    resource: string,
    target: { namespace?: string; name?: string },
    run: () => Promise<string>,
    parse: (json: string) => T,
  ): Promise<T> {
    let json: string;
    try {
      json = await run();
    } catch (err) {
      const stderr = kubectlStderr(err);
      throw new ClusterLookupError({
        reason: classifyKubectlError(stderr),
        resource,
        ...target,
        detail: stderr,
        cause: err,
      });
    }

    try {
      return parse(json);
    } catch (err) {
      if (!(err instanceof ManifestParseError)) throw err;
      throw new ClusterLookupError({
        reason: "transient",
        resource,
        ...target,
        detail: err.message,
        cause: err,
      });
    }
  }
}
