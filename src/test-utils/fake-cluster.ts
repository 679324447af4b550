/**
 * In-memory ClusterClient for tests.
 */

import type { ClusterClient } from "../cluster/client.js";
import { ClusterLookupError, type LookupFailureReason } from "../errors.js";
import type { OwnedObject, OwnerReference, PodInstance, Volume, WorkloadObject } from "../types.js";

export type FakeResource = "replicaset" | "deployment" | "daemonset" | "statefulset" | "job" | "cronjob";

type Owner = { kind: string; name: string };

export function hostPathVolume(name: string, path: string): Volume {
  return { name, hostPath: { path } };
}

export function emptyDirVolume(name: string): Volume {
  return { name };
}

export function makePod(name: string, options: { owner?: Owner; volumes?: Volume[] } = {}): PodInstance {
  return {
    metadata: { name, ownerReferences: options.owner ? [toRef(options.owner)] : [] },
    volumes: options.volumes ?? [],
  };
}

function toRef(owner: Owner): OwnerReference {
  return { apiVersion: "v1", kind: owner.kind, name: owner.name, uid: `uid-${owner.name}` };
}

export class FakeClusterClient implements ClusterClient {
  private readonly pods = new Map<string, PodInstance[]>();
  private readonly objects = new Map<string, WorkloadObject>();
  private readonly failures = new Map<string, LookupFailureReason>();
  /** Every call as `resource/namespace/name`. */
  readonly calls: string[] = [];

  addNamespace(namespace: string, pods: PodInstance[] = []): this {
    this.pods.set(namespace, [...(this.pods.get(namespace) ?? []), ...pods]);
    return this;
  }

  addObject(
    resource: FakeResource,
    namespace: string,
    name: string,
    options: { owner?: Owner; volumes?: Volume[] } = {},
  ): this {
    this.objects.set(key(resource, namespace, name), {
      metadata: { name, namespace, ownerReferences: options.owner ? [toRef(options.owner)] : [] },
      volumes: options.volumes ?? [],
    });
    return this;
  }

  /** Make a lookup fail. `name` omitted means the list call for the namespace. */
  fail(
    resource: FakeResource | "pods" | "namespaces" | "namespace",
    namespace: string,
    name = "",
    reason: LookupFailureReason = "transient",
  ): this {
    this.failures.set(key(resource, namespace, name), reason);
    return this;
  }

  async listNamespaces(): Promise<string[]> {
    this.check("namespaces", "", "");
    return [...this.pods.keys()];
  }

  async getNamespace(name: string): Promise<string> {
    this.check("namespace", "", name);
    if (!this.pods.has(name)) {
      throw new ClusterLookupError({ reason: "not-found", resource: "namespace", name });
    }
    return name;
  }

  async listPods(namespace: string): Promise<PodInstance[]> {
    this.check("pods", namespace, "");
    return this.pods.get(namespace) ?? [];
  }

  async getReplicaSet(namespace: string, name: string): Promise<OwnedObject> {
    return this.get("replicaset", namespace, name);
  }

  async getDeployment(namespace: string, name: string): Promise<WorkloadObject> {
    return this.get("deployment", namespace, name);
  }

  async getDaemonSet(namespace: string, name: string): Promise<WorkloadObject> {
    return this.get("daemonset", namespace, name);
  }

  async getStatefulSet(namespace: string, name: string): Promise<WorkloadObject> {
    return this.get("statefulset", namespace, name);
  }

  async getJob(namespace: string, name: string): Promise<WorkloadObject> {
    return this.get("job", namespace, name);
  }

  async getCronJob(namespace: string, name: string): Promise<WorkloadObject> {
    return this.get("cronjob", namespace, name);
  }

  private get(resource: FakeResource, namespace: string, name: string): WorkloadObject {
    this.check(resource, namespace, name);
    const obj = this.objects.get(key(resource, namespace, name));
    if (!obj) {
      throw new ClusterLookupError({ reason: "not-found", resource, namespace, name });
    }
    return obj;
  }

  private check(resource: string, namespace: string, name: string): void {
    const k = key(resource, namespace, name);
    this.calls.push(k);
    const reason = this.failures.get(k);
    if (reason) {
      throw new ClusterLookupError({
        reason,
        resource,
        namespace: namespace || undefined,
        name: name || undefined,
      });
    }
  }
}

function key(resource: string, namespace: string, name: string): string {
  return `${resource}/${namespace}/${name}`;
}
