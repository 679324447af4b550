/**
 * ClusterClient backed by the Kubernetes API (@kubernetes/client-node).
 */

import * as k8s from "@kubernetes/client-node";

import { ClusterLookupError, SetupError, type LookupFailureReason } from "../errors.js";
import type { ObjectMeta, OwnedObject, PodInstance, Volume, WorkloadObject } from "../types.js";
import type { ClusterClient, ClusterClientOptions } from "./client.js";

// The slices of the generated API classes this client calls.

export interface CoreApi {
  listNamespace(): Promise<k8s.V1NamespaceList>;
  readNamespace(param: { name: string }): Promise<k8s.V1Namespace>;
  listNamespacedPod(param: { namespace: string }): Promise<k8s.V1PodList>;
}

export interface AppsApi {
  readNamespacedReplicaSet(param: { name: string; namespace: string }): Promise<k8s.V1ReplicaSet>;
  readNamespacedDeployment(param: { name: string; namespace: string }): Promise<k8s.V1Deployment>;
  readNamespacedDaemonSet(param: { name: string; namespace: string }): Promise<k8s.V1DaemonSet>;
  readNamespacedStatefulSet(param: { name: string; namespace: string }): Promise<k8s.V1StatefulSet>;
}

export interface BatchApi {
  readNamespacedJob(param: { name: string; namespace: string }): Promise<k8s.V1Job>;
  readNamespacedCronJob(param: { name: string; namespace: string }): Promise<k8s.V1CronJob>;
}

/* ---------- kubeconfig ---------- */

export function loadKubeConfig(options: ClusterClientOptions = {}): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    if (options.kubeconfig) kc.loadFromFile(options.kubeconfig);
    else kc.loadFromDefault();
    if (options.context) kc.setCurrentContext(options.context);
  } catch (err) {
    throw new SetupError(`error loading kubeconfig: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  if (!kc.getCurrentCluster()) {
    throw new SetupError("error loading kubeconfig: no current cluster configured");
  }
  return kc;
}

/* ---------- mapping ---------- */

export function toObjectMeta(meta: k8s.V1ObjectMeta | undefined): ObjectMeta {
  return {
    name: meta?.name ?? "",
    namespace: meta?.namespace,
    ownerReferences: (meta?.ownerReferences ?? []).map((ref) => ({
      apiVersion: ref.apiVersion,
      kind: ref.kind,
      name: ref.name,
      uid: ref.uid,
    })),
  };
}

export function toVolumes(volumes: k8s.V1Volume[] | undefined): Volume[] {
  return (volumes ?? []).map((v) =>
    v.hostPath
      ? { name: v.name, hostPath: { path: v.hostPath.path, type: v.hostPath.type } }
      : { name: v.name },
  );
}

export function toPodInstance(pod: k8s.V1Pod): PodInstance {
  return { metadata: toObjectMeta(pod.metadata), volumes: toVolumes(pod.spec?.volumes) };
}

function toTemplated(obj: {
  metadata?: k8s.V1ObjectMeta;
  spec?: { template?: k8s.V1PodTemplateSpec };
}): WorkloadObject {
  return { metadata: toObjectMeta(obj.metadata), volumes: toVolumes(obj.spec?.template?.spec?.volumes) };
}

/* ---------- errors ---------- */

/** HTTP status carried by a client-node failure, if any. */
export function lookupStatus(err: unknown): number | undefined {
  if (err instanceof k8s.ApiException) return err.code;
  if (typeof err === "object" && err !== null) {
    if ("code" in err && typeof err.code === "number") return err.code;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return undefined;
}

export function classifyApiError(err: unknown): LookupFailureReason {
  const status = lookupStatus(err);
  if (status === 404) return "not-found";
  if (status === 401 || status === 403) return "forbidden";
  return "transient";
}

/* ---------- client ---------- */

export class KubeApiClient implements ClusterClient {
  constructor(
    private readonly core: CoreApi,
    private readonly apps: AppsApi,
    private readonly batch: BatchApi,
  ) {}

  static fromKubeConfig(options: ClusterClientOptions = {}): KubeApiClient {
    const kc = loadKubeConfig(options);
    return new KubeApiClient(
      kc.makeApiClient(k8s.CoreV1Api),
      kc.makeApiClient(k8s.AppsV1Api),
      kc.makeApiClient(k8s.BatchV1Api),
    );
  }

  async listNamespaces(): Promise<string[]> {
    const list = await this.call("namespaces", {}, () => this.core.listNamespace());
    return list.items.map((ns) => ns.metadata?.name ?? "").filter((name) => name !== "");
  }

  async getNamespace(name: string): Promise<string> {
    const ns = await this.call("namespace", { name }, () => this.core.readNamespace({ name }));
    return ns.metadata?.name ?? name;
  }

  async listPods(namespace: string): Promise<PodInstance[]> {
    const list = await this.call("pods", { namespace }, () => this.core.listNamespacedPod({ namespace }));
    return list.items.map(toPodInstance);
  }

  async getReplicaSet(namespace: string, name: string): Promise<OwnedObject> {
    const rs = await this.call("replicaset", { namespace, name }, () =>
      this.apps.readNamespacedReplicaSet({ name, namespace }),
    );
    return { metadata: toObjectMeta(rs.metadata) };
  }

  async getDeployment(namespace: string, name: string): Promise<WorkloadObject> {
    return toTemplated(
      await this.call("deployment", { namespace, name }, () =>
        this.apps.readNamespacedDeployment({ name, namespace }),
      ),
    );
  }

  async getDaemonSet(namespace: string, name: string): Promise<WorkloadObject> {
    return toTemplated(
      await this.call("daemonset", { namespace, name }, () =>
        this.apps.readNamespacedDaemonSet({ name, namespace }),
      ),
    );
  }

  async getStatefulSet(namespace: string, name: string): Promise<WorkloadObject> {
    return toTemplated(
      await this.call("statefulset", { namespace, name }, () =>
        this.apps.readNamespacedStatefulSet({ name, namespace }),
      ),
    );
  }

  async getJob(namespace: string, name: string): Promise<WorkloadObject> {
    return toTemplated(
      await this.call("job", { namespace, name }, () => this.batch.readNamespacedJob({ name, namespace })),
    );
  }

  async getCronJob(namespace: string, name: string): Promise<WorkloadObject> {
    const cron = await this.call("cronjob", { namespace, name }, () =>
      this.batch.readNamespacedCronJob({ name, namespace }),
    );
    return {
      metadata: toObjectMeta(cron.metadata),
      volumes: toVolumes(cron.spec?.jobTemplate.spec?.template.spec?.volumes),
    };
  }

  private async call<T>(
    resource: string,
    target: { namespace?: string; name?: string },
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw new ClusterLookupError({
        reason: classifyApiError(err),
        resource,
        ...target,
        detail: err instanceof Error ? err.message : undefined,
        cause: err,
      });
    }
  }
}
