/**
 * Owner chain resolution: pod → top-level controller.
 *
 * Only the first owner reference of any object is considered. Chains are at
 * most two hops (ReplicaSet → Deployment, Job → CronJob).
 */

import type { ClusterClient } from "../cluster/client.js";
import { OwnerChainError, toError } from "../errors.js";
import type {
  OwnerKind,
  OwnerReference,
  PodInstance,
  ResolveOutcome,
  ResolvedController,
  WorkloadKind,
  WorkloadObject,
} from "../types.js";

/** The authoritative owner of an object. */
export function primaryOwner(obj: {
  metadata: { ownerReferences?: OwnerReference[] };
}): OwnerReference | undefined {
  return obj.metadata.ownerReferences?.[0];
}

export function classifyOwnerKind(kind: string): OwnerKind {
  switch (kind) {
    case "ReplicaSet":
    case "DaemonSet":
    case "StatefulSet":
    case "Job":
    case "CronJob":
    case "Node":
      return { kind };
    default:
      return { kind: "Unknown", raw: kind };
  }
}

export async function resolveOwner(
  client: ClusterClient,
  namespace: string,
  pod: PodInstance,
): Promise<ResolveOutcome> {
  const owner = primaryOwner(pod);
  if (!owner) return { type: "unowned" };

  const ownerKind = classifyOwnerKind(owner.kind);
  try {
    switch (ownerKind.kind) {
      case "ReplicaSet":
        return controller(await resolveReplicaSet(client, namespace, owner.name));
      case "DaemonSet":
        return controller(
          toController(namespace, "DaemonSet", owner.name, await client.getDaemonSet(namespace, owner.name)),
        );
      case "StatefulSet":
        return controller(
          toController(
            namespace,
            "StatefulSet",
            owner.name,
            await client.getStatefulSet(namespace, owner.name),
          ),
        );
      case "Job":
        return controller(await resolveJob(client, namespace, owner.name));
      case "CronJob":
        return controller(
          toController(namespace, "CronJob", owner.name, await client.getCronJob(namespace, owner.name)),
        );
      case "Node":
        return { type: "static-pod" };
      case "Unknown":
        return { type: "unknown-owner-kind", ownerKind: ownerKind.raw };
      default:
        return assertNever(ownerKind);
    }
  } catch (err) {
    return { type: "failed", error: toError(err) };
  }
}

/** ReplicaSets are never top-level: follow to the owning Deployment. */
async function resolveReplicaSet(
  client: ClusterClient,
  namespace: string,
  name: string,
): Promise<ResolvedController> {
  const replicaSet = await client.getReplicaSet(namespace, name);
  const owner = primaryOwner(replicaSet);
  if (!owner) {
    throw new OwnerChainError(namespace, "ReplicaSet", name, "has no owner reference");
  }
  if (owner.kind !== "Deployment") {
    throw new OwnerChainError(namespace, "ReplicaSet", name, `is owned by unsupported kind ${owner.kind}`);
  }
  const deployment = await client.getDeployment(namespace, owner.name);
  return toController(namespace, "Deployment", owner.name, deployment);
}

/** A Job is top-level unless a CronJob owns it. */
async function resolveJob(
  client: ClusterClient,
  namespace: string,
  name: string,
): Promise<ResolvedController> {
  const job = await client.getJob(namespace, name);
  const owner = primaryOwner(job);
  if (!owner) return toController(namespace, "Job", name, job);
  if (owner.kind !== "CronJob") {
    throw new OwnerChainError(namespace, "Job", name, `is owned by unsupported kind ${owner.kind}`);
  }
  const cron = await client.getCronJob(namespace, owner.name);
  return toController(namespace, "CronJob", owner.name, cron);
}

function toController(
  namespace: string,
  kind: WorkloadKind,
  requestedName: string,
  obj: WorkloadObject,
): ResolvedController {
  return { namespace, kind, name: obj.metadata.name || requestedName, volumes: obj.volumes };
}

function controller(resolved: ResolvedController): ResolveOutcome {
  return { type: "controller", controller: resolved };
}

function assertNever(value: never): never {
  throw new Error(`unhandled owner kind: ${JSON.stringify(value)}`);
}
