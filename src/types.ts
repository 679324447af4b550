/**
 * Audit types — pods, owner references, workloads, verdicts.
 */

/* ---------- K8s objects ---------- */

export interface OwnerReference {
  kind: string;
  name: string;
  apiVersion?: string;
  uid?: string;
}

export interface ObjectMeta {
  name: string;
  namespace?: string;
  ownerReferences?: OwnerReference[];
}

export interface HostPathSource {
  path: string;
  type?: string;
}

/** A pod volume declaration. Only `hostPath` sources matter to the audit. */
export interface Volume {
  name: string;
  hostPath?: HostPathSource;
}

export interface PodInstance {
  metadata: ObjectMeta;
  volumes: Volume[];
}

/** An object read only for its owner references (ReplicaSet, owned Job). */
export interface OwnedObject {
  metadata: ObjectMeta;
}

/** A controller object; `volumes` are its pod template volumes. */
export interface WorkloadObject extends OwnedObject {
  volumes: Volume[];
}

/* ---------- Kinds ---------- */

export const WORKLOAD_KINDS = ["Deployment", "DaemonSet", "StatefulSet", "Job", "CronJob"] as const;

export type WorkloadKind = (typeof WORKLOAD_KINDS)[number];

/**
 * Closed set of pod owner kinds the resolver dispatches on.
 * Anything not listed classifies as `Unknown`.
 */
export type OwnerKind =
  | { kind: "ReplicaSet" }
  | { kind: "DaemonSet" }
  | { kind: "StatefulSet" }
  | { kind: "Job" }
  | { kind: "CronJob" }
  | { kind: "Node" }
  | { kind: "Unknown"; raw: string };

/** Kinds that appear in the TYPE column. */
export type ReportKind = WorkloadKind | "Pod";

/* ---------- Resolution ---------- */

export interface ResolvedController {
  namespace: string;
  kind: WorkloadKind;
  name: string;
  volumes: Volume[];
}

export type ResolveOutcome =
  | { type: "controller"; controller: ResolvedController }
  | { type: "unowned" }
  | { type: "static-pod" }
  | { type: "unknown-owner-kind"; ownerKind: string }
  | { type: "failed"; error: Error };

/* ---------- Verdicts ---------- */

export interface MountEvidence {
  /** Position of the matching declaration in the volume list. */
  index: number;
  volumeName: string;
  path: string;
}

export interface ExposureVerdict {
  namespace: string;
  kind: ReportKind;
  name: string;
  mounted: boolean;
  evidence?: MountEvidence;
}

export interface FileVerdict {
  file: string;
  /** 1-based line of the first match, 0 when not mounted. */
  line: number;
  mounted: boolean;
}

export interface RunResult<V> {
  verdicts: V[];
  errors: Error[];
  exposureFound: boolean;
}
