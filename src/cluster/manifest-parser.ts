/**
 * Parse `kubectl get -o json` output into the audit's object model.
 * Only the fields the audit reads are validated; everything else is dropped.
 */

import { z } from "zod";
import type { ObjectMeta, OwnedObject, PodInstance, Volume, WorkloadObject } from "../types.js";

/* ---------- schemas ---------- */

const ownerReferenceSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string(),
  name: z.string(),
  uid: z.string().optional(),
});

const metadataSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
  ownerReferences: z.array(ownerReferenceSchema).optional(),
});

const volumeSchema = z.object({
  name: z.string(),
  hostPath: z
    .object({
      path: z.string(),
      type: z.string().optional(),
    })
    .optional(),
});

const podSpecSchema = z.object({
  volumes: z.array(volumeSchema).optional(),
});

const podTemplateSchema = z.object({
  spec: podSpecSchema.optional(),
});

const podSchema = z.object({
  metadata: metadataSchema,
  spec: podSpecSchema.optional(),
});

/** Deployment, DaemonSet, StatefulSet, Job, ReplicaSet. */
const templatedSchema = z.object({
  metadata: metadataSchema,
  spec: z.object({ template: podTemplateSchema.optional() }).optional(),
});

const cronJobSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      jobTemplate: z
        .object({
          spec: z.object({ template: podTemplateSchema.optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
});

const namespaceSchema = z.object({ metadata: z.object({ name: z.string() }) });

const listSchema = <T extends z.ZodTypeAny>(item: T) => z.object({ items: z.array(item) });

/* ---------- errors ---------- */

export class ManifestParseError extends Error {
  readonly resource: string;

  constructor(resource: string, detail: string) {
    super(`unexpected kubectl output for ${resource}: ${detail}`);
    this.name = "ManifestParseError";
    this.resource = resource;
  }
}

function parseJson<T extends z.ZodTypeAny>(schema: T, json: string, resource: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ManifestParseError(resource, err instanceof Error ? err.message : String(err));
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? issue.path.join(".") : "(root)";
    throw new ManifestParseError(resource, `${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

/* ---------- normalizers ---------- */

function normalizeMetadata(meta: z.infer<typeof metadataSchema>): ObjectMeta {
  return {
    name: meta.name,
    namespace: meta.namespace,
    ownerReferences: meta.ownerReferences ?? [],
  };
}

function normalizeVolumes(volumes: Array<z.infer<typeof volumeSchema>> | undefined): Volume[] {
  return (volumes ?? []).map((v) => (v.hostPath ? { name: v.name, hostPath: v.hostPath } : { name: v.name }));
}

function normalizePod(pod: z.infer<typeof podSchema>): PodInstance {
  return {
    metadata: normalizeMetadata(pod.metadata),
    volumes: normalizeVolumes(pod.spec?.volumes),
  };
}

/* ---------- public parsers ---------- */

export function parseNamespaceList(json: string): string[] {
  return parseJson(listSchema(namespaceSchema), json, "namespaces").items.map((ns) => ns.metadata.name);
}

export function parseNamespace(json: string): string {
  return parseJson(namespaceSchema, json, "namespace").metadata.name;
}

export function parsePodList(json: string): PodInstance[] {
  return parseJson(listSchema(podSchema), json, "pods").items.map(normalizePod);
}

export function parseOwnedObject(json: string, resource: string): OwnedObject {
  return { metadata: normalizeMetadata(parseJson(templatedSchema, json, resource).metadata) };
}

/** Parse an object whose pod template sits at `spec.template`. */
export function parseTemplatedWorkload(json: string, resource: string): WorkloadObject {
  const obj = parseJson(templatedSchema, json, resource);
  return {
    metadata: normalizeMetadata(obj.metadata),
    volumes: normalizeVolumes(obj.spec?.template?.spec?.volumes),
  };
}

/** CronJob pod templates sit at `spec.jobTemplate.spec.template`. */
export function parseCronJob(json: string): WorkloadObject {
  const obj = parseJson(cronJobSchema, json, "cronjob");
  return {
    metadata: normalizeMetadata(obj.metadata),
    volumes: normalizeVolumes(obj.spec?.jobTemplate?.spec?.template?.spec?.volumes),
  };
}
