/**
 * One namespace, end to end: pods → owners → unique controllers → verdicts.
 */

import type { ClusterClient } from "../cluster/client.js";
import { toError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { ExposureVerdict, PodInstance } from "../types.js";
import { ControllerAggregator } from "./aggregator.js";
import { resolveOwner } from "./owner-resolver.js";
import { inspectWorkload } from "./volume-inspector.js";

export interface ScanContext {
  client: ClusterClient;
  target: string;
  logger: Logger;
}

export interface NamespaceScanResult {
  namespace: string;
  verdicts: ExposureVerdict[];
  /** Non-fatal failures; verdicts above are still valid. */
  errors: Error[];
}

export async function scanNamespace(namespace: string, ctx: ScanContext): Promise<NamespaceScanResult> {
  const log = ctx.logger.withContext({ namespace });
  const verdicts: ExposureVerdict[] = [];
  const errors: Error[] = [];

  let pods: PodInstance[];
  try {
    pods = await ctx.client.listPods(namespace);
  } catch (err) {
    log.debug("pod listing failed", { err: toError(err) });
    return { namespace, verdicts, errors: [toError(err)] };
  }
  log.debug(`listed ${pods.length} pods`);

  const aggregator = new ControllerAggregator();

  for (const pod of pods) {
    if (pod.volumes.length === 0) continue;
    const podName = pod.metadata.name;

    const outcome = await resolveOwner(ctx.client, namespace, pod);
    switch (outcome.type) {
      case "controller":
        if (aggregator.observe(outcome.controller)) {
          log.trace(`found ${outcome.controller.kind} ${outcome.controller.name}`, { pod: podName });
        }
        break;
      case "unowned":
        verdicts.push(inspectWorkload({ namespace, kind: "Pod", name: podName }, pod.volumes, ctx.target));
        break;
      case "static-pod":
        break;
      case "unknown-owner-kind":
        log
          .withContext({ pod: podName })
          .warn(`could not find resource manager for type ${outcome.ownerKind} for pod ${podName}`);
        break;
      case "failed":
        log.withContext({ pod: podName }).debug("owner resolution failed", { err: outcome.error });
        errors.push(outcome.error);
        break;
    }
  }

  for (const controller of aggregator.drainAll()) {
    const subject = { namespace, kind: controller.kind, name: controller.name };
    verdicts.push(inspectWorkload(subject, controller.volumes, ctx.target));
  }

  return { namespace, verdicts, errors };
}
