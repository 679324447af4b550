/**
 * Host-path volume inspection.
 */

import type { ExposureVerdict, MountEvidence, ReportKind, Volume } from "../types.js";

export interface VolumeInspection {
  mounted: boolean;
  evidence?: MountEvidence;
}

/**
 * Scan host-path volumes for `target` as a literal, case-sensitive substring
 * of the path. Stops at the first match; volumes without a host path are
 * skipped.
 */
export function inspectVolumes(volumes: readonly Volume[], target: string): VolumeInspection {
  for (const [index, volume] of volumes.entries()) {
    const path = volume.hostPath?.path;
    if (path === undefined) continue;
    if (path.includes(target)) {
      return { mounted: true, evidence: { index, volumeName: volume.name, path } };
    }
  }
  return { mounted: false };
}

export function toVerdict(
  subject: { namespace: string; kind: ReportKind; name: string },
  inspection: VolumeInspection,
): ExposureVerdict {
  const verdict: ExposureVerdict = { ...subject, mounted: inspection.mounted };
  if (inspection.evidence) verdict.evidence = inspection.evidence;
  return verdict;
}

/** Inspect and wrap in one step. */
export function inspectWorkload(
  subject: { namespace: string; kind: ReportKind; name: string },
  volumes: readonly Volume[],
  target: string,
): ExposureVerdict {
  return toVerdict(subject, inspectVolumes(volumes, target));
}
