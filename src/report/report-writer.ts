/**
 * Report rendering: an aligned table (or JSON) of verdict rows.
 *
 * Not-mounted rows are only included in verbose mode. The header is always
 * present, so a clean run prints a header-only table.
 */

import type { ExposureVerdict, FileVerdict } from "../types.js";

export const CLUSTER_COLUMNS = ["NAMESPACE", "TYPE", "NAME", "STATUS"] as const;
export const FILE_COLUMNS = ["FILE", "LINE", "STATUS"] as const;

export type MountStatus = "mounted" | "not-mounted";

export interface ReportOptions {
  verbose: boolean;
  json: boolean;
}

export interface ClusterReportRow {
  namespace: string;
  type: string;
  name: string;
  status: MountStatus;
  volume?: string;
  path?: string;
}

export interface FileReportRow {
  file: string;
  line: number;
  status: MountStatus;
}

const COLUMN_GAP = "   ";

/**
 * Buffers rows and pads every column to its widest cell on render.
 */
export class TableWriter {
  private readonly rows: string[][] = [];

  constructor(private readonly headers: readonly string[]) {}

  addRow(cells: readonly string[]): void {
    this.rows.push(this.headers.map((_, i) => cells[i] ?? ""));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  render(): string {
    const all = [[...this.headers], ...this.rows];
    const widths = this.headers.map((_, i) => Math.max(...all.map((row) => (row[i] ?? "").length)));
    const lines = all.map((row) =>
      row
        .map((cell, i) => cell.padEnd(widths[i] ?? 0))
        .join(COLUMN_GAP)
        .trimEnd(),
    );
    return `${lines.join("\n")}\n`;
  }
}

function status(mounted: boolean): MountStatus {
  return mounted ? "mounted" : "not-mounted";
}

export function clusterRows(verdicts: readonly ExposureVerdict[], verbose: boolean): ClusterReportRow[] {
  return verdicts
    .filter((v) => v.mounted || verbose)
    .map((v) => {
      const row: ClusterReportRow = {
        namespace: v.namespace,
        type: v.kind.toLowerCase(),
        name: v.name,
        status: status(v.mounted),
      };
      if (v.evidence) {
        row.volume = v.evidence.volumeName;
        row.path = v.evidence.path;
      }
      return row;
    });
}

export function fileRows(verdicts: readonly FileVerdict[], verbose: boolean): FileReportRow[] {
  return verdicts
    .filter((v) => v.mounted || verbose)
    .map((v) => ({ file: v.file, line: v.line, status: status(v.mounted) }));
}

export function renderClusterReport(verdicts: readonly ExposureVerdict[], options: ReportOptions): string {
  const rows = clusterRows(verdicts, options.verbose);
  if (options.json) return `${JSON.stringify(rows, null, 2)}\n`;

  const table = new TableWriter(CLUSTER_COLUMNS);
  for (const row of rows) table.addRow([row.namespace, row.type, row.name, row.status]);
  return table.render();
}

export function renderFileReport(verdicts: readonly FileVerdict[], options: ReportOptions): string {
  const rows = fileRows(verdicts, options.verbose);
  if (options.json) return `${JSON.stringify(rows, null, 2)}\n`;

  const table = new TableWriter(FILE_COLUMNS);
  for (const row of rows) table.addRow([row.file, String(row.line), row.status]);
  return table.render();
}
