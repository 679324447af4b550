import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

/* ---------- mock setup ---------- */

// Directories listed here fail to list, as an unreadable directory would.
const unreadableDirs = vi.hoisted(() => new Set<string>());

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readdir: (dir: string, options: { withFileTypes: true }) => {
      if (unreadableDirs.has(dir)) {
        const err = Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: "EACCES" });
        return Promise.reject(err);
      }
      return actual.readdir(dir, options);
    },
  };
});

import { FileScanError, SetupError } from "../errors.js";
import { collectFiles, firstMatchingLine, scanFiles, searchFile } from "./file-scanner.js";

let root: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "sock-audit-files-"));
});

afterEach(() => {
  unreadableDirs.clear();
  rmSync(root, { recursive: true, force: true });
});

function manifestWithSocketOnLine(line: number): string {
  const lines = Array.from({ length: 10 }, (_, i) => `# line ${i + 1}`);
  lines[line - 1] = "      path: /var/run/docker.sock";
  return lines.join("\n");
}

describe("firstMatchingLine", () => {
  it("returns the 1-based line of the first match", () => {
    expect(firstMatchingLine("a\nb docker.sock\nc docker.sock", "docker.sock")).toBe(2);
  });

  it("returns 0 without a match", () => {
    expect(firstMatchingLine("a\nb\n", "docker.sock")).toBe(0);
  });

  it("is case-sensitive", () => {
    expect(firstMatchingLine("/run/DOCKER.SOCK", "docker.sock")).toBe(0);
  });

  it("handles CRLF line endings", () => {
    expect(firstMatchingLine("a\r\nb\r\n/var/run/docker.sock\r\n", "docker.sock")).toBe(3);
  });
});

describe("collectFiles", () => {
  it("returns a single file as a one-element set", async () => {
    const file = join(root, "pod.yaml");
    writeFileSync(file, "kind: Pod\n");
    expect(await collectFiles(file)).toEqual({ files: [file], errors: [] });
  });

  it("walks nested directories in sorted order", async () => {
    mkdirSync(join(root, "b", "deep"), { recursive: true });
    writeFileSync(join(root, "z.yaml"), "");
    writeFileSync(join(root, "b", "deep", "x.yaml"), "");
    writeFileSync(join(root, "a.yaml"), "");

    const { files } = await collectFiles(root);
    expect(files).toEqual([join(root, "a.yaml"), join(root, "b", "deep", "x.yaml"), join(root, "z.yaml")]);
  });

  it("does not follow symbolic links", async () => {
    mkdirSync(join(root, "manifests"));
    writeFileSync(join(root, "manifests", "ds.yaml"), "");
    symlinkSync(join(root, "manifests"), join(root, "manifests", "loop"));
    symlinkSync(join(root, "manifests", "ds.yaml"), join(root, "alias.yaml"));

    expect(await collectFiles(root)).toEqual({ files: [join(root, "manifests", "ds.yaml")], errors: [] });
  });

  it("fails fatally for a missing path", async () => {
    const missing = join(root, "missing");
    await expect(collectFiles(missing)).rejects.toThrow(SetupError);
    await expect(collectFiles(missing)).rejects.toThrow(`unable to open file: ${missing}`);
  });

  it("records an unreadable directory and keeps walking", async () => {
    const locked = join(root, "locked");
    mkdirSync(locked);
    writeFileSync(join(root, "a.yaml"), "");
    unreadableDirs.add(locked);

    const { files, errors } = await collectFiles(root);
    expect(files).toEqual([join(root, "a.yaml")]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(FileScanError);
    expect(errors[0]?.message).toBe(
      `unable to read directory ${locked}: EACCES: permission denied, scandir '${locked}'`,
    );
  });
});

describe("searchFile", () => {
  it("reads the file and reports the first matching line", async () => {
    const file = join(root, "ds.yaml");
    writeFileSync(file, manifestWithSocketOnLine(4));
    expect(await searchFile(file, "docker.sock")).toBe(4);
  });
});

describe("scanFiles", () => {
  it("reports every file with the matching line of the exposed one", async () => {
    writeFileSync(join(root, "a.yaml"), "kind: Deployment\n");
    writeFileSync(join(root, "b.yaml"), manifestWithSocketOnLine(7));
    writeFileSync(join(root, "c.yaml"), "kind: Service\n");

    const result = await scanFiles(root, "docker.sock");
    expect(result.verdicts).toEqual([
      { file: join(root, "a.yaml"), line: 0, mounted: false },
      { file: join(root, "b.yaml"), line: 7, mounted: true },
      { file: join(root, "c.yaml"), line: 0, mounted: false },
    ]);
    expect(result.errors).toEqual([]);
    expect(result.exposureFound).toBe(true);
  });

  it("reports no exposure for clean trees", async () => {
    writeFileSync(join(root, "a.yaml"), "kind: Deployment\n");
    const result = await scanFiles(root, "docker.sock");
    expect(result.exposureFound).toBe(false);
  });

  it("still scans the readable files when a directory cannot be listed", async () => {
    const locked = join(root, "locked");
    mkdirSync(locked);
    writeFileSync(join(locked, "hidden.yaml"), "path: /var/run/docker.sock\n");
    writeFileSync(join(root, "a.yaml"), "kind: DaemonSet\npath: /var/run/docker.sock\n");
    unreadableDirs.add(locked);

    const result = await scanFiles(root, "docker.sock");
    expect(result.verdicts).toEqual([{ file: join(root, "a.yaml"), line: 2, mounted: true }]);
    expect(result.errors.map((e) => e.message)).toEqual([
      `unable to read directory ${locked}: EACCES: permission denied, scandir '${locked}'`,
    ]);
    expect(result.exposureFound).toBe(true);
  });

  it("honours a custom target", async () => {
    writeFileSync(join(root, "a.yaml"), "x\npath: /run/containerd/containerd.sock\n");
    const result = await scanFiles(root, "containerd.sock");
    expect(result.verdicts).toEqual([{ file: join(root, "a.yaml"), line: 2, mounted: true }]);
  });
});
