/**
 * kubectl CLI wrapper — read-only `kubectl get` calls returning raw JSON.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface KubectlOptions {
  namespace?: string;
  context?: string;
  kubeconfig?: string;
}

/** Run a kubectl command and return stdout. */
async function runKubectl(
  args: string[],
  options: KubectlOptions = {},
): Promise<string> {
  const fullArgs = [...args];
  if (options.namespace) fullArgs.push("-n", options.namespace);
  if (options.context) fullArgs.push("--context", options.context);
  if (options.kubeconfig) fullArgs.push("--kubeconfig", options.kubeconfig);

  const { stdout } = await execFileAsync("kubectl", fullArgs, {
    maxBuffer: 50 * 1024 * 1024,
  });
  return stdout;
}

/** Run `kubectl get <resource> [name] -o json`. */
export async function kubectlGet(
  resource: string,
  options: KubectlOptions & { name?: string } = {},
): Promise<string> {
  const args = ["get", resource, "-o", "json"];
  if (options.name) args.splice(2, 0, options.name);
  return runKubectl(args, options);
}

/** Run `kubectl get namespaces -o json`. */
export async function kubectlGetNamespaces(
  options: Omit<KubectlOptions, "namespace"> = {},
): Promise<string> {
  return runKubectl(["get", "namespaces", "-o", "json"], options);
}

/** Text kubectl wrote to stderr, when the error carries it. */
export function kubectlStderr(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err) {
    const { stderr } = err;
    if (typeof stderr === "string") return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString("utf-8").trim();
  }
  return err instanceof Error ? err.message : String(err);
}
