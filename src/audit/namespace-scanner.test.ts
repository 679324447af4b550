import { describe, expect, it } from "vitest";
import { ClusterLookupError } from "../errors.js";
import { FakeClusterClient, emptyDirVolume, hostPathVolume, makePod } from "../test-utils/fake-cluster.js";
import { createMemoryLogger } from "../test-utils/memory-logger.js";
import { scanNamespace } from "./namespace-scanner.js";

const sock = hostPathVolume("sock", "/var/run/docker.sock");
const logs = hostPathVolume("logs", "/var/log");

function context(client: FakeClusterClient) {
  const { logger, transport } = createMemoryLogger();
  return { ctx: { client, target: "docker.sock", logger }, transport };
}

describe("scanNamespace", () => {
  it("reports one row for many pods behind the same Deployment", async () => {
    const client = new FakeClusterClient()
      .addObject("replicaset", "apps", "web-1", { owner: { kind: "Deployment", name: "web" } })
      .addObject("replicaset", "apps", "web-2", { owner: { kind: "Deployment", name: "web" } })
      .addObject("deployment", "apps", "web", { volumes: [sock] })
      .addNamespace("apps", [
        makePod("web-1-a", { owner: { kind: "ReplicaSet", name: "web-1" }, volumes: [sock] }),
        makePod("web-1-b", { owner: { kind: "ReplicaSet", name: "web-1" }, volumes: [sock] }),
        makePod("web-2-a", { owner: { kind: "ReplicaSet", name: "web-2" }, volumes: [sock] }),
        makePod("web-2-b", { owner: { kind: "ReplicaSet", name: "web-2" }, volumes: [sock] }),
        makePod("web-2-c", { owner: { kind: "ReplicaSet", name: "web-2" }, volumes: [sock] }),
      ]);
    const { ctx } = context(client);

    const result = await scanNamespace("apps", ctx);
    expect(result.errors).toEqual([]);
    expect(result.verdicts).toEqual([
      {
        namespace: "apps",
        kind: "Deployment",
        name: "web",
        mounted: true,
        evidence: { index: 0, volumeName: "sock", path: "/var/run/docker.sock" },
      },
    ]);
  });

  it("inspects the controller template, not the pod volumes", async () => {
    const client = new FakeClusterClient()
      .addObject("daemonset", "ops", "agent", { volumes: [logs] })
      .addNamespace("ops", [makePod("agent-x", { owner: { kind: "DaemonSet", name: "agent" }, volumes: [sock] })]);
    const { ctx } = context(client);

    const result = await scanNamespace("ops", ctx);
    expect(result.verdicts).toEqual([{ namespace: "ops", kind: "DaemonSet", name: "agent", mounted: false }]);
  });

  it("inspects unowned pods directly", async () => {
    const client = new FakeClusterClient().addNamespace("dev", [makePod("debug", { volumes: [logs, sock] })]);
    const { ctx } = context(client);

    const result = await scanNamespace("dev", ctx);
    expect(result.verdicts).toEqual([
      {
        namespace: "dev",
        kind: "Pod",
        name: "debug",
        mounted: true,
        evidence: { index: 1, volumeName: "sock", path: "/var/run/docker.sock" },
      },
    ]);
  });

  it("skips pods without volumes before resolving owners", async () => {
    const client = new FakeClusterClient().addNamespace("apps", [
      makePod("plain", { owner: { kind: "ReplicaSet", name: "missing" } }),
    ]);
    const { ctx } = context(client);

    const result = await scanNamespace("apps", ctx);
    expect(result).toEqual({ namespace: "apps", verdicts: [], errors: [] });
    expect(client.calls).toEqual(["pods/apps/"]);
  });

  it("drops static pods silently", async () => {
    const client = new FakeClusterClient().addNamespace("kube-system", [
      makePod("etcd-node1", { owner: { kind: "Node", name: "node1" }, volumes: [sock] }),
    ]);
    const { ctx, transport } = context(client);

    const result = await scanNamespace("kube-system", ctx);
    expect(result.verdicts).toEqual([]);
    expect(result.errors).toEqual([]);
    expect(transport.messages("warn")).toEqual([]);
  });

  it("warns about unknown owner kinds and keeps going", async () => {
    const client = new FakeClusterClient()
      .addObject("statefulset", "vms", "db", { volumes: [sock] })
      .addNamespace("vms", [
        makePod("vm-pod", { owner: { kind: "VirtualMachineInstance", name: "vm" }, volumes: [sock] }),
        makePod("db-0", { owner: { kind: "StatefulSet", name: "db" }, volumes: [sock] }),
      ]);
    const { ctx, transport } = context(client);

    const result = await scanNamespace("vms", ctx);
    expect(transport.messages("warn")).toEqual([
      "could not find resource manager for type VirtualMachineInstance for pod vm-pod",
    ]);
    expect(transport.entries.find((e) => e.level === "warn")?.pod).toBe("vm-pod");
    expect(result.verdicts.map((v) => `${v.kind}/${v.name}`)).toEqual(["StatefulSet/db"]);
    expect(result.errors).toEqual([]);
  });

  it("records a failed lookup and still reports the other pods", async () => {
    const client = new FakeClusterClient()
      .addObject("replicaset", "apps", "rs-web", { owner: { kind: "Deployment", name: "web" } })
      .addObject("deployment", "apps", "web", { volumes: [sock] })
      .addObject("daemonset", "apps", "agent", { volumes: [logs] })
      .addObject("statefulset", "apps", "db", { volumes: [emptyDirVolume("data")] })
      .addObject("job", "apps", "migrate", { volumes: [sock] })
      .fail("replicaset", "apps", "rs-broken", "forbidden")
      .addNamespace("apps", [
        makePod("a", { owner: { kind: "ReplicaSet", name: "rs-web" }, volumes: [sock] }),
        makePod("b", { owner: { kind: "DaemonSet", name: "agent" }, volumes: [logs] }),
        makePod("c", { owner: { kind: "StatefulSet", name: "db" }, volumes: [emptyDirVolume("data")] }),
        makePod("d", { owner: { kind: "Job", name: "migrate" }, volumes: [sock] }),
        makePod("e", { owner: { kind: "ReplicaSet", name: "rs-broken" }, volumes: [sock] }),
      ]);
    const { ctx } = context(client);

    const result = await scanNamespace("apps", ctx);
    expect(result.verdicts.map((v) => [v.kind, v.name, v.mounted])).toEqual([
      ["Deployment", "web", true],
      ["DaemonSet", "agent", false],
      ["StatefulSet", "db", false],
      ["Job", "migrate", true],
    ]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.message).toBe('unable to fetch replicaset "rs-broken" in namespace "apps" (forbidden)');
  });

  it("returns the listing failure as the only error", async () => {
    const client = new FakeClusterClient().addNamespace("locked").fail("pods", "locked", "", "forbidden");
    const { ctx } = context(client);

    const result = await scanNamespace("locked", ctx);
    expect(result.verdicts).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(ClusterLookupError);
  });

  it("uses the configured target", async () => {
    const client = new FakeClusterClient().addNamespace("dev", [
      makePod("runtime", { volumes: [hostPathVolume("crio", "/var/run/crio/crio.sock")] }),
    ]);
    const { logger } = createMemoryLogger();

    const result = await scanNamespace("dev", { client, target: "crio.sock", logger });
    expect(result.verdicts[0]?.mounted).toBe(true);
  });
});
