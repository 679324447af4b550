import { ApiException } from "@kubernetes/client-node";
import { describe, expect, it, vi } from "vitest";
import { ClusterLookupError } from "../errors.js";
import { type AppsApi, type BatchApi, type CoreApi, KubeApiClient, classifyApiError, toVolumes } from "./api-client.js";

function notCalled(): Promise<never> {
  return Promise.reject(new Error("unexpected call"));
}

function makeApis(overrides: { core?: Partial<CoreApi>; apps?: Partial<AppsApi>; batch?: Partial<BatchApi> } = {}) {
  const core: CoreApi = {
    listNamespace: notCalled,
    readNamespace: notCalled,
    listNamespacedPod: notCalled,
    ...overrides.core,
  };
  const apps: AppsApi = {
    readNamespacedReplicaSet: notCalled,
    readNamespacedDeployment: notCalled,
    readNamespacedDaemonSet: notCalled,
    readNamespacedStatefulSet: notCalled,
    ...overrides.apps,
  };
  const batch: BatchApi = {
    readNamespacedJob: notCalled,
    readNamespacedCronJob: notCalled,
    ...overrides.batch,
  };
  return new KubeApiClient(core, apps, batch);
}

describe("classifyApiError", () => {
  it("maps HTTP status codes", () => {
    expect(classifyApiError(new ApiException(404, "not found", {}, {}))).toBe("not-found");
    expect(classifyApiError(new ApiException(403, "forbidden", {}, {}))).toBe("forbidden");
    expect(classifyApiError({ statusCode: 401 })).toBe("forbidden");
    expect(classifyApiError({ code: 500 })).toBe("transient");
    expect(classifyApiError(new Error("socket hang up"))).toBe("transient");
  });
});

describe("toVolumes", () => {
  it("keeps hostPath sources only", () => {
    expect(
      toVolumes([
        { name: "tmp", emptyDir: {} },
        { name: "sock", hostPath: { path: "/var/run/docker.sock" } },
      ]),
    ).toEqual([{ name: "tmp" }, { name: "sock", hostPath: { path: "/var/run/docker.sock", type: undefined } }]);
    expect(toVolumes(undefined)).toEqual([]);
  });
});

describe("KubeApiClient", () => {
  it("lists namespace names", async () => {
    const client = makeApis({
      core: {
        listNamespace: async () => ({ items: [{ metadata: { name: "default" } }, { metadata: { name: "ci" } }] }),
      },
    });
    expect(await client.listNamespaces()).toEqual(["default", "ci"]);
  });

  it("maps pods with owners and volumes", async () => {
    const listNamespacedPod = vi.fn(async () => ({
      items: [
        {
          metadata: {
            name: "runner-a",
            namespace: "ci",
            ownerReferences: [{ apiVersion: "apps/v1", kind: "DaemonSet", name: "runner", uid: "u1" }],
          },
          spec: {
            containers: [],
            volumes: [{ name: "sock", hostPath: { path: "/var/run/docker.sock", type: "Socket" } }],
          },
        },
      ],
    }));
    const client = makeApis({ core: { listNamespacedPod } });

    expect(await client.listPods("ci")).toEqual([
      {
        metadata: {
          name: "runner-a",
          namespace: "ci",
          ownerReferences: [{ apiVersion: "apps/v1", kind: "DaemonSet", name: "runner", uid: "u1" }],
        },
        volumes: [{ name: "sock", hostPath: { path: "/var/run/docker.sock", type: "Socket" } }],
      },
    ]);
    expect(listNamespacedPod).toHaveBeenCalledWith({ namespace: "ci" });
  });

  it("reads deployment template volumes", async () => {
    const client = makeApis({
      apps: {
        readNamespacedDeployment: async ({ name }) => ({
          metadata: { name },
          spec: {
            selector: {},
            template: { spec: { containers: [], volumes: [{ name: "logs", hostPath: { path: "/var/log" } }] } },
          },
        }),
      },
    });

    const deployment = await client.getDeployment("web", "frontend");
    expect(deployment.metadata.name).toBe("frontend");
    expect(deployment.volumes).toEqual([{ name: "logs", hostPath: { path: "/var/log", type: undefined } }]);
  });

  it("reads cron job volumes from the job template", async () => {
    const client = makeApis({
      batch: {
        readNamespacedCronJob: async () => ({
          metadata: { name: "nightly" },
          spec: {
            schedule: "0 0 * * *",
            jobTemplate: {
              spec: {
                template: { spec: { containers: [], volumes: [{ name: "d", hostPath: { path: "/run/docker.sock" } }] } },
              },
            },
          },
        }),
      },
    });

    expect((await client.getCronJob("ops", "nightly")).volumes).toEqual([
      { name: "d", hostPath: { path: "/run/docker.sock", type: undefined } },
    ]);
  });

  it("wraps API failures in lookup errors", async () => {
    const client = makeApis({
      apps: { readNamespacedReplicaSet: () => Promise.reject(new ApiException(404, "HTTP-Code: 404", {}, {})) },
    });

    const err = await client.getReplicaSet("web", "frontend-7d9").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ClusterLookupError);
    expect(err).toMatchObject({ reason: "not-found", resource: "replicaset", namespace: "web", resourceName: "frontend-7d9" });
  });
});
