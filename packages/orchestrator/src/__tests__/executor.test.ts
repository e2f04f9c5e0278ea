import { describe, it, expect } from "vitest";
import {
  FatalApplyError,
  MissingCredentialError,
  TransientApplyError,
} from "@labfleet/shared";
import type { ItemState, Manifest, PlanOptions, ResourceKind, WorkItem } from "@labfleet/shared";
import { buildPhaseGraph } from "../deploy/dependency-graph.js";
import { diff } from "../deploy/diff.js";
import { PhasedExecutor, type ExecutionSettings, type RecordSink } from "../deploy/executor.js";
import { WorkerPool } from "../deploy/pool.js";
import { HealthChecker } from "../health/checker.js";
import { FakeCollaborators, FakeProbeRunner, FLEET, loadOk, tick, type DocParts } from "./fixtures.js";

const SETTINGS: ExecutionSettings = {
  parallelism: 1,
  retryAttempts: 3,
  retryDelayMs: 0,
  maxRetryDelayMs: 0,
  backoff: "fixed",
};

class MemorySink implements RecordSink {
  records: Array<{ service: string; kind: ResourceKind; fingerprint: string; outputs?: Record<string, string> }> = [];

  async record(item: WorkItem, fingerprint: string, outputs?: Record<string, string>): Promise<void> {
    this.records.push({ service: item.service, kind: item.kind, fingerprint, outputs });
  }
}

interface Harness {
  collaborators?: FakeCollaborators;
  runner?: FakeProbeRunner;
  settings?: Partial<ExecutionSettings>;
  signal?: AbortSignal;
  plan?: PlanOptions;
}

async function execute(parts: DocParts, harness: Harness = {}) {
  const manifest: Manifest = loadOk(parts);
  const plan = diff(manifest, buildPhaseGraph(manifest), { fingerprintOf: () => undefined, snapshot: () => ({ version: 1, updated_at: null, services: {} }) }, harness.plan);
  const collaborators = harness.collaborators ?? new FakeCollaborators();
  const store = new MemorySink();
  const transitions: string[] = [];
  const executor = new PhasedExecutor({
    collaborators,
    health: new HealthChecker({ runner: harness.runner ?? new FakeProbeRunner() }),
    store,
    settings: { ...SETTINGS, ...harness.settings },
    signal: harness.signal,
    onItemStateChange: (report) => transitions.push(`${report.item.service}:${report.state}`),
  });
  const report = await executor.run(manifest, plan);
  const stateOf = (service: string, kind: ResourceKind = "configuration_applied"): ItemState | undefined =>
    report.items.find((r) => r.item.service === service && r.item.kind === kind)?.state;
  return { report, collaborators, store, transitions, stateOf };
}

describe("PhasedExecutor", () => {
  it("applies a fresh fleet phase by phase and records every item", async () => {
    const { report, collaborators, store } = await execute(FLEET);

    expect(report.outcome).toBe("succeeded");
    expect(collaborators.order).toEqual([
      "postgresql/configuration_applied",
      "keycloak/configuration_applied",
      "redis/configuration_applied",
      "app/configuration_applied",
    ]);
    expect(report.phases).toEqual([
      { phase: "infrastructure", state: "empty", items: 0 },
      { phase: "core", state: "succeeded", items: 2 },
      { phase: "identity", state: "empty", items: 0 },
      { phase: "applications", state: "succeeded", items: 2 },
    ]);
    expect(store.records.map((r) => r.service)).toEqual(["postgresql", "keycloak", "redis", "app"]);
  });

  it("hands each collaborator its spec and keeps their outputs", async () => {
    const full: DocParts = {
      core_services: {
        keycloak: {
          ip: "10.0.0.11",
          hostname: "keycloak",
          vmid: 111,
          interface: { provisioning: { modules: ["keycloak"] }, auth: { type: "oidc" } },
        },
      },
      services: {
        wiki: {
          ip: "10.0.0.21",
          hostname: "wiki",
          vmid: 121,
          depends_on: ["keycloak"],
          interface: {
            provisioning: {},
            auth: { type: "forward-auth" },
            proxy: [{ domain: "wiki.lab.test", upstream: "http://10.0.0.21:3000" }],
          },
        },
      },
    };
    const { report, collaborators, store } = await execute(full);

    expect(report.outcome).toBe("succeeded");
    expect(collaborators.order).toEqual([
      "keycloak/container",
      "keycloak/configuration_applied",
      "keycloak/identity_registration",
      "wiki/container",
      "wiki/identity_registration",
      "wiki/configuration_applied",
    ]);
    expect(collaborators.containers[0]).toEqual({
      service: "keycloak",
      vmid: 111,
      hostname: "keycloak",
      address: "10.0.0.11",
      network: { gateway: "10.0.0.1", cidr: "10.0.0.0/24", vlanTag: 10, dnsServer: "10.0.0.2", domain: "lab.test" },
      resources: { cores: 1, memory: 1024, disk: 8 },
      ports: [],
      modules: ["keycloak"],
      targets: [],
      applyOrder: [],
      variables: {},
      secrets: {},
    });
    expect(collaborators.applications[1]).toMatchObject({
      service: "wiki",
      type: "forward-auth",
      launchUrl: "https://wiki.lab.test/",
      scopes: ["openid", "email", "profile"],
    });
    expect(store.records.find((r) => r.service === "keycloak" && r.kind === "container")?.outputs).toEqual({
      containerId: "ct-111",
      address: "10.0.0.11",
    });
    expect(store.records.find((r) => r.service === "wiki" && r.kind === "identity_registration")?.outputs).toEqual({
      clientId: "wiki-client",
      providerId: "provider-1",
    });
  });

  it("retries transient and unclassified failures", async () => {
    const collaborators = new FakeCollaborators()
      .fail("redis", "configuration_applied", new TransientApplyError("redis", "configuration_applied", "connection refused"))
      .fail("app", "configuration_applied", new Error("socket hang up"));
    const { report, transitions, stateOf } = await execute(FLEET, { collaborators });

    expect(report.outcome).toBe("succeeded");
    expect(stateOf("redis")).toBe("succeeded");
    expect(report.items.find((r) => r.item.service === "redis")?.attempts).toBe(2);
    expect(transitions.filter((t) => t.startsWith("redis:"))).toEqual([
      "redis:applying",
      "redis:failed",
      "redis:applying",
      "redis:succeeded",
    ]);
  });

  it("halts the phase on a fatal failure and blocks later phases", async () => {
    const collaborators = new FakeCollaborators().fail(
      "keycloak",
      "configuration_applied",
      new FatalApplyError("keycloak", "configuration_applied", "rejected")
    );
    const { report, collaborators: calls, stateOf } = await execute(FLEET, { collaborators });

    expect(report.outcome).toBe("partial");
    expect(stateOf("postgresql")).toBe("succeeded");
    expect(stateOf("keycloak")).toBe("fatally_failed");
    expect(stateOf("redis")).toBe("blocked");
    expect(stateOf("app")).toBe("blocked");
    expect(report.items.find((r) => r.item.service === "keycloak")).toMatchObject({ attempts: 1, error: "rejected" });
    expect(report.phases.map((p) => p.state)).toEqual(["empty", "halted", "empty", "blocked"]);
    expect(calls.order).toEqual(["postgresql/configuration_applied", "keycloak/configuration_applied"]);
  });

  it("escalates once the retry budget is spent", async () => {
    const collaborators = new FakeCollaborators().fail(
      "postgresql",
      "configuration_applied",
      new Error("timeout 1"),
      new Error("timeout 2"),
      new Error("timeout 3")
    );
    const { report } = await execute(FLEET, { collaborators });

    expect(report.outcome).toBe("failed");
    expect(report.items[0]).toMatchObject({
      state: "fatally_failed",
      attempts: 3,
      error: "postgresql/configuration_applied failed after 3 attempt(s): timeout 3",
      cause: "timeout 3",
    });
    expect(report.items.slice(1).map((r) => r.state)).toEqual(["blocked", "blocked", "blocked"]);
  });

  it("lets sibling chains of the failing layer finish", async () => {
    const collaborators = new FakeCollaborators().fail(
      "a",
      "configuration_applied",
      new FatalApplyError("a", "configuration_applied", "bad config")
    );
    const { report, stateOf } = await execute(
      {
        services: {
          a: { ip: "10.0.0.50", hostname: "a" },
          b: { ip: "10.0.0.51", hostname: "b" },
          c: { ip: "10.0.0.52", hostname: "c", depends_on: ["b"] },
        },
      },
      { collaborators }
    );

    expect(stateOf("a")).toBe("fatally_failed");
    expect(stateOf("b")).toBe("succeeded");
    expect(stateOf("c")).toBe("blocked");
    expect(report.outcome).toBe("partial");
  });

  it("gates configuration on a healthy probe", async () => {
    const runner = new FakeProbeRunner(() => ({ ok: false, detail: "HTTP 500" }));
    const { report, store, collaborators, stateOf } = await execute(
      {
        services: {
          web: {
            ip: "10.0.0.40",
            hostname: "web",
            interface: { health: { liveness: "http://10.0.0.40/health", interval: 0, retries: 1 } },
          },
          api: { ip: "10.0.0.41", hostname: "api", depends_on: ["web"] },
        },
      },
      { runner, settings: { retryAttempts: 2 } }
    );

    expect(report.items.find((r) => r.item.service === "web")).toMatchObject({
      state: "fatally_failed",
      attempts: 2,
      error:
        "web/configuration_applied failed after 2 attempt(s): Service web did not become healthy: liveness probe failed after 1 attempt(s): HTTP 500",
      cause: "Service web did not become healthy: liveness probe failed after 1 attempt(s): HTTP 500",
    });
    expect(stateOf("api")).toBe("blocked");
    expect(store.records).toEqual([]);
    expect(collaborators.order).toEqual(["web/configuration_applied", "web/configuration_applied"]);
  });

  it("blocks every later phase while a core service stays unhealthy", async () => {
    const runner = new FakeProbeRunner(() => ({ ok: false, detail: "refused" }));
    const fleet: DocParts = {
      ...FLEET,
      core_services: {
        postgresql: {
          ip: "10.0.0.10",
          hostname: "postgresql",
          interface: { health: { liveness: "tcp://10.0.0.10:5432", interval: 0, retries: 1 } },
        },
        keycloak: { ip: "10.0.0.11", hostname: "keycloak", depends_on: ["postgresql"] },
      },
    };
    const { report, collaborators, stateOf } = await execute(fleet, { runner, settings: { retryAttempts: 1 } });

    expect(report.items[0]).toMatchObject({
      state: "fatally_failed",
      error:
        "postgresql/configuration_applied failed after 1 attempt(s): Service postgresql did not become healthy: liveness probe failed after 1 attempt(s): refused",
    });
    expect(stateOf("keycloak")).toBe("blocked");
    expect(stateOf("redis")).toBe("blocked");
    expect(stateOf("app")).toBe("blocked");
    expect(report.phases.map((p) => p.state)).toEqual(["empty", "halted", "empty", "blocked"]);
    expect(report.outcome).toBe("failed");
    expect(collaborators.order).toEqual(["postgresql/configuration_applied"]);
    expect(runner.checks).toEqual(["postgresql:tcp://10.0.0.10:5432"]);
  });

  it("records a service once its probe passes", async () => {
    const runner = new FakeProbeRunner(() => ({ ok: true, detail: "HTTP 200" }));
    const { report, store } = await execute(
      {
        services: {
          web: { ip: "10.0.0.40", hostname: "web", interface: { health: { liveness: "tcp://10.0.0.40:80", interval: 0 } } },
        },
      },
      { runner }
    );
    expect(report.outcome).toBe("succeeded");
    expect(runner.checks).toEqual(["web:tcp://10.0.0.40:80"]);
    expect(store.records.map((r) => r.service)).toEqual(["web"]);
  });

  it("reports skipped items without running them", async () => {
    const { report, collaborators, stateOf } = await execute(FLEET, { plan: { skip: ["keycloak"] } });
    expect(stateOf("keycloak")).toBe("skipped");
    expect(collaborators.order).not.toContain("keycloak/configuration_applied");
    expect(report.outcome).toBe("succeeded");
    expect(stateOf("app")).toBe("succeeded");
  });

  it("finishes the in-flight call and starts nothing after cancellation", async () => {
    const controller = new AbortController();
    const collaborators = new FakeCollaborators().before("postgresql", "configuration_applied", async () => {
      controller.abort();
    });
    const { report, collaborators: calls, store, stateOf } = await execute(FLEET, {
      collaborators,
      signal: controller.signal,
    });

    expect(report.outcome).toBe("cancelled");
    expect(stateOf("postgresql")).toBe("succeeded");
    expect(stateOf("keycloak")).toBe("cancelled");
    expect(stateOf("app")).toBe("cancelled");
    expect(report.phases.map((p) => p.state)).toEqual(["empty", "cancelled", "empty", "cancelled"]);
    expect(calls.order).toEqual(["postgresql/configuration_applied"]);
    expect(store.records.map((r) => r.service)).toEqual(["postgresql"]);
  });

  it("resolves secrets before anything runs", async () => {
    const parts: DocParts = {
      services: {
        app: {
          ip: "10.0.0.21",
          hostname: "app",
          interface: { db: { database: "app", role: "app", password_ref: "env:APP_DB_PASSWORD" } },
        },
      },
    };

    const missing = new FakeCollaborators();
    const run = execute(parts, { collaborators: missing });
    await expect(run).rejects.toBeInstanceOf(MissingCredentialError);
    await expect(run).rejects.toThrow(
      'Secret "env:APP_DB_PASSWORD" required by app/configuration_applied could not be resolved'
    );
    expect(missing.calls).toEqual([]);

    const present = new FakeCollaborators();
    present.secretValues.set("env:APP_DB_PASSWORD", "test-secret");
    const { store } = await execute(parts, { collaborators: present });
    expect(present.resolvedRefs).toEqual(["env:APP_DB_PASSWORD", "env:APP_DB_PASSWORD"]);
    expect(present.payloads[0]?.secrets).toEqual({ db_password: "test-secret" });
    expect(present.payloads[0]?.db).toEqual({ database: "app", role: "app", host: undefined, port: 5432 });
    expect(JSON.stringify(store.records)).not.toContain("test-secret");
  });

  it("bounds the number of services applied at once", async () => {
    const collaborators = new FakeCollaborators();
    let active = 0;
    let peak = 0;
    const services: Record<string, unknown> = {};
    for (const i of [1, 2, 3, 4]) {
      services[`s${i}`] = { ip: `10.0.0.7${i}`, hostname: `s${i}` };
      collaborators.before(`s${i}`, "configuration_applied", async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      });
    }
    const { report } = await execute({ services }, { collaborators, settings: { parallelism: 2 } });
    expect(report.outcome).toBe("succeeded");
    expect(peak).toBe(2);
  });
});

describe("WorkerPool", () => {
  it("rejects a non-positive bound", () => {
    expect(() => new WorkerPool(0)).toThrow("parallelism must be a positive integer, got 0");
  });

  it("runs queued tasks in order once a slot frees", async () => {
    const pool = new WorkerPool(1);
    const seen: number[] = [];
    await pool.all([1, 2, 3].map((n) => async () => {
      await tick();
      seen.push(n);
    }));
    expect(seen).toEqual([1, 2, 3]);
    expect(pool.stats).toEqual({ active: 0, queued: 0, max: 1 });
  });
});
