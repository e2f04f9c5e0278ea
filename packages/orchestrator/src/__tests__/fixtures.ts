import type { Manifest, ResourceKind } from "@labfleet/shared";
import { parseManifest, type LoadOptions } from "../manifest/loader.js";
import type {
  ApplicationRegistration,
  ApplicationSpec,
  Collaborators,
  ConfigPayload,
  ContainerResult,
  ContainerSpec,
} from "../collaborators/types.js";
import type { ProbeContext, ProbeOutcome, ProbeRunner } from "../health/runners.js";

export const NETWORK = {
  domain: "lab.test",
  gateway: "10.0.0.1",
  network_cidr: "10.0.0.0/24",
  vlan_tag: 10,
  dns_server: "10.0.0.2",
};

export interface DocParts {
  core_services?: Record<string, unknown>;
  services?: Record<string, unknown>;
  deployment_phases?: Record<string, string[]>;
  defaults?: Record<string, unknown>;
}

export function manifestDoc(parts: DocParts): Record<string, unknown> {
  return { network: NETWORK, ...parts };
}

export function loadOk(parts: DocParts, options?: LoadOptions): Manifest {
  const result = parseManifest(manifestDoc(parts), options);
  if (!result.ok) {
    throw new Error(`fixture manifest is invalid:\n${result.error.format()}`);
  }
  return result.manifest;
}

/**
 * postgresql <- redis <- app, with keycloak depending on postgresql. Bare
 * services: each yields exactly one configuration_applied item.
 */
export const FLEET: DocParts = {
  core_services: {
    postgresql: { ip: "10.0.0.10", hostname: "postgresql" },
    keycloak: { ip: "10.0.0.11", hostname: "keycloak", depends_on: ["postgresql"] },
  },
  services: {
    redis: { ip: "10.0.0.20", hostname: "redis", depends_on: ["postgresql"] },
    app: { ip: "10.0.0.21", hostname: "app", depends_on: ["redis", "keycloak"] },
  },
};

export interface Call {
  service: string;
  kind: ResourceKind;
}

/** In-process collaborators recording every call. Scripted errors are thrown in order. */
export class FakeCollaborators implements Collaborators {
  calls: Call[] = [];
  containers: ContainerSpec[] = [];
  payloads: ConfigPayload[] = [];
  applications: ApplicationSpec[] = [];
  secretValues = new Map<string, string>();
  resolvedRefs: string[] = [];
  private scripted = new Map<string, unknown[]>();
  private hooks = new Map<string, () => Promise<void>>();

  /** Errors to throw on the next calls for service/kind, one per call. */
  fail(service: string, kind: ResourceKind, ...errors: unknown[]): this {
    this.scripted.set(`${service}/${kind}`, errors);
    return this;
  }

  /** Runs before the call for service/kind resolves. */
  before(service: string, kind: ResourceKind, hook: () => Promise<void>): this {
    this.hooks.set(`${service}/${kind}`, hook);
    return this;
  }

  private async call(service: string, kind: ResourceKind): Promise<void> {
    this.calls.push({ service, kind });
    const hook = this.hooks.get(`${service}/${kind}`);
    if (hook) await hook();
    const errors = this.scripted.get(`${service}/${kind}`);
    const next = errors?.shift();
    if (next !== undefined) throw next;
  }

  provisioning = {
    createOrUpdate: async (spec: ContainerSpec): Promise<ContainerResult> => {
      await this.call(spec.service, "container");
      this.containers.push(spec);
      return { id: `ct-${spec.vmid}`, address: spec.address };
    },
  };

  configuration = {
    apply: async (serviceName: string, payload: ConfigPayload): Promise<void> => {
      await this.call(serviceName, "configuration_applied");
      this.payloads.push(payload);
    },
  };

  identity = {
    registerApplication: async (spec: ApplicationSpec): Promise<ApplicationRegistration> => {
      await this.call(spec.service, "identity_registration");
      this.applications.push(spec);
      return { clientId: spec.clientId ?? `${spec.service}-client`, providerId: "provider-1" };
    },
  };

  secrets = {
    resolve: async (ref: string): Promise<string> => {
      this.resolvedRefs.push(ref);
      const value = this.secretValues.get(ref);
      if (value === undefined) throw new Error(`no secret ${ref}`);
      return value;
    },
  };

  get order(): string[] {
    return this.calls.map((c) => `${c.service}/${c.kind}`);
  }
}

export type ProbeScript = (target: string, context: ProbeContext) => ProbeOutcome | Promise<ProbeOutcome>;

export class FakeProbeRunner implements ProbeRunner {
  checks: string[] = [];

  constructor(private readonly script: ProbeScript = () => ({ ok: true, detail: "ok" })) {}

  async check(target: string, context: ProbeContext): Promise<ProbeOutcome> {
    this.checks.push(`${context.service}:${target}`);
    return this.script(target, context);
  }
}

/** Resolves after pending microtasks and one macrotask turn. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
