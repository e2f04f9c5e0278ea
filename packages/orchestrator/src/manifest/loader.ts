import { readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { load as loadYaml } from "js-yaml";
import {
  createLogger,
  CycleError,
  ValidationError,
  manifestDocumentSchema,
} from "@labfleet/shared";
import type {
  AuthFacet,
  HealthFacet,
  HealthTimings,
  Manifest,
  ManifestDocument,
  ProvisioningFacet,
  Service,
  ServiceInterface,
  TopLevelPhase,
  Violation,
} from "@labfleet/shared";
import { checkDocument, declaredServices, type DeclaredService } from "./validate.js";

const logger = createLogger("manifest");

export const BUILTIN_HEALTH_TIMINGS: HealthTimings = {
  interval: 30,
  timeout: 300,
  retries: 3,
};

export interface LoadOptions {
  /** Lowest-precedence probe timings, normally from the orchestrator config. */
  healthDefaults?: HealthTimings;
  /** Highest-precedence probe timings, normally from CLI flags. */
  healthOverrides?: Partial<HealthTimings>;
}

export type LoadResult =
  | { ok: true; manifest: Manifest }
  | { ok: false; error: ValidationError };

function issueToViolation(issue: { path: Array<string | number>; message: string }): Violation {
  return {
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  };
}

/**
 * Resolves one timing: default < manifest defaults < service value < override.
 */
function pick<K extends keyof HealthTimings>(
  key: K,
  layers: Array<Partial<HealthTimings> | undefined>
): HealthTimings[K] | undefined {
  let value: HealthTimings[K] | undefined;
  for (const layer of layers) {
    const candidate = layer?.[key];
    if (candidate !== undefined) value = candidate;
  }
  return value;
}

export function resolveHealthTimings(
  defaults: HealthTimings,
  manifestDefaults: Partial<HealthTimings>,
  serviceValue: Partial<HealthTimings>,
  override: Partial<HealthTimings> = {}
): HealthTimings {
  const layers = [defaults, manifestDefaults, serviceValue, override];
  return {
    interval: pick("interval", layers) ?? defaults.interval,
    timeout: pick("timeout", layers) ?? defaults.timeout,
    retries: pick("retries", layers) ?? defaults.retries,
  };
}

function toInterface(
  declared: DeclaredService,
  doc: ManifestDocument,
  options: LoadOptions
): ServiceInterface {
  const facets = declared.entry.interface;
  const result: ServiceInterface = {
    proxy: facets.proxy.map((p) => ({
      name: p.name,
      domain: p.domain.toLowerCase(),
      path: p.path,
      upstream: p.upstream,
      tls: p.tls,
      authRequired: p.auth_required,
      headers: p.headers,
    })),
  };

  if (facets.db) {
    result.db = {
      database: facets.db.database,
      role: facets.db.role,
      host: facets.db.host,
      port: facets.db.port,
      passwordRef: facets.db.password_ref,
    };
  }

  if (facets.auth) {
    const auth: AuthFacet = {
      type: facets.auth.type,
      provider: facets.auth.provider,
      clientId: facets.auth.client_id,
      redirectUris: facets.auth.redirect_uris,
      scopes: facets.auth.scopes,
      claims: facets.auth.claims,
      clientSecretRef: facets.auth.client_secret_ref,
    };
    result.auth = auth;
  }

  if (facets.health) {
    const timings = resolveHealthTimings(
      options.healthDefaults ?? BUILTIN_HEALTH_TIMINGS,
      doc.defaults.health,
      facets.health,
      options.healthOverrides
    );
    const declaredLayers = [doc.defaults.health, facets.health];
    const health: HealthFacet = {
      startup: facets.health.startup,
      liveness: facets.health.liveness,
      readiness: facets.health.readiness,
      ...timings,
      declared: {
        interval: pick("interval", declaredLayers),
        timeout: pick("timeout", declaredLayers),
        retries: pick("retries", declaredLayers),
      },
    };
    result.health = health;
  }

  if (facets.provisioning) {
    const provisioning: ProvisioningFacet = {
      modules: facets.provisioning.modules,
      targets: facets.provisioning.targets,
      applyOrder: facets.provisioning.apply_order,
      variables: facets.provisioning.variables,
      secretVariables: facets.provisioning.secret_variables,
    };
    result.provisioning = provisioning;
  }

  return result;
}

function toManifest(doc: ManifestDocument, options: LoadOptions): Manifest {
  const services = new Map<string, Service>();
  for (const declared of declaredServices(doc)) {
    const { entry } = declared;
    services.set(declared.name, {
      name: declared.name,
      tier: declared.tier,
      enabled: entry.enable,
      address: entry.ip,
      hostname: entry.hostname,
      vmid: entry.vmid,
      resources: entry.resources,
      dependsOn: [...new Set(entry.depends_on)],
      ports: entry.ports,
      config: entry.config,
      interface: toInterface(declared, doc, options),
    });
  }

  const phaseAssignments: Record<TopLevelPhase, string[]> = {
    infrastructure: [...doc.deployment_phases.infrastructure],
    core: [...doc.deployment_phases.core],
    identity: [...doc.deployment_phases.identity],
    applications: [...doc.deployment_phases.applications],
  };

  return {
    network: {
      domain: doc.network.domain,
      gateway: doc.network.gateway,
      cidr: doc.network.network_cidr,
      vlanTag: doc.network.vlan_tag,
      dnsServer: doc.network.dns_server,
    },
    services,
    phaseAssignments,
    retry: {
      attempts: doc.defaults.retry.attempts,
      delayMs: doc.defaults.retry.delay_ms,
    },
  };
}

/** Pure parse + validate of an already-decoded manifest document. */
export function parseManifest(raw: unknown, options: LoadOptions = {}): LoadResult {
  const parsed = manifestDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new ValidationError(parsed.error.issues.map(issueToViolation)) };
  }

  const { violations, cycles } = checkDocument(parsed.data);
  if (cycles.length > 0) {
    return { ok: false, error: new CycleError(cycles, violations) };
  }
  if (violations.length > 0) {
    return { ok: false, error: new ValidationError(violations) };
  }

  return { ok: true, manifest: toManifest(parsed.data, options) };
}

export function decodeManifest(text: string, format: "json" | "yaml"): unknown {
  return format === "json" ? JSON.parse(text) : loadYaml(text);
}

/** Reads a `.json`, `.yaml` or `.yml` manifest from disk and validates it. */
export async function loadManifest(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  const resolved = resolve(path);
  const format = [".yaml", ".yml"].includes(extname(resolved).toLowerCase()) ? "yaml" : "json";
  const text = await readFile(resolved, "utf-8");

  let raw: unknown;
  try {
    raw = decodeManifest(text, format);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: new ValidationError([{ path: "(root)", message: `cannot parse ${format}: ${message}` }]),
    };
  }

  const result = parseManifest(raw, options);
  if (result.ok) {
    logger.debug(`Loaded manifest ${resolved}`, { services: result.manifest.services.size });
  }
  return result;
}
