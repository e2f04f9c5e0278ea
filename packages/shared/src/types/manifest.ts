import { z } from "zod";

const SERVICE_NAME = /^[a-z0-9][a-z0-9_-]*$/;
const CIDR = /^(\d{1,3}\.){3}\d{1,3}\/(\d|[12]\d|3[0-2])$/;

const serviceName = z.string().regex(SERVICE_NAME, "must be lowercase alphanumeric, '-' or '_'");
const port = z.number().int().min(0).max(65535);
const seconds = z.number().nonnegative();

export const networkSchema = z.object({
  domain: z.string().min(1),
  gateway: z.string().ip({ version: "v4" }),
  network_cidr: z.string().regex(CIDR, "must be an IPv4 CIDR block"),
  vlan_tag: z.number().int().min(1).max(4094),
  dns_server: z.string().ip({ version: "v4" }),
});

export const databaseFacetSchema = z.object({
  database: z.string().min(1),
  role: z.string().min(1),
  host: z.string().optional(),
  port: port.default(5432),
  password_ref: z.string().optional(),
});

export const proxyEndpointSchema = z.object({
  name: z.string().optional(),
  domain: z.string().min(1),
  path: z.string().startsWith("/").default("/"),
  upstream: z.string().min(1),
  tls: z.boolean().default(true),
  auth_required: z.boolean().default(true),
  headers: z.record(z.string()).default({}),
});

export const authFacetSchema = z.object({
  type: z.enum(["oidc", "forward-auth", "local", "none"]).default("oidc"),
  provider: z.string().optional(),
  client_id: z.string().optional(),
  redirect_uris: z.array(z.string()).default([]),
  scopes: z.array(z.string()).default(["openid", "email", "profile"]),
  claims: z
    .object({
      username: z.string().default("preferred_username"),
      groups: z.string().nullable().default("groups"),
    })
    .default({}),
  client_secret_ref: z.string().optional(),
});

export const healthFacetSchema = z.object({
  startup: z.string().min(1).optional(),
  liveness: z.string().min(1),
  readiness: z.string().min(1).optional(),
  interval: seconds.optional(),
  timeout: seconds.optional(),
  retries: z.number().int().min(1).optional(),
});

export const provisioningFacetSchema = z.object({
  modules: z.array(z.string()).default([]),
  targets: z.array(z.string()).default([]),
  apply_order: z.array(z.string()).default([]),
  variables: z.record(z.unknown()).default({}),
  secret_variables: z.record(z.string()).default({}),
});

export const interfaceSchema = z.object({
  db: databaseFacetSchema.optional(),
  proxy: z.array(proxyEndpointSchema).default([]),
  auth: authFacetSchema.optional(),
  health: healthFacetSchema.optional(),
  provisioning: provisioningFacetSchema.optional(),
});

export const serviceEntrySchema = z.object({
  enable: z.boolean().default(true),
  ip: z.string().ip({ version: "v4" }),
  hostname: z.string().min(1),
  vmid: z.number().int().positive().optional(),
  resources: z
    .object({
      cores: z.number().int().min(1).default(1),
      memory: z.number().int().min(64).default(1024),
      disk: z.number().int().min(1).default(8),
    })
    .default({}),
  depends_on: z.array(z.string()).default([]),
  ports: z.array(port).default([]),
  config: z.record(z.unknown()).default({}),
  interface: interfaceSchema.default({}),
});

const healthTimingsSchema = z.object({
  interval: seconds.optional(),
  timeout: seconds.optional(),
  retries: z.number().int().min(1).optional(),
});

export const manifestDocumentSchema = z.object({
  network: networkSchema,
  core_services: z.record(serviceName, serviceEntrySchema).default({}),
  services: z.record(serviceName, serviceEntrySchema).default({}),
  deployment_phases: z
    .object({
      infrastructure: z.array(z.string()).default([]),
      core: z.array(z.string()).default([]),
      identity: z.array(z.string()).default([]),
      applications: z.array(z.string()).default([]),
    })
    .strict()
    .default({}),
  defaults: z
    .object({
      health: healthTimingsSchema.default({}),
      retry: z
        .object({
          attempts: z.number().int().min(1).optional(),
          delay_ms: z.number().int().nonnegative().optional(),
        })
        .default({}),
    })
    .default({}),
});

export type ManifestDocument = z.infer<typeof manifestDocumentSchema>;
export type ServiceEntry = z.infer<typeof serviceEntrySchema>;

export interface Network {
  domain: string;
  gateway: string;
  cidr: string;
  vlanTag: number;
  dnsServer: string;
}

export interface DatabaseFacet {
  database: string;
  role: string;
  host?: string;
  port: number;
  passwordRef?: string;
}

export interface ProxyEndpoint {
  name?: string;
  domain: string;
  path: string;
  upstream: string;
  tls: boolean;
  authRequired: boolean;
  headers: Record<string, string>;
}

export type AuthType = "oidc" | "forward-auth" | "local" | "none";

export interface AuthFacet {
  type: AuthType;
  provider?: string;
  clientId?: string;
  redirectUris: string[];
  scopes: string[];
  claims: { username: string; groups: string | null };
  clientSecretRef?: string;
}

/** Probe timings are in seconds, already merged with defaults and overrides. */
export interface HealthFacet {
  startup?: string;
  liveness: string;
  readiness?: string;
  interval: number;
  timeout: number;
  retries: number;
  /** Timings written in the manifest itself (`defaults.health` < service), before config and CLI values. */
  declared: Partial<HealthTimings>;
}

export interface ProvisioningFacet {
  modules: string[];
  targets: string[];
  applyOrder: string[];
  variables: Record<string, unknown>;
  secretVariables: Record<string, string>;
}

export interface ServiceInterface {
  db?: DatabaseFacet;
  proxy: ProxyEndpoint[];
  auth?: AuthFacet;
  health?: HealthFacet;
  provisioning?: ProvisioningFacet;
}

export type ServiceTier = "core" | "application";

export interface Resources {
  cores: number;
  memory: number;
  disk: number;
}

export interface Service {
  name: string;
  tier: ServiceTier;
  enabled: boolean;
  address: string;
  hostname: string;
  vmid?: number;
  resources: Resources;
  dependsOn: string[];
  ports: number[];
  config: Record<string, unknown>;
  interface: ServiceInterface;
}

export interface HealthTimings {
  interval: number;
  timeout: number;
  retries: number;
}

export interface RetrySettings {
  attempts?: number;
  delayMs?: number;
}

export interface Manifest {
  network: Network;
  /** Every declared service, enabled or not, keyed by name. */
  services: Map<string, Service>;
  phaseAssignments: Record<TopLevelPhase, string[]>;
  retry: RetrySettings;
}

export const TOP_LEVEL_PHASES = ["infrastructure", "core", "identity", "applications"] as const;

export type TopLevelPhase = (typeof TOP_LEVEL_PHASES)[number];
