import type {
  AuthType,
  DatabaseFacet,
  HealthFacet,
  ProxyEndpoint,
  Resources,
} from "@labfleet/shared";

export interface ContainerSpec {
  service: string;
  vmid: number;
  hostname: string;
  address: string;
  network: {
    gateway: string;
    cidr: string;
    vlanTag: number;
    dnsServer: string;
    domain: string;
  };
  resources: Resources;
  ports: number[];
  modules: string[];
  targets: string[];
  applyOrder: string[];
  variables: Record<string, unknown>;
  /** Resolved just in time from `secret_variables`; never persisted. */
  secrets: Record<string, string>;
}

export interface ContainerResult {
  id: string;
  address: string;
}

export interface ConfigPayload {
  service: string;
  hostname: string;
  address: string;
  ports: number[];
  dependsOn: string[];
  config: Record<string, unknown>;
  db?: Omit<DatabaseFacet, "passwordRef">;
  proxy: ProxyEndpoint[];
  health?: HealthFacet;
  secrets: Record<string, string>;
}

export interface ApplicationSpec {
  service: string;
  type: Exclude<AuthType, "local" | "none">;
  provider?: string;
  clientId?: string;
  clientSecret?: string;
  redirectUris: string[];
  scopes: string[];
  claims: { username: string; groups: string | null };
  launchUrl?: string;
  fingerprint: string;
}

export interface ApplicationRegistration {
  clientId: string;
  providerId: string;
}

/** Creates or reconciles the container of a service. Idempotent for identical input. */
export interface ProvisioningBackend {
  createOrUpdate(spec: ContainerSpec): Promise<ContainerResult>;
}

/** Applies the opaque configuration payload of a service. */
export interface ConfigurationApplier {
  apply(serviceName: string, payload: ConfigPayload): Promise<void>;
}

/** Registers an application with the identity provider. Idempotent by spec fingerprint. */
export interface IdentityProvider {
  registerApplication(spec: ApplicationSpec): Promise<ApplicationRegistration>;
}

export interface SecretResolver {
  resolve(ref: string): Promise<string>;
}

export interface Collaborators {
  provisioning: ProvisioningBackend;
  configuration: ConfigurationApplier;
  identity: IdentityProvider;
  secrets: SecretResolver;
}
