import {
  createLogger,
  errorMessage,
  FatalApplyError,
  HealthTimeoutError,
  MissingCredentialError,
  retry,
  RetryAbortedError,
  rootCause,
  TOP_LEVEL_PHASES,
} from "@labfleet/shared";
import type {
  ApplyOutcome,
  ApplyReport,
  ItemReport,
  ItemState,
  Manifest,
  Network,
  PhaseReport,
  Plan,
  ResourceKind,
  Service,
  TopLevelPhase,
  WorkItem,
  Backoff,
} from "@labfleet/shared";
import type { Collaborators, ApplicationSpec } from "../collaborators/types.js";
import type { HealthChecker } from "../health/checker.js";
import { WorkerPool } from "./pool.js";

export interface ExecutionSettings {
  parallelism: number;
  retryAttempts: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  backoff: Backoff;
}

/** Where succeeded items are persisted. */
export interface RecordSink {
  record(item: WorkItem, fingerprint: string, outputs?: Record<string, string>): Promise<void>;
}

export type ItemStateHandler = (report: Readonly<ItemReport>) => void;

export interface PhasedExecutorOptions {
  collaborators: Collaborators;
  health: HealthChecker;
  store: RecordSink;
  settings: ExecutionSettings;
  signal?: AbortSignal;
  onItemStateChange?: ItemStateHandler;
}

class ItemCancelled extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "ItemCancelled";
  }
}

interface SecretRef {
  item: WorkItem;
  ref: string;
}

function itemKey(item: Pick<WorkItem, "service" | "kind">): string {
  return `${item.service}/${item.kind}`;
}

/** Secret references an item dereferences when it runs, keyed by the name handed to the collaborator. */
export function secretRefsFor(service: Service, kind: ResourceKind): Record<string, string> {
  switch (kind) {
    case "container":
      return { ...(service.interface.provisioning?.secretVariables ?? {}) };
    case "identity_registration": {
      const ref = service.interface.auth?.clientSecretRef;
      return ref ? { client_secret: ref } : {};
    }
    case "configuration_applied": {
      const ref = service.interface.db?.passwordRef;
      return ref ? { db_password: ref } : {};
    }
  }
}

function launchUrl(service: Service): string | undefined {
  const endpoint = service.interface.proxy[0];
  if (!endpoint) return undefined;
  return `${endpoint.tls ? "https" : "http"}://${endpoint.domain}${endpoint.path}`;
}

/**
 * Executes a plan phase by phase. Inside a phase items run layer by layer;
 * the items of one service form a sequential chain and the chains of a
 * layer share a bounded worker pool. A fatal failure halts the remaining
 * layers of its phase and blocks every later phase.
 */
export class PhasedExecutor {
  private logger = createLogger("executor");
  private options: PhasedExecutorOptions;
  private reports = new Map<string, ItemReport>();

  constructor(options: PhasedExecutorOptions) {
    this.options = options;
  }

  private get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  private get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  async run(manifest: Manifest, plan: Plan): Promise<ApplyReport> {
    this.reports = new Map();
    for (const item of plan.items) {
      this.reports.set(itemKey(item), { item, state: item.action === "skip" ? "skipped" : "pending", attempts: 0 });
    }

    await this.preflight(manifest, plan);

    const phases: PhaseReport[] = [];
    let gateOpen = true;

    for (const phase of TOP_LEVEL_PHASES) {
      const items = plan.items.filter((item) => item.phase === phase);
      const runnable = items.filter((item) => item.action !== "skip");

      if (items.length === 0) {
        phases.push({ phase, state: "empty", items: 0 });
        continue;
      }
      if (!gateOpen || this.cancelled) {
        const state = this.cancelled ? "cancelled" : "blocked";
        for (const item of runnable) this.setState(item, state);
        phases.push({ phase, state, items: items.length });
        continue;
      }

      this.logger.info(`Phase ${phase} started`, { items: runnable.length });
      const state = await this.runPhase(manifest, phase, runnable);
      phases.push({ phase, state, items: items.length });
      this.logger.info(`Phase ${phase} ${state}`);
      gateOpen = state === "succeeded";
    }

    const items = plan.items.map((item) => this.reportOf(item));
    return { outcome: this.outcomeOf(items), items, phases };
  }

  private async preflight(manifest: Manifest, plan: Plan): Promise<void> {
    const refs: SecretRef[] = [];
    for (const item of plan.items) {
      if (item.action === "skip") continue;
      const service = manifest.services.get(item.service);
      if (!service) continue;
      for (const ref of Object.values(secretRefsFor(service, item.kind))) refs.push({ item, ref });
    }

    for (const { item, ref } of refs) {
      try {
        await this.options.collaborators.secrets.resolve(ref);
      } catch (err) {
        this.logger.error(`Secret preflight failed for ${itemKey(item)}`, { ref, error: errorMessage(err) });
        throw new MissingCredentialError(item.service, item.kind, ref, { cause: err });
      }
    }
    if (refs.length > 0) this.logger.debug("Secret preflight passed", { refs: refs.length });
  }

  private async runPhase(
    manifest: Manifest,
    phase: TopLevelPhase,
    items: WorkItem[]
  ): Promise<PhaseReport["state"]> {
    const layers = [...new Set(items.map((item) => item.layer))].sort((a, b) => a - b);
    let halted = false;

    for (const layer of layers) {
      const layerItems = items.filter((item) => item.layer === layer);
      if (halted || this.cancelled) {
        for (const item of layerItems) this.setState(item, this.cancelled ? "cancelled" : "blocked");
        continue;
      }

      const chains = new Map<string, WorkItem[]>();
      for (const item of layerItems) {
        const chain = chains.get(item.service) ?? [];
        chain.push(item);
        chains.set(item.service, chain);
      }

      this.logger.debug(`Phase ${phase} layer ${layer}`, { services: chains.size });
      const pool = new WorkerPool(this.options.settings.parallelism);
      const failedChains: string[] = [];
      await pool.all(
        [...chains.values()].map((chain) => async () => {
          const ok = await this.runChain(manifest, chain);
          if (!ok) failedChains.push(chain[0]?.service ?? "");
        })
      );

      if (failedChains.length > 0) {
        halted = true;
        this.logger.error(`Phase ${phase} halted at layer ${layer}`, { failed: failedChains.sort().join(",") });
      }
    }

    if (this.cancelled && items.some((item) => this.reportOf(item).state === "cancelled")) return "cancelled";
    return halted ? "halted" : "succeeded";
  }

  /** Returns false when an item of the chain failed fatally. */
  private async runChain(manifest: Manifest, chain: WorkItem[]): Promise<boolean> {
    let broken = false;
    for (const item of chain) {
      if (broken) {
        this.setState(item, "blocked");
        continue;
      }
      if (this.cancelled) {
        this.setState(item, "cancelled");
        continue;
      }
      const state = await this.executeItem(manifest, item);
      if (state === "fatally_failed") broken = true;
    }
    return !broken;
  }

  private async executeItem(manifest: Manifest, item: WorkItem): Promise<ItemState> {
    const { settings } = this.options;
    const report = this.reportOf(item);
    const service = manifest.services.get(item.service);
    if (!service) {
      return this.fail(item, new FatalApplyError(item.service, item.kind, `Service ${item.service} is not in the manifest`));
    }

    try {
      const outputs = await retry(
        async (attempt) => {
          report.attempts = attempt;
          this.setState(item, "applying");
          return this.applyOnce(service, item, manifest.network);
        },
        {
          maxAttempts: settings.retryAttempts,
          baseDelayMs: settings.retryDelayMs,
          maxDelayMs: settings.maxRetryDelayMs,
          backoff: settings.backoff,
          signal: this.signal,
          shouldRetry: (err) => !(err instanceof FatalApplyError) && !(err instanceof ItemCancelled) && !this.cancelled,
          onRetry: (err, attempt, delayMs) => {
            report.error = errorMessage(err);
            this.setState(item, "failed");
            this.logger.warn(`${itemKey(item)} attempt ${attempt} failed, retrying`, {
              delayMs,
              error: errorMessage(err),
            });
          },
        }
      );

      await this.options.store.record(item, item.fingerprint, outputs);
      delete report.error;
      this.setState(item, "succeeded");
      this.logger.info(`${itemKey(item)} ${item.action === "create" ? "created" : "updated"}`, {
        attempts: report.attempts,
      });
      return "succeeded";
    } catch (err) {
      if (err instanceof RetryAbortedError || err instanceof ItemCancelled) {
        const last = err instanceof RetryAbortedError ? err.lastError : err;
        report.error = errorMessage(last);
        return this.setState(item, "cancelled");
      }
      if (err instanceof FatalApplyError) {
        return this.fail(item, err);
      }
      if (this.cancelled) {
        report.error = errorMessage(err);
        return this.setState(item, "cancelled");
      }
      return this.fail(
        item,
        new FatalApplyError(
          item.service,
          item.kind,
          `${itemKey(item)} failed after ${report.attempts} attempt(s): ${errorMessage(err)}`,
          { cause: err }
        )
      );
    }
  }

  private fail(item: WorkItem, err: FatalApplyError): ItemState {
    const report = this.reportOf(item);
    report.error = err.message;
    const cause = rootCause(err);
    if (cause !== err) report.cause = errorMessage(cause);
    this.logger.error(`${itemKey(item)} failed`, { error: err.message });
    return this.setState(item, "fatally_failed");
  }

  private async resolveSecrets(item: WorkItem, refs: Record<string, string>): Promise<Record<string, string>> {
    const resolved: Record<string, string> = {};
    for (const [name, ref] of Object.entries(refs)) {
      try {
        resolved[name] = await this.options.collaborators.secrets.resolve(ref);
      } catch (err) {
        throw new MissingCredentialError(item.service, item.kind, ref, { cause: err });
      }
    }
    return resolved;
  }

  private async applyOnce(
    service: Service,
    item: WorkItem,
    network: Network
  ): Promise<Record<string, string> | undefined> {
    const { collaborators } = this.options;
    const secrets = await this.resolveSecrets(item, secretRefsFor(service, item.kind));
    const facets = service.interface;

    switch (item.kind) {
      case "container": {
        const provisioning = facets.provisioning;
        if (!provisioning || service.vmid === undefined) {
          throw new FatalApplyError(service.name, item.kind, `${service.name} declares no provisioning facet`);
        }
        const result = await collaborators.provisioning.createOrUpdate({
          service: service.name,
          vmid: service.vmid,
          hostname: service.hostname,
          address: service.address,
          network: {
            gateway: network.gateway,
            cidr: network.cidr,
            vlanTag: network.vlanTag,
            dnsServer: network.dnsServer,
            domain: network.domain,
          },
          resources: service.resources,
          ports: service.ports,
          modules: provisioning.modules,
          targets: provisioning.targets,
          applyOrder: provisioning.applyOrder,
          variables: provisioning.variables,
          secrets,
        });
        return { containerId: result.id, address: result.address };
      }

      case "identity_registration": {
        const auth = facets.auth;
        if (!auth || (auth.type !== "oidc" && auth.type !== "forward-auth")) {
          throw new FatalApplyError(service.name, item.kind, `${service.name} declares no identity registration`);
        }
        const spec: ApplicationSpec = {
          service: service.name,
          type: auth.type,
          provider: auth.provider,
          clientId: auth.clientId,
          clientSecret: secrets.client_secret,
          redirectUris: auth.redirectUris,
          scopes: auth.scopes,
          claims: auth.claims,
          launchUrl: launchUrl(service),
          fingerprint: item.fingerprint,
        };
        const registration = await collaborators.identity.registerApplication(spec);
        return { clientId: registration.clientId, providerId: registration.providerId };
      }

      case "configuration_applied": {
        const db = facets.db ? { database: facets.db.database, role: facets.db.role, host: facets.db.host, port: facets.db.port } : undefined;
        await collaborators.configuration.apply(service.name, {
          service: service.name,
          hostname: service.hostname,
          address: service.address,
          ports: service.ports,
          dependsOn: service.dependsOn,
          config: service.config,
          db,
          proxy: facets.proxy,
          health: facets.health,
          secrets,
        });

        if (facets.health) {
          const result = await this.options.health.probe(service, this.signal);
          if (result.status === "unhealthy") {
            if (result.cancelled) throw new ItemCancelled(result.reason);
            throw new HealthTimeoutError(service.name, result.reason);
          }
        }
        return undefined;
      }
    }
  }

  private reportOf(item: WorkItem): ItemReport {
    const key = itemKey(item);
    let report = this.reports.get(key);
    if (!report) {
      report = { item, state: "pending", attempts: 0 };
      this.reports.set(key, report);
    }
    return report;
  }

  private setState(item: WorkItem, state: ItemState): ItemState {
    const report = this.reportOf(item);
    report.state = state;
    this.options.onItemStateChange?.({ ...report });
    return state;
  }

  private outcomeOf(items: ItemReport[]): ApplyOutcome {
    if (items.some((r) => r.state === "cancelled")) return "cancelled";
    if (items.some((r) => r.state === "fatally_failed" || r.state === "blocked")) {
      return items.some((r) => r.state === "succeeded") ? "partial" : "failed";
    }
    return "succeeded";
  }
}
