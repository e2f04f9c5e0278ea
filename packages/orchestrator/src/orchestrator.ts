import { createLogger } from "@labfleet/shared";
import type {
  ApplyReport,
  Config,
  DeploymentRecord,
  HealthObservation,
  ItemReport,
  Manifest,
  Plan,
  PlanOptions,
  ResourceKind,
  ServiceTier,
} from "@labfleet/shared";
import { loadManifest } from "./manifest/loader.js";
import { buildPhaseGraph, requiredKinds, type PhaseGraph } from "./deploy/dependency-graph.js";
import { diff, desiredFingerprint } from "./deploy/diff.js";
import { PhasedExecutor, type ExecutionSettings } from "./deploy/executor.js";
import { StateStore } from "./state/state-store.js";
import { HealthHistory } from "./state/health-history.js";
import { HealthChecker } from "./health/checker.js";
import { DefaultProbeRunner, type ProbeRunner } from "./health/runners.js";
import { createCommandCollaborators } from "./collaborators/command.js";
import { EnvFileSecretResolver } from "./collaborators/secrets.js";
import type { Collaborators } from "./collaborators/types.js";
import { manifestLoadOptions, resolveExecutionSettings, type SettingsOverrides } from "./settings.js";

export interface OrchestratorOptions {
  config: Config;
  overrides?: SettingsOverrides;
  /** Defaults to the command collaborators configured in `config.collaborators`. */
  collaborators?: Collaborators;
  probeRunner?: ProbeRunner;
  /** Defaults to a SQLite database at `config.state.healthDbPath`. */
  history?: HealthHistory;
  onItemStateChange?: (report: Readonly<ItemReport>) => void;
}

export interface LoadedDeployment {
  manifest: Manifest;
  graph: PhaseGraph;
  store: StateStore;
}

export interface PlanResult extends LoadedDeployment {
  plan: Plan;
}

export interface ApplyResult {
  plan: Plan;
  report: ApplyReport;
  settings: ExecutionSettings;
}

export interface KindStatus {
  kind: ResourceKind;
  record?: DeploymentRecord;
  inSync: boolean;
}

export interface ServiceStatus {
  service: string;
  tier: ServiceTier;
  enabled: boolean;
  layer?: number;
  kinds: KindStatus[];
  health?: HealthObservation;
}

/**
 * Orchestrator wires manifest loading, the phase graph, the state store,
 * the diff engine, the executor and health checking behind the operations
 * the command line exposes.
 */
export class Orchestrator {
  private logger = createLogger("orchestrator");
  private options: OrchestratorOptions;
  private history?: HealthHistory;
  private ownsHistory = false;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.history = options.history;
  }

  private get config(): Config {
    return this.options.config;
  }

  private healthHistory(): HealthHistory {
    if (!this.history) {
      this.history = new HealthHistory(this.config.state.healthDbPath);
      this.ownsHistory = true;
    }
    return this.history;
  }

  private collaborators(): Collaborators {
    if (this.options.collaborators) return this.options.collaborators;
    const { collaborators } = this.config;
    return createCommandCollaborators({
      provision: collaborators.provision,
      configure: collaborators.configure,
      identity: collaborators.identity,
      fatalExitCodes: collaborators.fatalExitCodes,
      timeoutMs: collaborators.timeoutMs,
      secrets: new EnvFileSecretResolver(),
    });
  }

  private healthChecker(): HealthChecker {
    const runner =
      this.options.probeRunner ??
      new DefaultProbeRunner({ shell: this.config.health.shell, prefix: this.config.health.commandPrefix });
    return new HealthChecker({ runner, history: this.healthHistory() });
  }

  async loadManifest(): Promise<Manifest> {
    const result = await loadManifest(
      this.config.manifest.path,
      manifestLoadOptions(this.config.health, this.options.overrides)
    );
    if (!result.ok) throw result.error;
    return result.manifest;
  }

  async load(): Promise<LoadedDeployment> {
    const manifest = await this.loadManifest();
    const graph = buildPhaseGraph(manifest);
    const store = await StateStore.load(this.config.state.path);
    return { manifest, graph, store };
  }

  async graph(): Promise<PhaseGraph> {
    return buildPhaseGraph(await this.loadManifest());
  }

  async plan(options: PlanOptions = {}): Promise<PlanResult> {
    const loaded = await this.load();
    const plan = diff(loaded.manifest, loaded.graph, loaded.store, options);
    return { ...loaded, plan };
  }

  async apply(options: PlanOptions = {}, signal?: AbortSignal): Promise<ApplyResult> {
    const { manifest, store, plan } = await this.plan(options);
    const settings = resolveExecutionSettings(this.config.execution, manifest.retry, this.options.overrides);
    this.logger.info("Applying plan", {
      create: plan.summary.create,
      update: plan.summary.update,
      skip: plan.summary.skip,
      parallelism: settings.parallelism,
    });

    const executor = new PhasedExecutor({
      collaborators: this.collaborators(),
      health: this.healthChecker(),
      store,
      settings,
      signal,
      onItemStateChange: this.options.onItemStateChange,
    });

    try {
      const report = await executor.run(manifest, plan);
      return { plan, report, settings };
    } finally {
      await store.flush();
    }
  }

  /** Recorded state and last-known health per declared service; `probe` checks health now. */
  async status(options: { probe?: boolean; signal?: AbortSignal } = {}): Promise<ServiceStatus[]> {
    const { manifest, graph, store } = await this.load();
    const history = this.healthHistory();

    if (options.probe) {
      const checker = this.healthChecker();
      for (const service of manifest.services.values()) {
        if (!service.enabled || !service.interface.health) continue;
        await checker.probe(service, options.signal);
      }
    }

    const statuses: ServiceStatus[] = [];
    for (const service of [...manifest.services.values()].sort((a, b) => (a.name < b.name ? -1 : 1))) {
      const kinds = (service.enabled ? requiredKinds(service) : []).map((kind): KindStatus => {
        const record = store.recordOf(service.name, kind);
        const desired = desiredFingerprint(service, kind, manifest.network);
        return record ? { kind, record, inSync: record.fingerprint === desired } : { kind, inSync: false };
      });
      const status: ServiceStatus = { service: service.name, tier: service.tier, enabled: service.enabled, kinds };
      if (service.enabled) status.layer = graph.layerOf(service.name);
      const health = history.get(service.name);
      if (health) status.health = health;
      statuses.push(status);
    }
    return statuses;
  }

  /**
   * Forgets what was recorded for a service. Nothing is torn down: the next
   * plan treats the removed kinds as never deployed.
   */
  async decommission(service: string, kind?: ResourceKind): Promise<ResourceKind[]> {
    const store = await StateStore.load(this.config.state.path);
    const removed = await store.remove(service, kind);
    await store.flush();
    if (removed.length > 0 && !store.snapshot().services[service]) {
      this.healthHistory().forget(service);
    }
    this.logger.debug(`Decommission ${service}`, { removed: removed.length });
    return removed;
  }

  close(): void {
    if (this.ownsHistory) this.history?.close();
    this.history = undefined;
    this.ownsHistory = false;
  }
}
