export * from "./manifest/index.js";
export * from "./deploy/index.js";
export * from "./collaborators/index.js";
export { StateStore } from "./state/state-store.js";
export { HealthHistory } from "./state/health-history.js";
export { HealthChecker, type HealthCheckerOptions, type HealthResult } from "./health/checker.js";
export {
  CommandProbeRunner,
  DefaultProbeRunner,
  HttpProbeRunner,
  TcpProbeRunner,
  type CommandRunnerOptions,
  type ProbeContext,
  type ProbeOutcome,
  type ProbeRunner,
} from "./health/runners.js";
export { manifestLoadOptions, resolveExecutionSettings, type SettingsOverrides } from "./settings.js";
export {
  Orchestrator,
  type ApplyResult,
  type KindStatus,
  type LoadedDeployment,
  type OrchestratorOptions,
  type PlanResult,
  type ServiceStatus,
} from "./orchestrator.js";
