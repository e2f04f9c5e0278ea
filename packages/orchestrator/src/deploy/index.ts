export {
  DependencyGraphBuilder,
  buildPhaseGraph,
  findCycles,
  phaseFor,
  phaseIndex,
  requiredKinds,
  type GraphLayer,
  type PhaseGroup,
  type PhaseGraph,
} from "./dependency-graph.js";
export {
  diff,
  compareItems,
  desiredFingerprint,
  fragmentFor,
  type RecordedState,
} from "./diff.js";
export {
  PhasedExecutor,
  secretRefsFor,
  type ExecutionSettings,
  type ItemStateHandler,
  type PhasedExecutorOptions,
  type RecordSink,
} from "./executor.js";
export { WorkerPool } from "./pool.js";
