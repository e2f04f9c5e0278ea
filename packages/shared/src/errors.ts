import type { ResourceKind } from "./types/state.js";

export interface Violation {
  path: string;
  message: string;
}

export class LabfleetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LabfleetError";
  }
}

/** The manifest (or an operator override) is malformed. Fatal before execution. */
export class ValidationError extends LabfleetError {
  public readonly violations: Violation[];

  constructor(violations: Violation[], message?: string) {
    super(message ?? `Manifest validation failed with ${violations.length} violation(s)`);
    this.name = "ValidationError";
    this.violations = violations;
  }

  format(): string {
    return this.violations.map((v) => `  ${v.path}: ${v.message}`).join("\n");
  }
}

export class CycleError extends ValidationError {
  public readonly cycles: string[][];

  constructor(cycles: string[][], violations?: Violation[]) {
    super(
      violations ?? cycles.map((cycle) => cycleViolation(cycle)),
      `Dependency cycle detected: ${cycles.map((c) => c.join(" -> ")).join("; ")}`,
    );
    this.name = "CycleError";
    this.cycles = cycles;
  }
}

export function cycleViolation(cycle: string[]): Violation {
  return {
    path: `services.${cycle[0]}.depends_on`,
    message: `dependency cycle ${cycle.join(" -> ")}`,
  };
}

export class ApplyError extends LabfleetError {
  public readonly service: string;
  public readonly kind: ResourceKind;

  constructor(service: string, kind: ResourceKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApplyError";
    this.service = service;
    this.kind = kind;
  }
}

/** Retryable collaborator failure: timeouts, refused connections, not-yet-ready dependencies. */
export class TransientApplyError extends ApplyError {
  constructor(service: string, kind: ResourceKind, message: string, options?: { cause?: unknown }) {
    super(service, kind, message, options);
    this.name = "TransientApplyError";
  }
}

/** Permanent rejection. Halts the phase of the item. */
export class FatalApplyError extends ApplyError {
  constructor(service: string, kind: ResourceKind, message: string, options?: { cause?: unknown }) {
    super(service, kind, message, options);
    this.name = "FatalApplyError";
  }
}

export class MissingCredentialError extends FatalApplyError {
  public readonly ref: string;

  constructor(service: string, kind: ResourceKind, ref: string, options?: { cause?: unknown }) {
    super(service, kind, `Secret "${ref}" required by ${service}/${kind} could not be resolved`, options);
    this.name = "MissingCredentialError";
    this.ref = ref;
  }
}

export class HealthTimeoutError extends TransientApplyError {
  constructor(service: string, reason: string) {
    super(service, "configuration_applied", `Service ${service} did not become healthy: ${reason}`);
    this.name = "HealthTimeoutError";
  }
}

export class StateError extends LabfleetError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Deployment state ${path}: ${message}`, options);
    this.name = "StateError";
    this.path = path;
  }
}

export class ConfigError extends LabfleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function rootCause(err: unknown): unknown {
  let current = err;
  while (current instanceof Error && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
}
