import type { Config, RetrySettings } from "@labfleet/shared";
import type { ExecutionSettings } from "./deploy/executor.js";
import type { LoadOptions } from "./manifest/loader.js";

/** Values given explicitly on the command line. They win over everything else. */
export interface SettingsOverrides {
  parallelism?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  /** Seconds; replaces every service's health timeout. */
  healthTimeout?: number;
}

/**
 * Execution settings, lowest precedence first: built-in defaults (already
 * folded into `config` by its schema), the config file, the manifest's
 * `defaults.retry`, then explicit overrides.
 */
export function resolveExecutionSettings(
  execution: Config["execution"],
  manifestRetry: RetrySettings,
  overrides: SettingsOverrides = {}
): ExecutionSettings {
  return {
    parallelism: overrides.parallelism ?? execution.parallelism,
    retryAttempts: overrides.retryAttempts ?? manifestRetry.attempts ?? execution.retryAttempts,
    retryDelayMs: overrides.retryDelayMs ?? manifestRetry.delayMs ?? execution.retryDelayMs,
    maxRetryDelayMs: execution.maxRetryDelayMs,
    backoff: execution.backoff,
  };
}

export function manifestLoadOptions(health: Config["health"], overrides: SettingsOverrides = {}): LoadOptions {
  const options: LoadOptions = {
    healthDefaults: { interval: health.interval, timeout: health.timeout, retries: health.retries },
  };
  if (overrides.healthTimeout !== undefined) {
    options.healthOverrides = { timeout: overrides.healthTimeout };
  }
  return options;
}
