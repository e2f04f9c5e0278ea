import { describe, it, expect } from "vitest";
import { parseConfig } from "@labfleet/shared";
import { manifestLoadOptions, resolveExecutionSettings } from "../settings.js";

const config = parseConfig({
  manifest: {},
  state: {},
  execution: { parallelism: 4, retryAttempts: 5 },
  health: { timeout: 120 },
  collaborators: {},
});

describe("resolveExecutionSettings", () => {
  it("falls back to the config file", () => {
    expect(resolveExecutionSettings(config.execution, {})).toEqual({
      parallelism: 4,
      retryAttempts: 5,
      retryDelayMs: 10_000,
      maxRetryDelayMs: 120_000,
      backoff: "fixed",
    });
  });

  it("prefers manifest retry defaults over the config file", () => {
    const settings = resolveExecutionSettings(config.execution, { attempts: 2, delayMs: 500 });
    expect(settings.retryAttempts).toBe(2);
    expect(settings.retryDelayMs).toBe(500);
  });

  it("lets explicit overrides win", () => {
    const settings = resolveExecutionSettings(
      config.execution,
      { attempts: 2, delayMs: 500 },
      { parallelism: 1, retryAttempts: 7, retryDelayMs: 0 }
    );
    expect(settings).toMatchObject({ parallelism: 1, retryAttempts: 7, retryDelayMs: 0 });
  });
});

describe("manifestLoadOptions", () => {
  it("passes config health timings as defaults", () => {
    expect(manifestLoadOptions(config.health)).toEqual({
      healthDefaults: { interval: 30, timeout: 120, retries: 3 },
    });
  });

  it("adds a health timeout override", () => {
    expect(manifestLoadOptions(config.health, { healthTimeout: 15 }).healthOverrides).toEqual({ timeout: 15 });
  });
});
