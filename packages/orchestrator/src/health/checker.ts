import { createLogger, sleep } from "@labfleet/shared";
import type { HealthFacet, Service } from "@labfleet/shared";
import type { HealthHistory } from "../state/health-history.js";
import type { ProbeOutcome, ProbeRunner } from "./runners.js";

export type HealthResult =
  | { status: "healthy"; attempts: number; detail: string }
  | { status: "unhealthy"; attempts: number; reason: string; timedOut: boolean; cancelled: boolean };

export interface HealthCheckerOptions {
  runner: ProbeRunner;
  history?: HealthHistory;
}

class ProbeAborted extends Error {
  constructor() {
    super("probe aborted");
    this.name = "ProbeAborted";
  }
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new ProbeAborted());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ProbeAborted());
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * HealthChecker applies one polling contract to every service: the startup
 * probe runs once and must pass, then liveness (and readiness, when declared)
 * is polled every `interval` seconds for at most `retries` attempts. The whole
 * probe is bounded by `timeout` seconds and by the caller's signal.
 */
export class HealthChecker {
  private logger = createLogger("health");
  private runner: ProbeRunner;
  private history?: HealthHistory;

  constructor(options: HealthCheckerOptions) {
    this.runner = options.runner;
    this.history = options.history;
  }

  async probe(service: Service, signal?: AbortSignal): Promise<HealthResult> {
    const health = service.interface.health;
    if (!health) {
      return { status: "healthy", attempts: 0, detail: "no health probe declared" };
    }

    const controller = new AbortController();
    const onCancel = () => controller.abort("cancelled");
    if (signal?.aborted) controller.abort("cancelled");
    signal?.addEventListener("abort", onCancel, { once: true });
    const timer = setTimeout(() => controller.abort("timeout"), health.timeout * 1000);

    const progress = { attempts: 0, last: "" };
    let result: HealthResult;
    try {
      result = await untilAborted(this.poll(service, health, controller.signal, progress), controller.signal);
    } catch (err) {
      if (!(err instanceof ProbeAborted)) throw err;
      const cancelled = controller.signal.reason === "cancelled";
      const suffix = progress.last ? ` (last: ${progress.last})` : "";
      result = {
        status: "unhealthy",
        attempts: progress.attempts,
        reason: cancelled ? `probe cancelled${suffix}` : `timed out after ${health.timeout}s${suffix}`,
        timedOut: !cancelled,
        cancelled,
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCancel);
    }

    if (result.status === "healthy") {
      this.logger.info(`${service.name} is healthy`, { attempts: result.attempts });
    } else {
      this.logger.warn(`${service.name} is unhealthy: ${result.reason}`, { attempts: result.attempts });
    }

    if (!(result.status === "unhealthy" && result.cancelled)) {
      this.history?.record({
        service: service.name,
        status: result.status,
        reason: result.status === "unhealthy" ? result.reason : undefined,
        attempts: result.attempts,
        checkedAt: new Date().toISOString(),
      });
    }
    return result;
  }

  private async poll(
    service: Service,
    health: HealthFacet,
    signal: AbortSignal,
    progress: { attempts: number; last: string }
  ): Promise<HealthResult> {
    const context = { service: service.name, address: service.address, signal };
    const check = async (target: string): Promise<ProbeOutcome> => {
      const outcome = await this.runner.check(target, context);
      progress.last = outcome.detail;
      return outcome;
    };

    if (health.startup) {
      progress.attempts++;
      const startup = await check(health.startup);
      if (!startup.ok) {
        return {
          status: "unhealthy",
          attempts: progress.attempts,
          reason: `startup probe failed: ${startup.detail}`,
          timedOut: false,
          cancelled: false,
        };
      }
    }

    for (let attempt = 1; attempt <= health.retries; attempt++) {
      progress.attempts++;
      const liveness = await check(health.liveness);
      const readiness = liveness.ok && health.readiness ? await check(health.readiness) : liveness;
      if (liveness.ok && readiness.ok) {
        return { status: "healthy", attempts: progress.attempts, detail: readiness.detail };
      }
      this.logger.debug(`${service.name} liveness attempt ${attempt}/${health.retries} failed`, {
        detail: progress.last,
      });
      if (attempt < health.retries) {
        await sleep(health.interval * 1000, signal);
      }
    }

    return {
      status: "unhealthy",
      attempts: progress.attempts,
      reason: `liveness probe failed after ${health.retries} attempt(s): ${progress.last}`,
      timedOut: false,
      cancelled: false,
    };
  }
}
