import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { createLogger } from "@labfleet/shared";
import type { HealthObservation, HealthStatus } from "@labfleet/shared";

interface HealthRow {
  service: string;
  status: string;
  reason: string | null;
  attempts: number;
  checked_at: string;
}

function toStatus(value: string): HealthStatus {
  return value === "healthy" ? "healthy" : "unhealthy";
}

function toObservation(row: HealthRow): HealthObservation {
  const observation: HealthObservation = {
    service: row.service,
    status: toStatus(row.status),
    attempts: row.attempts,
    checkedAt: row.checked_at,
  };
  if (row.reason !== null) observation.reason = row.reason;
  return observation;
}

/**
 * HealthHistory keeps the last probe result per service in SQLite so that
 * `status` can report health without probing. Uses WAL journal mode so a
 * status read does not block a running apply.
 */
export class HealthHistory {
  private db: Database.Database;
  private logger = createLogger("health-history");

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS health (
        service TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        reason TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        checked_at TEXT NOT NULL
      )
    `);
    this.logger.debug(`Health history opened at ${dbPath}`);
  }

  record(observation: HealthObservation): void {
    this.db
      .prepare(
        "INSERT OR REPLACE INTO health (service, status, reason, attempts, checked_at) VALUES (?, ?, ?, ?, ?)"
      )
      .run(
        observation.service,
        observation.status,
        observation.reason ?? null,
        observation.attempts,
        observation.checkedAt
      );
  }

  get(service: string): HealthObservation | undefined {
    const row = this.db
      .prepare<[string], HealthRow>("SELECT service, status, reason, attempts, checked_at FROM health WHERE service = ?")
      .get(service);
    return row ? toObservation(row) : undefined;
  }

  all(): HealthObservation[] {
    return this.db
      .prepare<[], HealthRow>("SELECT service, status, reason, attempts, checked_at FROM health ORDER BY service")
      .all()
      .map(toObservation);
  }

  forget(service: string): void {
    this.db.prepare("DELETE FROM health WHERE service = ?").run(service);
  }

  close(): void {
    this.db.close();
  }
}
