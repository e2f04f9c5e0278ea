import { mkdir, readFile, rename, writeFile, unlink } from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { randomBytes } from "node:crypto";
import { createLogger, errorMessage, RESOURCE_KINDS, StateError, stateDocumentSchema } from "@labfleet/shared";
import type { DeploymentRecord, ResourceKind, StateDocument, WorkItem } from "@labfleet/shared";

function emptyState(): StateDocument {
  return { version: 1, updated_at: null, services: {} };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * StateStore owns the deployment state document. The whole document is read
 * once at start and rewritten after every change through a temp file + rename,
 * so a crash leaves either the previous or the next complete document on disk.
 * Writes are chained on a single promise: concurrent callers are serialized.
 */
export class StateStore {
  private logger = createLogger("state-store");
  private state: StateDocument;
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    private readonly path: string,
    initial: StateDocument
  ) {
    this.state = initial;
  }

  static async load(path: string): Promise<StateStore> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return new StateStore(path, emptyState());
      throw new StateError(path, "cannot be read", { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new StateError(path, "is not valid JSON", { cause: err });
    }

    const parsed = stateDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new StateError(path, `does not match the state schema (${detail})`);
    }
    return new StateStore(path, parsed.data);
  }

  has(service: string, kind: ResourceKind): boolean {
    return this.state.services[service]?.[kind] !== undefined;
  }

  fingerprintOf(service: string, kind: ResourceKind): string | undefined {
    return this.state.services[service]?.[kind]?.fingerprint;
  }

  recordOf(service: string, kind: ResourceKind): DeploymentRecord | undefined {
    return this.state.services[service]?.[kind];
  }

  /** Deep copy of the current document. */
  snapshot(): StateDocument {
    return structuredClone(this.state);
  }

  async record(item: WorkItem, fingerprint: string, outputs?: Record<string, string>): Promise<void> {
    await this.mutate((draft, now) => {
      const records = draft.services[item.service] ?? {};
      const entry: DeploymentRecord = { fingerprint, updated_at: now };
      if (outputs && Object.keys(outputs).length > 0) entry.outputs = outputs;
      records[item.kind] = entry;
      draft.services[item.service] = records;
    });
    this.logger.debug(`Recorded ${item.service}/${item.kind}`, { action: item.action });
  }

  /**
   * Explicit decommission: drops one kind, or every kind, recorded for a service.
   * Returns the kinds that were removed.
   */
  async remove(service: string, kind?: ResourceKind): Promise<ResourceKind[]> {
    const records = this.state.services[service];
    if (!records) return [];
    const removed = RESOURCE_KINDS.filter(
      (k) => records[k] !== undefined && (kind === undefined || k === kind)
    );
    if (removed.length === 0) return [];

    await this.mutate((draft) => {
      const current = draft.services[service];
      if (!current) return;
      for (const k of removed) delete current[k];
      if (Object.keys(current).length === 0) delete draft.services[service];
    });
    this.logger.info(`Decommissioned ${service}`, { kinds: removed.join(",") });
    return removed;
  }

  /** Resolves once every write queued so far has reached the disk. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private mutate(change: (draft: StateDocument, now: string) => void): Promise<void> {
    const run = async () => {
      const now = new Date().toISOString();
      const draft = structuredClone(this.state);
      change(draft, now);
      draft.updated_at = now;
      await this.writeAtomically(draft);
      this.state = draft;
    };
    const next = this.writeChain.then(run);
    // Keep the chain usable after a failed write; the caller still sees the rejection.
    this.writeChain = next.catch((err: unknown) => {
      this.logger.error(`State write failed`, { path: this.path, error: errorMessage(err) });
    });
    return next;
  }

  private async writeAtomically(doc: StateDocument): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });
    const temp = join(dir, `.${basename(this.path)}.${randomBytes(6).toString("hex")}.tmp`);
    try {
      await writeFile(temp, `${JSON.stringify(doc, null, 2)}\n`, { encoding: "utf-8", flag: "wx" });
      await rename(temp, this.path);
    } catch (err) {
      await unlink(temp).catch((cleanupErr: unknown) => {
        if (!isMissingFile(cleanupErr)) {
          this.logger.warn(`Could not remove temp file ${temp}`, { error: errorMessage(cleanupErr) });
        }
      });
      throw new StateError(this.path, "write failed", { cause: err });
    }
  }
}
