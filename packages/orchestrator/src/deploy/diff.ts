import { createLogger, fingerprint, RESOURCE_KINDS, ValidationError } from "@labfleet/shared";
import type {
  Manifest,
  Network,
  OrphanedRecord,
  Plan,
  PlanOptions,
  ResourceKind,
  Service,
  StateDocument,
  Violation,
  WorkAction,
  WorkItem,
} from "@labfleet/shared";
import { phaseFor, phaseIndex, requiredKinds, type PhaseGraph } from "./dependency-graph.js";

const logger = createLogger("diff");

/** What the diff engine needs from the state store. */
export interface RecordedState {
  fingerprintOf(service: string, kind: ResourceKind): string | undefined;
  snapshot(): StateDocument;
}

const KIND_PRIORITY: Record<ResourceKind, number> = {
  container: 0,
  identity_registration: 1,
  configuration_applied: 2,
};

/**
 * The slice of desired state a resource kind is fingerprinted over. Each
 * interface facet lands in exactly one fragment. Health timings enter as the
 * manifest declares them, so config file and CLI values never force an update.
 */
export function fragmentFor(service: Service, kind: ResourceKind, network: Network): unknown {
  const facets = service.interface;
  switch (kind) {
    case "container":
      return {
        vmid: service.vmid,
        ip: service.address,
        hostname: service.hostname,
        resources: service.resources,
        provisioning: facets.provisioning,
        network: { gateway: network.gateway, cidr: network.cidr, vlan: network.vlanTag },
      };
    case "identity_registration":
      return { auth: facets.auth };
    case "configuration_applied":
      return {
        ip: service.address,
        hostname: service.hostname,
        ports: service.ports,
        config: service.config,
        db: facets.db,
        proxy: facets.proxy,
        health: facets.health && {
          startup: facets.health.startup,
          liveness: facets.health.liveness,
          readiness: facets.health.readiness,
          ...facets.health.declared,
        },
      };
  }
}

export function desiredFingerprint(service: Service, kind: ResourceKind, network: Network): string {
  return fingerprint(fragmentFor(service, kind, network));
}

function checkNames(manifest: Manifest, option: keyof PlanOptions, names: string[] | undefined): Violation[] {
  const violations: Violation[] = [];
  for (const name of names ?? []) {
    const service = manifest.services.get(name);
    if (!service) {
      violations.push({ path: `--${option}`, message: `unknown service "${name}"` });
    } else if (!service.enabled) {
      violations.push({ path: `--${option}`, message: `service "${name}" is disabled` });
    }
  }
  return violations;
}

export function compareItems(a: WorkItem, b: WorkItem): number {
  return (
    phaseIndex(a.phase) - phaseIndex(b.phase) ||
    a.layer - b.layer ||
    KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind] ||
    (a.service < b.service ? -1 : a.service > b.service ? 1 : 0)
  );
}

/**
 * Compares desired fingerprints with recorded ones and emits the ordered
 * work needed to converge. Pure: nothing is executed or written.
 */
export function diff(manifest: Manifest, graph: PhaseGraph, state: RecordedState, options: PlanOptions = {}): Plan {
  const violations = [
    ...checkNames(manifest, "only", options.only),
    ...checkNames(manifest, "skip", options.skip),
    ...checkNames(manifest, "force", options.force),
  ];
  if (violations.length > 0) {
    throw new ValidationError(violations, "Invalid service selection");
  }

  const only = options.only && options.only.length > 0 ? new Set(options.only) : undefined;
  const skip = new Set(options.skip ?? []);
  const force = new Set(options.force ?? []);

  const items: WorkItem[] = [];
  let unchanged = 0;
  let considered = 0;

  for (const name of graph.order) {
    const service = manifest.services.get(name);
    if (!service || (only && !only.has(name))) continue;
    considered++;

    for (const kind of requiredKinds(service)) {
      const desired = desiredFingerprint(service, kind, manifest.network);
      const recorded = state.fingerprintOf(name, kind);

      let action: WorkAction | undefined;
      if (force.has(name)) {
        action = recorded === undefined ? "create" : "update";
      } else if (recorded === undefined) {
        action = "create";
      } else if (recorded !== desired) {
        action = "update";
      }

      if (action === undefined) {
        unchanged++;
        continue;
      }
      items.push({
        service: name,
        kind,
        action: skip.has(name) ? "skip" : action,
        phase: phaseFor(service, kind),
        layer: graph.layerOf(name),
        fingerprint: desired,
      });
    }
  }

  items.sort(compareItems);

  const orphans: OrphanedRecord[] = [];
  for (const [name, records] of Object.entries(state.snapshot().services)) {
    const service = manifest.services.get(name);
    const required = service?.enabled ? requiredKinds(service) : [];
    for (const kind of RESOURCE_KINDS) {
      if (records[kind] !== undefined && !required.includes(kind)) orphans.push({ service: name, kind });
    }
  }
  orphans.sort((a, b) => (a.service < b.service ? -1 : a.service > b.service ? 1 : KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind]));

  const summary = {
    services: considered,
    create: items.filter((i) => i.action === "create").length,
    update: items.filter((i) => i.action === "update").length,
    skip: items.filter((i) => i.action === "skip").length,
    unchanged,
  };
  logger.debug("Plan computed", { ...summary, orphans: orphans.length });

  return { items, orphans, summary };
}
