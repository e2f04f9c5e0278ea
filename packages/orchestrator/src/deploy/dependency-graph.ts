import { createLogger, CycleError, TOP_LEVEL_PHASES } from "@labfleet/shared";
import type { Manifest, ResourceKind, Service, TopLevelPhase } from "@labfleet/shared";

export interface GraphLayer {
  index: number;
  services: string[]; // lexicographic
}

export interface PhaseGroup {
  phase: TopLevelPhase;
  index: number;
  /** Layers that contribute at least one service to this phase. */
  layers: GraphLayer[];
}

export interface PhaseGraph {
  layers: GraphLayer[];
  phases: PhaseGroup[];
  order: string[]; // topological order, layer by layer
  layerOf(service: string): number;
  dependenciesOf(service: string): string[];
  dependentsOf(service: string): string[];
}

/**
 * Depth-first search for dependency cycles over an adjacency list. Each cycle is
 * reported once, starting from its lexicographically smallest member, with the
 * start repeated at the end (a -> b -> a).
 */
export function findCycles(edges: ReadonlyMap<string, readonly string[]>): string[][] {
  const WHITE = 0;
  const GREY = 1;
  const BLACK = 2;
  const color = new Map<string, number>();
  const stack: string[] = [];
  const seen = new Set<string>();
  const cycles: string[][] = [];

  const visit = (node: string) => {
    color.set(node, GREY);
    stack.push(node);
    for (const dep of [...(edges.get(node) ?? [])].sort()) {
      if (!edges.has(dep)) continue;
      const state = color.get(dep) ?? WHITE;
      if (state === GREY) {
        const cycle = stack.slice(stack.indexOf(dep));
        const key = canonicalCycle(cycle);
        if (!seen.has(key.join(">"))) {
          seen.add(key.join(">"));
          cycles.push([...key, key[0] ?? dep]);
        }
      } else if (state === WHITE) {
        visit(dep);
      }
    }
    stack.pop();
    color.set(node, BLACK);
  };

  for (const node of [...edges.keys()].sort()) {
    if ((color.get(node) ?? WHITE) === WHITE) visit(node);
  }
  return cycles;
}

function canonicalCycle(cycle: string[]): string[] {
  let start = 0;
  cycle.forEach((name, i) => {
    const current = cycle[start];
    if (current !== undefined && name < current) start = i;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

/**
 * Top-level phase of a resource: core services are provisioned in the
 * infrastructure phase, configured in the core phase and registered with the
 * identity provider in the identity phase; application services roll out
 * every resource in the applications phase.
 */
export function phaseFor(service: Pick<Service, "tier">, kind: ResourceKind): TopLevelPhase {
  if (service.tier === "application") return "applications";
  switch (kind) {
    case "container":
      return "infrastructure";
    case "configuration_applied":
      return "core";
    case "identity_registration":
      return "identity";
  }
}

export function phaseIndex(phase: TopLevelPhase): number {
  return TOP_LEVEL_PHASES.indexOf(phase);
}

/** Resource kinds a service needs, in execution order. */
export function requiredKinds(service: Service): ResourceKind[] {
  const kinds: ResourceKind[] = [];
  if (service.interface.provisioning) kinds.push("container");
  const auth = service.interface.auth;
  if (auth && (auth.type === "oidc" || auth.type === "forward-auth")) kinds.push("identity_registration");
  kinds.push("configuration_applied");
  return kinds;
}

export class DependencyGraphBuilder {
  private logger = createLogger("dependency-graph");

  build(manifest: Manifest): PhaseGraph {
    const enabled = [...manifest.services.values()].filter((s) => s.enabled);
    const edges = new Map<string, string[]>();
    const dependents = new Map<string, string[]>();

    for (const service of enabled) {
      edges.set(service.name, [...service.dependsOn]);
      dependents.set(service.name, []);
    }
    for (const service of enabled) {
      for (const dep of service.dependsOn) {
        dependents.get(dep)?.push(service.name);
      }
    }

    const cycles = findCycles(edges);
    if (cycles.length > 0) {
      throw new CycleError(cycles);
    }

    // Kahn's algorithm, one layer per round: layer = 1 + max(layer of dependencies)
    const layerByService = new Map<string, number>();
    const remaining = new Map<string, number>();
    for (const [name, deps] of edges) {
      remaining.set(name, deps.filter((d) => edges.has(d)).length);
    }

    const layers: GraphLayer[] = [];
    let frontier = [...remaining].filter(([, degree]) => degree === 0).map(([name]) => name);

    while (frontier.length > 0) {
      const index = layers.length;
      const current = [...frontier].sort();
      layers.push({ index, services: current });

      const next: string[] = [];
      for (const name of current) {
        layerByService.set(name, index);
        remaining.delete(name);
        for (const dependent of dependents.get(name) ?? []) {
          const degree = (remaining.get(dependent) ?? 0) - 1;
          remaining.set(dependent, degree);
          if (degree === 0) next.push(dependent);
        }
      }
      frontier = next;
    }

    const order = layers.flatMap((l) => l.services);
    const phases = TOP_LEVEL_PHASES.map((phase, index) => ({
      phase,
      index,
      layers: layers
        .map((layer) => ({
          index: layer.index,
          services: layer.services.filter((name) => {
            const service = manifest.services.get(name);
            return service !== undefined && requiredKinds(service).some((kind) => phaseFor(service, kind) === phase);
          }),
        }))
        .filter((layer) => layer.services.length > 0),
    }));

    this.logger.debug(`Dependency graph built`, {
      services: order.length,
      layers: layers.length,
    });

    return {
      layers,
      phases,
      order,
      layerOf: (service) => {
        const layer = layerByService.get(service);
        if (layer === undefined) throw new Error(`Service "${service}" is not part of the deployment graph`);
        return layer;
      },
      dependenciesOf: (service) => [...(edges.get(service) ?? [])].sort(),
      dependentsOf: (service) => [...(dependents.get(service) ?? [])].sort(),
    };
  }
}

export function buildPhaseGraph(manifest: Manifest): PhaseGraph {
  return new DependencyGraphBuilder().build(manifest);
}
