import type { ManifestDocument, ServiceEntry, ServiceTier, Violation } from "@labfleet/shared";
import { cycleViolation } from "@labfleet/shared";
import { findCycles } from "../deploy/dependency-graph.js";

export interface DeclaredService {
  name: string;
  entry: ServiceEntry;
  /** Dotted document path, e.g. `core_services.postgresql`. */
  path: string;
  tier: ServiceTier;
}

export interface DocumentCheck {
  violations: Violation[];
  cycles: string[][];
}

export function declaredServices(doc: ManifestDocument): DeclaredService[] {
  const phases = doc.deployment_phases;
  const listedCore = new Set([...phases.infrastructure, ...phases.core, ...phases.identity]);
  const listedApps = new Set(phases.applications);

  const tierOf = (name: string, declaredCore: boolean): ServiceTier => {
    if (listedApps.has(name)) return "application";
    if (listedCore.has(name)) return "core";
    return declaredCore ? "core" : "application";
  };

  return [
    ...Object.entries(doc.core_services).map(([name, entry]) => ({
      name,
      entry,
      path: `core_services.${name}`,
      tier: tierOf(name, true),
    })),
    ...Object.entries(doc.services).map(([name, entry]) => ({
      name,
      entry,
      path: `services.${name}`,
      tier: tierOf(name, false),
    })),
  ];
}

function ipv4ToInt(address: string): number {
  return address.split(".").reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

export function cidrContains(cidr: string, address: string): boolean {
  const [base, bitsText] = cidr.split("/");
  if (base === undefined || bitsText === undefined) return false;
  const bits = Number(bitsText);
  const size = 2 ** (32 - bits);
  const start = Math.floor(ipv4ToInt(base) / size) * size;
  const value = ipv4ToInt(address);
  return value >= start && value < start + size;
}

function collectDuplicates(
  services: DeclaredService[],
  valueOf: (s: DeclaredService) => string | number | undefined,
  field: string,
  violations: Violation[]
): void {
  const owners = new Map<string | number, string>();
  for (const service of services) {
    const value = valueOf(service);
    if (value === undefined) continue;
    const owner = owners.get(value);
    if (owner !== undefined) {
      violations.push({
        path: `${service.path}.${field}`,
        message: `${field} ${value} is already assigned to ${owner}`,
      });
    } else {
      owners.set(value, service.name);
    }
  }
}

/**
 * Semantic checks over a schema-valid document. Every violation is collected;
 * cycles are returned separately so the caller can raise a CycleError.
 */
export function checkDocument(doc: ManifestDocument): DocumentCheck {
  const violations: Violation[] = [];
  const services = declaredServices(doc);
  const byName = new Map<string, DeclaredService>();

  for (const service of services) {
    if (byName.has(service.name)) {
      violations.push({
        path: service.path,
        message: `service "${service.name}" is declared in both core_services and services`,
      });
      continue;
    }
    byName.set(service.name, service);
  }

  const enabled = services.filter((s) => s.entry.enable);

  for (const service of services) {
    const { entry } = service;

    entry.depends_on.forEach((dep, i) => {
      const path = `${service.path}.depends_on.${i}`;
      const target = byName.get(dep);
      if (dep === service.name) {
        violations.push({ path, message: `service cannot depend on itself` });
      } else if (!target) {
        violations.push({ path, message: `unknown service "${dep}"` });
      } else if (entry.enable && !target.entry.enable) {
        violations.push({ path, message: `depends on disabled service "${dep}"` });
      } else if (service.tier === "core" && target.tier === "application") {
        violations.push({
          path,
          message: `core service depends on application service "${dep}"`,
        });
      }
    });

    if (entry.interface.provisioning && entry.vmid === undefined) {
      violations.push({
        path: `${service.path}.vmid`,
        message: `required when interface.provisioning is declared`,
      });
    }

    if (entry.enable && !cidrContains(doc.network.network_cidr, entry.ip)) {
      violations.push({
        path: `${service.path}.ip`,
        message: `${entry.ip} is outside ${doc.network.network_cidr}`,
      });
    }
  }

  collectDuplicates(enabled, (s) => s.entry.ip, "ip", violations);
  collectDuplicates(enabled, (s) => s.entry.hostname, "hostname", violations);
  collectDuplicates(enabled, (s) => s.entry.vmid, "vmid", violations);

  // A public hostname belongs to exactly one service; one service may route several paths on it.
  const domainOwners = new Map<string, string>();
  for (const service of enabled) {
    const routes = new Set<string>();
    service.entry.interface.proxy.forEach((endpoint, i) => {
      const domain = endpoint.domain.toLowerCase();
      const path = `${service.path}.interface.proxy.${i}.domain`;
      const owner = domainOwners.get(domain);
      if (owner !== undefined && owner !== service.name) {
        violations.push({ path, message: `proxy domain ${domain} is already claimed by ${owner}` });
        return;
      }
      domainOwners.set(domain, service.name);
      const route = `${domain}${endpoint.path}`;
      if (routes.has(route)) {
        violations.push({ path, message: `duplicate proxy route ${route}` });
      }
      routes.add(route);
    });
  }

  for (const [phase, names] of Object.entries(doc.deployment_phases)) {
    names.forEach((name, i) => {
      if (!byName.has(name)) {
        violations.push({
          path: `deployment_phases.${phase}.${i}`,
          message: `unknown service "${name}"`,
        });
      }
    });
  }

  const edges = new Map<string, string[]>();
  for (const service of byName.values()) {
    edges.set(service.name, service.entry.depends_on);
  }
  const cycles = findCycles(edges);
  for (const cycle of cycles) {
    const head = cycle[0];
    const owner = head === undefined ? undefined : byName.get(head);
    const violation = cycleViolation(cycle);
    violations.push(owner ? { ...violation, path: `${owner.path}.depends_on` } : violation);
  }

  return { violations, cycles };
}
