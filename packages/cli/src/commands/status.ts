import type { Orchestrator, ServiceStatus } from '@labfleet/orchestrator';
import { ExitCode, reportError } from './exit-codes.js';

export interface StatusCommandOptions {
  json?: boolean;
  probe?: boolean;
}

export function formatStatus(statuses: ServiceStatus[]): string[] {
  const lines: string[] = [];
  for (const status of statuses) {
    if (!status.enabled) {
      lines.push(`${status.service} [${status.tier}] disabled`);
      continue;
    }
    lines.push(`${status.service} [${status.tier}, layer ${status.layer ?? '?'}]`);
    for (const kind of status.kinds) {
      const state = !kind.record ? 'not deployed' : kind.inSync ? 'in sync' : 'drifted';
      const when = kind.record ? ` (${kind.record.updated_at})` : '';
      lines.push(`  ${kind.kind}: ${state}${when}`);
    }
    if (status.health) {
      const reason = status.health.reason ? `: ${status.health.reason}` : '';
      lines.push(`  health: ${status.health.status}${reason} (${status.health.checkedAt})`);
    }
  }
  return lines;
}

export async function statusCommand(
  orchestrator: Pick<Orchestrator, 'status'>,
  options: StatusCommandOptions,
  signal?: AbortSignal
): Promise<ExitCode> {
  try {
    const statuses = await orchestrator.status({ probe: options.probe, signal });
    if (options.json) {
      console.log(JSON.stringify(statuses, null, 2));
    } else {
      for (const line of formatStatus(statuses)) console.log(line);
    }
    return ExitCode.Ok;
  } catch (err) {
    return reportError(err);
  }
}
