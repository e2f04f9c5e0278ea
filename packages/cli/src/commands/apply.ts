import type { Orchestrator } from '@labfleet/orchestrator';
import type { ApplyOutcome, ApplyReport, PlanOptions } from '@labfleet/shared';
import { ExitCode, reportError } from './exit-codes.js';

export interface ApplyCommandOptions extends PlanOptions {
  json?: boolean;
}

const OUTCOME_CODES: Record<ApplyOutcome, ExitCode> = {
  succeeded: ExitCode.Ok,
  failed: ExitCode.Fatal,
  partial: ExitCode.Partial,
  cancelled: ExitCode.Cancelled,
};

export function formatReport(report: ApplyReport): string[] {
  const lines: string[] = [];
  for (const phase of report.phases) {
    if (phase.state === 'empty') continue;
    lines.push(`Phase ${phase.phase}: ${phase.state}`);
    for (const entry of report.items.filter((r) => r.item.phase === phase.phase)) {
      const attempts = entry.attempts > 0 ? ` after ${entry.attempts} attempt(s)` : '';
      lines.push(`  ${entry.item.service}/${entry.item.kind}: ${entry.state}${attempts}`);
      if (entry.error) lines.push(`    error: ${entry.error}`);
      if (entry.cause && entry.cause !== entry.error) lines.push(`    cause: ${entry.cause}`);
    }
  }
  lines.push(`Outcome: ${report.outcome}`);
  return lines;
}

export async function applyCommand(
  orchestrator: Pick<Orchestrator, 'apply'>,
  options: ApplyCommandOptions,
  signal?: AbortSignal
): Promise<ExitCode> {
  try {
    const { plan, report } = await orchestrator.apply(
      { only: options.only, skip: options.skip, force: options.force },
      signal
    );
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else if (plan.items.length === 0) {
      console.log('Nothing to do: every resource matches the manifest');
    } else {
      for (const line of formatReport(report)) console.log(line);
    }
    return OUTCOME_CODES[report.outcome];
  } catch (err) {
    return reportError(err);
  }
}
