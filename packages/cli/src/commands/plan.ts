import type { Orchestrator } from '@labfleet/orchestrator';
import type { Plan, PlanOptions, WorkAction } from '@labfleet/shared';
import { ExitCode, reportError } from './exit-codes.js';

export interface PlanCommandOptions extends PlanOptions {
  json?: boolean;
}

const SYMBOLS: Record<WorkAction, string> = {
  create: '+',
  update: '~',
  skip: '=',
};

export function formatPlan(plan: Plan): string[] {
  const { summary } = plan;
  const lines = [
    `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.skip} skipped, ${summary.unchanged} unchanged`,
  ];
  for (const item of plan.items) {
    lines.push(`  ${SYMBOLS[item.action]} ${item.service}/${item.kind} (${item.phase}, layer ${item.layer})`);
  }
  if (plan.orphans.length > 0) {
    lines.push('Recorded but no longer required (left in place):');
    for (const orphan of plan.orphans) {
      lines.push(`  ? ${orphan.service}/${orphan.kind}`);
    }
  }
  return lines;
}

export function hasPendingWork(plan: Plan): boolean {
  return plan.summary.create + plan.summary.update > 0;
}

export async function planCommand(
  orchestrator: Pick<Orchestrator, 'plan'>,
  options: PlanCommandOptions
): Promise<ExitCode> {
  try {
    const { plan } = await orchestrator.plan({ only: options.only, skip: options.skip, force: options.force });
    if (options.json) {
      console.log(JSON.stringify(plan, null, 2));
    } else {
      for (const line of formatPlan(plan)) console.log(line);
    }
    return hasPendingWork(plan) ? ExitCode.Pending : ExitCode.Ok;
  } catch (err) {
    return reportError(err);
  }
}
