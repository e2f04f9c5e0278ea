import type { Orchestrator } from '@labfleet/orchestrator';
import type { ResourceKind } from '@labfleet/shared';
import { ExitCode, reportError } from './exit-codes.js';

export async function decommissionCommand(
  orchestrator: Pick<Orchestrator, 'decommission'>,
  service: string,
  kind?: ResourceKind
): Promise<ExitCode> {
  try {
    const removed = await orchestrator.decommission(service, kind);
    if (removed.length === 0) {
      console.log(`Nothing recorded for ${kind ? `${service}/${kind}` : service}`);
      return ExitCode.Fatal;
    }
    console.log(`Removed ${removed.map((k) => `${service}/${k}`).join(', ')} from the deployment state`);
    return ExitCode.Ok;
  } catch (err) {
    return reportError(err);
  }
}
