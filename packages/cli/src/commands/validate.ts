import type { Orchestrator } from '@labfleet/orchestrator';
import { ExitCode, reportError } from './exit-codes.js';

export async function validateCommand(orchestrator: Pick<Orchestrator, 'graph'>): Promise<ExitCode> {
  try {
    const graph = await orchestrator.graph();
    console.log('Manifest is valid!');
    console.log(`  Services: ${graph.order.length} enabled`);
    console.log(`  Layers:   ${graph.layers.length}`);
    return ExitCode.Ok;
  } catch (err) {
    return reportError(err);
  }
}
