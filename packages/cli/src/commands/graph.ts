import type { Orchestrator, PhaseGraph } from '@labfleet/orchestrator';
import { ExitCode, reportError } from './exit-codes.js';

export function formatGraph(graph: PhaseGraph): string[] {
  const lines: string[] = [];
  for (const phase of graph.phases) {
    if (phase.layers.length === 0) continue;
    lines.push(`${phase.index}. ${phase.phase}`);
    for (const layer of phase.layers) {
      lines.push(`  layer ${layer.index}: ${layer.services.join(', ')}`);
    }
  }
  return lines;
}

export async function graphCommand(
  orchestrator: Pick<Orchestrator, 'graph'>,
  options: { json?: boolean }
): Promise<ExitCode> {
  try {
    const graph = await orchestrator.graph();
    if (options.json) {
      console.log(JSON.stringify({ layers: graph.layers, phases: graph.phases, order: graph.order }, null, 2));
    } else {
      for (const line of formatGraph(graph)) console.log(line);
    }
    return ExitCode.Ok;
  } catch (err) {
    return reportError(err);
  }
}
