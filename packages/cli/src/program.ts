import { Command } from 'commander';
import { setLogLevel } from '@labfleet/shared';
import type { LogLevel, ResourceKind } from '@labfleet/shared';
import { Orchestrator, type SettingsOverrides } from '@labfleet/orchestrator';
import { loadConfig } from './config-loader.js';
import { applyCommand } from './commands/apply.js';
import { decommissionCommand } from './commands/decommission.js';
import { ExitCode, reportError } from './commands/exit-codes.js';
import { graphCommand } from './commands/graph.js';
import { planCommand } from './commands/plan.js';
import { statusCommand } from './commands/status.js';
import { validateCommand } from './commands/validate.js';
import {
  parseKind,
  parseList,
  parseLogLevel,
  parseNonNegativeInteger,
  parsePositiveInteger,
} from './options.js';

interface CommonOptions {
  config?: string;
  manifest?: string;
  logLevel: LogLevel;
}

interface SelectionOptions extends CommonOptions {
  only?: string[];
  skip?: string[];
  force?: string[];
  json?: boolean;
}

interface ApplyOptions extends SelectionOptions {
  parallelism?: number;
  retryAttempts?: number;
  retryDelay?: number;
  healthTimeout?: number;
}

interface StatusOptions extends CommonOptions {
  json?: boolean;
  probe?: boolean;
}

interface DecommissionOptions extends CommonOptions {
  kind?: ResourceKind;
}

function common(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file (default: ./labfleet.json when present)')
    .option('-m, --manifest <path>', 'Path to the manifest (.json, .yaml or .yml)')
    .option('-l, --log-level <level>', 'Log level (debug, info, warn, error, silent)', parseLogLevel, 'info');
}

function selection(command: Command): Command {
  return command
    .option('--only <services>', 'Restrict the plan to these services', parseList)
    .option('--skip <services>', 'Report these services as skipped instead of applying them', parseList)
    .option('--force <services>', 'Re-apply these services even when nothing changed', parseList)
    .option('--json', 'Print machine-readable JSON');
}

async function withOrchestrator(
  options: CommonOptions,
  overrides: SettingsOverrides,
  run: (orchestrator: Orchestrator) => Promise<ExitCode>
): Promise<void> {
  setLogLevel(options.logLevel);
  let orchestrator: Orchestrator | undefined;
  try {
    const config = loadConfig(options.config);
    if (options.manifest) config.manifest.path = options.manifest;
    orchestrator = new Orchestrator({ config, overrides });
    process.exitCode = await run(orchestrator);
  } catch (err) {
    process.exitCode = reportError(err);
  } finally {
    orchestrator?.close();
  }
}

/** Aborts on the first SIGINT or SIGTERM; in-flight collaborator calls still finish. */
async function withSignal<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.error(`Received ${signal}, finishing in-flight work...`);
    controller.abort(signal);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    return await run(controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('labfleet')
    .description('Manifest-driven deployment orchestrator for a fleet of service containers')
    .version('0.1.0');

  selection(common(program.command('plan')))
    .description('Show what apply would do, without changing anything')
    .action(async (options: SelectionOptions) => {
      await withOrchestrator(options, {}, (orchestrator) => planCommand(orchestrator, options));
    });

  selection(common(program.command('apply')))
    .description('Converge the fleet to the manifest, phase by phase')
    .option('--parallelism <n>', 'Services applied concurrently within a layer', parsePositiveInteger)
    .option('--retry-attempts <n>', 'Attempts per item before it fails', parsePositiveInteger)
    .option('--retry-delay <ms>', 'Delay between attempts in milliseconds', parseNonNegativeInteger)
    .option('--health-timeout <seconds>', 'Override every health probe timeout', parsePositiveInteger)
    .action(async (options: ApplyOptions) => {
      const overrides: SettingsOverrides = {
        parallelism: options.parallelism,
        retryAttempts: options.retryAttempts,
        retryDelayMs: options.retryDelay,
        healthTimeout: options.healthTimeout,
      };
      await withOrchestrator(options, overrides, (orchestrator) =>
        withSignal((signal) => applyCommand(orchestrator, options, signal))
      );
    });

  common(program.command('status'))
    .description('Show recorded state and last-known health per service')
    .option('--json', 'Print machine-readable JSON')
    .option('--probe', 'Run health probes now instead of reporting the last result')
    .action(async (options: StatusOptions) => {
      await withOrchestrator(options, {}, (orchestrator) =>
        withSignal((signal) => statusCommand(orchestrator, options, signal))
      );
    });

  common(program.command('validate'))
    .description('Validate the manifest and report every violation')
    .action(async (options: CommonOptions) => {
      await withOrchestrator(options, {}, (orchestrator) => validateCommand(orchestrator));
    });

  common(program.command('graph'))
    .description('Print the deployment phases and dependency layers')
    .option('--json', 'Print machine-readable JSON')
    .action(async (options: CommonOptions & { json?: boolean }) => {
      await withOrchestrator(options, {}, (orchestrator) => graphCommand(orchestrator, options));
    });

  common(program.command('decommission'))
    .description('Forget what is recorded for a service (nothing is torn down)')
    .argument('<service>', 'Service name')
    .option('--kind <kind>', 'Only forget this resource kind', parseKind)
    .action(async (service: string, options: DecommissionOptions) => {
      await withOrchestrator(options, {}, (orchestrator) => decommissionCommand(orchestrator, service, options.kind));
    });

  return program;
}
