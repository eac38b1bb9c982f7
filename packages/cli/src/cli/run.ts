import {
  type CheckOutcome,
  type InventoryClient,
  buildFetch,
  createVcenterClient,
} from '@storagecheck/checks';
import { logger } from '@storagecheck/shared';
import { type ConnectionConfig, loadConnectionConfig } from '../config.js';
import { outcomeFromError, runHostStorageCheck } from '../runtime/check-runner.js';
import { exitCodeFor, formatOutput } from '../runtime/output.js';
import { VERSION } from '../version.js';
import { USAGE, parseArgs, toCheckOptions } from './args.js';

export interface CliResult {
  output: string;
  exitCode: number;
  outcome?: CheckOutcome;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Builds the inventory client; defaults to vCenter over (optionally insecure) fetch */
  createClient?: (connection: ConnectionConfig) => InventoryClient;
}

function defaultClient(connection: ConnectionConfig): InventoryClient {
  const fetchFn = buildFetch({ insecure: connection.insecure, timeoutMs: connection.timeoutMs });
  return createVcenterClient(connection, fetchFn);
}

function finish(outcome: CheckOutcome): CliResult {
  logger.info({ kind: outcome.kind, severity: outcome.severity }, 'check finished');
  return { output: formatOutput(outcome), exitCode: exitCodeFor(outcome), outcome };
}

/** Parses arguments, runs the check and renders the plugin output. Never exits. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<CliResult> {
  const env = deps.env ?? process.env;
  const createClient = deps.createClient ?? defaultClient;

  try {
    const args = parseArgs(argv);
    if (args.help) return { output: USAGE, exitCode: 0 };
    if (args.version) return { output: VERSION, exitCode: 0 };

    const options = toCheckOptions(args);
    const connection = loadConnectionConfig(args, env);
    return finish(await runHostStorageCheck(options, createClient(connection)));
  } catch (err: unknown) {
    return finish(outcomeFromError(err));
  }
}
