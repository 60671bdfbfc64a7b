// apps/cli/src/cli.ts
// Command wiring kept apart from process concerns so specs can drive it with fakes.
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as yaml from 'js-yaml';
import {
  ShadowError,
  errorMessage,
  redactConfig,
  type HealthStatus,
  type Logger,
  type ProposalSource,
  type ShadowConfig,
  type ShadowDatabase
} from '@shadowsql/core';
import { DecisionOrchestrator, createRequest } from '@shadowsql/engine';
import { exitCodeFor, formatOutcome } from './format';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  io: CliIO;
  loadConfig(file?: string): ShadowConfig;
  createLogger(cfg: ShadowConfig): Logger;
  openDatabase(cfg: ShadowConfig, logger: Logger): ShadowDatabase;
  openSource(cfg: ShadowConfig, logger: Logger): ProposalSource;
  readFile(file: string): string;
  /** aborted on SIGINT */
  signal?: AbortSignal;
}

interface OptimizeOptions {
  sql?: string;
  file?: string;
  database: string;
  config?: string;
  json?: boolean;
  maxAttempts?: number;
  minSpeedup?: number;
}

interface ConfigOptions {
  config?: string;
  json?: boolean;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function speedup(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 1) throw new InvalidArgumentError('must be a number greater than 1.0');
  return n;
}

function healthLine(name: string, h: PromiseSettledResult<HealthStatus>): { line: string; ok: boolean } {
  if (h.status === 'rejected') return { line: `${name}: down (${errorMessage(h.reason)})`, ok: false };
  const v = h.value;
  return v.ok
    ? { line: `${name}: ok${v.version ? ` (${v.version})` : ''}`, ok: true }
    : { line: `${name}: down (${v.error ?? 'unknown error'})`, ok: false };
}

async function optimize(opts: OptimizeOptions, deps: CliDeps): Promise<number> {
  const { io } = deps;
  if (opts.sql && opts.file) {
    io.err('error: use either --sql or --file, not both\n');
    return 1;
  }
  const sql = opts.file ? deps.readFile(opts.file) : opts.sql;
  if (!sql || !sql.trim()) {
    io.err('error: provide the query with --sql or --file\n');
    return 1;
  }

  const cfg = deps.loadConfig(opts.config);
  const logger = deps.createLogger(cfg);
  const db = deps.openDatabase(cfg, logger.child({ component: 'shadow-mysql' }));
  try {
    const orchestrator = new DecisionOrchestrator({
      db,
      source: deps.openSource(cfg, logger.child({ component: 'llm' })),
      config: cfg.verification,
      forbiddenOperations: cfg.security.forbidden_operations,
      logger
    });
    const outcome = await orchestrator.optimize(createRequest({ sql, database: opts.database }), {
      signal: deps.signal,
      maxAttempts: opts.maxAttempts,
      minSpeedup: opts.minSpeedup
    });
    io.out(`${opts.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome)}\n`);
    return exitCodeFor(outcome.status);
  } finally {
    await db.close();
  }
}

async function health(opts: ConfigOptions, deps: CliDeps): Promise<number> {
  const cfg = deps.loadConfig(opts.config);
  const logger = deps.createLogger(cfg);
  const db = deps.openDatabase(cfg, logger);
  try {
    const [dh, lh] = await Promise.allSettled([db.health(), deps.openSource(cfg, logger).health()]);
    const database = healthLine('database', dh);
    const llm = healthLine('llm', lh);
    deps.io.out(`${database.line}\n${llm.line}\n`);
    return database.ok && llm.ok ? 0 : 1;
  } finally {
    await db.close();
  }
}

function showConfig(opts: ConfigOptions, deps: CliDeps): number {
  const cfg = redactConfig(deps.loadConfig(opts.config));
  deps.io.out(opts.json ? `${JSON.stringify(cfg, null, 2)}\n` : yaml.dump(cfg, { skipInvalid: true }));
  return 0;
}

/** Runs one command line; resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { io } = deps;
  let code = 0;

  const guarded = (fn: () => Promise<number> | number) => async () => {
    try {
      code = await fn();
    } catch (e) {
      code = 1;
      io.err(e instanceof ShadowError ? `error: ${e.code}: ${e.message}\n` : `error: ${errorMessage(e)}\n`);
    }
  };

  const program = new Command()
    .name('shadowsql')
    .description('Verify LLM-proposed SQL optimizations against a shadow database')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: (s) => io.out(s), writeErr: (s) => io.err(s) });

  program
    .command('optimize')
    .description('Propose, verify and report a faster equivalent of a query')
    .option('-s, --sql <text>', 'query text')
    .option('-f, --file <path>', 'read the query from a file')
    .option('-d, --database <dialect>', 'database dialect', 'mysql')
    .option('-c, --config <path>', 'configuration file')
    .option('--json', 'print the full outcome as JSON')
    .option('--max-attempts <n>', 'proposal budget for this run', positiveInt)
    .option('--min-speedup <x>', 'required speedup ratio for this run', speedup)
    .action((opts: OptimizeOptions) => guarded(() => optimize(opts, deps))());

  program
    .command('health')
    .description('Check that the shadow database and the proposal source answer')
    .option('-c, --config <path>', 'configuration file')
    .action((opts: ConfigOptions) => guarded(() => health(opts, deps))());

  program
    .command('config')
    .description('Print the effective configuration with secrets masked')
    .option('-c, --config <path>', 'configuration file')
    .option('--json', 'print as JSON instead of YAML')
    .action((opts: ConfigOptions) => guarded(() => showConfig(opts, deps))());

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  return code;
}
