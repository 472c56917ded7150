import { Command, InvalidArgumentError } from 'commander';
import { ExecFileRunner, type CommandRunner } from '../core/commandRunner.js';
import { pool } from '../core/env.js';
import { createModuleLogger } from '../core/logger.js';
import { ensureDependencies } from '../modules/preflight.js';
import { runRecon, type ReconSummary } from '../pipeline/dispatcher.js';
import { ProgressLine, type ProgressStream } from '../report/progress.js';
import { ReportWriter } from '../report/reporter.js';

const log = createModuleLogger('cli');

export const VERSION = '1.0.0';

export interface CliOptions {
  output?: string;
  proxy?: string;
  /** 0 quiet, 1 verbose; 2 (-vv) is accepted and treated as 1 */
  verbose: number;
  concurrency: number;
}

export interface CliDeps {
  runner?: CommandRunner;
  progressStream?: ProgressStream;
  print?: (line: string) => void;
  onSummary?: (summary: ReconSummary) => void;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export async function runWithOptions(input: string, options: CliOptions, deps: CliDeps = {}): Promise<number> {
  const runner = deps.runner ?? new ExecFileRunner();

  try {
    await ensureDependencies({ runner });
  } catch (error) {
    log.error({ err: error }, error instanceof Error ? error.message : 'Dependency check failed');
    return 1;
  }

  const progress = new ProgressLine(deps.progressStream);
  const printLine = deps.print ?? ((line: string) => console.log(line));
  const print = (line: string) => {
    progress.clear();
    printLine(line);
  };

  try {
    const summary = await runRecon({
      input,
      runner,
      proxy: options.proxy,
      verbose: options.verbose > 0,
      poolSize: options.concurrency,
      writer: new ReportWriter({ outputPath: options.output, print }),
      onProgress: (event) => progress.update(event),
      echo: print,
    });
    deps.onSummary?.(summary);
  } catch (error) {
    log.error({ err: error }, error instanceof Error ? error.message : 'Run failed');
    return 1;
  }
  return 0;
}

export function buildProgram(deps: CliDeps = {}, onExit: (code: number) => void = () => {}): Command {
  const program = new Command();

  program
    .name('wayback-recon')
    .description('Recon tool for checking Wayback URLs and HTTP status codes.')
    .version(VERSION)
    .argument('<input>', 'a file containing domains, a single domain, or comma-separated domains')
    .option('-o, --output <path>', 'append results to this file')
    .option('--proxy <url>', 'proxy for the HTTP status probe')
    .option('-v, --verbose', 'print every Wayback URL and raw HTTP response (-vv reserved)', increaseVerbosity, 0)
    .option('--concurrency <n>', 'domains processed in parallel', parsePositiveInt, pool.WORKER_POOL_SIZE)
    .action(async (input: string, options: CliOptions) => {
      onExit(await runWithOptions(input, options, deps));
    });

  return program;
}
