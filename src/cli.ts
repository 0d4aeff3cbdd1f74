import { writeFile } from 'fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig, VolleyConfig } from './config.js';
import { ExecutionCoordinator } from './coordinator.js';
import { FatalSchedulingError, ValidationError, errorMessage } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { toLoadTestPlan } from './plan.js';
import { formatProgress, printResults, REPORT_FORMATS, ReportFormat } from './reporter.js';
import { createDescriptor, isHttpMethod } from './request.js';
import { FetchTransport } from './transport.js';
import { HttpMethod } from './types.js';

interface RunOptions {
  method: HttpMethod;
  header: Record<string, string>;
  data?: string;
  query: Record<string, string>;
  param: Record<string, string>;
  threads: number;
  iterations: number;
  timeout: number;
  followRedirects: boolean;
  maxDuration?: number;
  output: ReportFormat;
  plan?: string;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  if (!isHttpMethod(upper)) {
    throw new InvalidArgumentError(`Unsupported method "${value}".`);
  }
  return upper;
}

function collectPair(separator: string) {
  return (value: string, previous: Record<string, string>): Record<string, string> => {
    const index = value.indexOf(separator);
    if (index <= 0) {
      throw new InvalidArgumentError(`Expected "name${separator}value", got "${value}".`);
    }
    const name = value.slice(0, index).trim();
    const pairValue = value.slice(index + separator.length).trim();
    return { ...previous, [name]: pairValue };
  };
}

/**
 * Builds the `volley` program. The run command reports its exit status through `setExitCode`.
 */
export function createProgram(cfg: VolleyConfig, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('volley')
    .description('Fire one HTTP request from many concurrent workers and report the aggregate')
    .version('0.1.0');

  program
    .command('run')
    .description('Run threads × iterations calls against a URL')
    .argument('<url>', 'Fully resolved request URL, may contain {name} path placeholders')
    .addOption(new Option('-X, --method <method>', 'HTTP method').default('GET').argParser(parseMethod))
    .option('-H, --header <name:value>', 'Request header (repeatable)', collectPair(':'), {})
    .option('-d, --data <body>', 'Request body')
    .option('-q, --query <key=value>', 'Query parameter (repeatable)', collectPair('='), {})
    .option('-p, --param <key=value>', 'Path parameter (repeatable)', collectPair('='), {})
    .option('-c, --threads <number>', 'Concurrent workers', parseInteger, cfg.threads)
    .option('-n, --iterations <number>', 'Sequential calls per worker', parseInteger, cfg.iterations)
    .option('--timeout <ms>', 'Per-call timeout in milliseconds', parseInteger, cfg.timeoutMs)
    .option('--no-follow-redirects', 'Do not follow redirects')
    .option('--max-duration <ms>', 'Cancel the run after this many milliseconds', parseInteger, cfg.maxDurationMs)
    .addOption(new Option('-o, --output <format>', 'Output format').choices(REPORT_FORMATS).default('pretty'))
    .option('--plan <file>', 'Write a load-test plan description (JSON) to this file')
    .option('-v, --verbose', 'Log run lifecycle and per-call failures', cfg.verbose)
    .action(async (url: string, options: RunOptions) => {
      const logger = createConsoleLogger({ verbose: options.verbose });
      const coordinator = new ExecutionCoordinator({
        transport: new FetchTransport(),
        logger,
        progressEvery: cfg.progressEvery,
      });

      const descriptor = createDescriptor({
        method: options.method,
        url,
        headers: options.header,
        body: options.data,
        timeoutMs: options.timeout,
        followRedirects: options.followRedirects,
        queryParameters: options.query,
        pathParameters: options.param,
      });
      const parameters = { threadCount: options.threads, iterations: options.iterations };
      const interactive = options.output === 'pretty';

      try {
        if (interactive) {
          console.log(`Running ${descriptor.method} ${url}: ${parameters.threadCount} threads × ${parameters.iterations} iterations`);
        }

        const handle = coordinator.start(descriptor, parameters, {
          maxDurationMs: options.maxDuration,
          onProgress: progress => {
            if (interactive) process.stdout.write(`\r${formatProgress(progress)}`);
          },
        });

        const onSigint = () => {
          if (handle.cancel()) {
            process.stderr.write('\nCancelling, waiting for in-flight calls...\n');
          }
        };
        process.on('SIGINT', onSigint);
        const outcome = await handle.done;
        process.off('SIGINT', onSigint);
        if (interactive) console.log('');

        if (outcome.status === 'failed') {
          throw outcome.error;
        }

        printResults(outcome.result, { format: options.output });

        if (options.plan) {
          await writeFile(options.plan, JSON.stringify(toLoadTestPlan(outcome.result), null, 2) + '\n');
          logger.info('Load-test plan written', { file: options.plan });
        }

        setExitCode(outcome.status === 'cancelled' || outcome.result.failedRequests > 0 ? 1 : 0);
      } catch (error) {
        if (error instanceof ValidationError) {
          for (const message of error.errors) {
            console.error(`Error: ${message}`);
          }
        } else if (error instanceof FatalSchedulingError) {
          console.error(`Fatal: ${error.message}`);
        } else {
          console.error(`Error: ${errorMessage(error)}`);
        }
        setExitCode(2);
      }
    });

  return program;
}

/**
 * Runs the CLI and resolves with the process exit code.
 * Invalid VOLLEY_* settings exit with 2 before any argument is parsed.
 */
export async function main(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let cfg: VolleyConfig;
  try {
    cfg = loadConfig(env);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 2;
  }

  let exitCode = 0;
  const program = createProgram(cfg, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 2;
  }
  return exitCode;
}
