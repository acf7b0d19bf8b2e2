#!/usr/bin/env node
/**
 * cli.ts — Command-line entry point.
 *
 *   tender-tracker --run-now [--max-records N]   one tracking run
 *   tender-tracker --test-login                  log in once and report
 *
 * Scheduling is left to cron or a CI schedule: each invocation is one run and
 * the exit status says whether it succeeded.
 */

import dotenv from 'dotenv';
import { loadTrackerConfig } from './core/config';
import { ConfigError, TrackerError } from './core/errors';
import { Logger, describeError } from './core/logger';
import { TenderPipeline, withPortalRuntime } from './tenderPipeline';

const logger = new Logger('CLI');

export const USAGE = [
  'Usage: tender-tracker <command> [options]',
  '',
  'Commands:',
  '  --run-now           Run one harvest → enrich → detect → commit cycle',
  '  --test-login        Log in once (prompting for codes if needed) and exit',
  '',
  'Options:',
  '  --max-records N     Stop harvesting after N records (development)',
  '',
  'Configuration is read from the environment and from .env (see .env.example).',
].join('\n');

export interface CliOptions {
  command: 'run' | 'test-login' | 'help';
  maxRecords?: number;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { command: 'help' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--run-now':
        options.command = 'run';
        break;
      case '--test-login':
        options.command = 'test-login';
        break;
      case '--max-records': {
        const value = Number(argv[++i]);
        if (!Number.isInteger(value) || value < 0) {
          throw new ConfigError(['--max-records expects a non-negative integer']);
        }
        options.maxRecords = value;
        break;
      }
      case '--help':
      case '-h':
        return { command: 'help' };
      default:
        throw new ConfigError([`Unknown argument: ${arg}`]);
    }
  }
  return options;
}

/** Run one command and resolve with the process exit code. */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    console.error(`${describeError(err)}\n\n${USAGE}`);
    return 2;
  }

  if (options.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadTrackerConfig(env, {
      interactive: options.command === 'test-login' ? true : undefined,
      maxRecords: options.maxRecords,
    });
    Logger.setLevel(config.logLevel);

    if (options.command === 'test-login') {
      const outcome = await withPortalRuntime(config, (components) =>
        new TenderPipeline(components).testLogin(),
      );
      return outcome.kind === 'failed' ? 1 : 0;
    }

    await withPortalRuntime(config, (components) => new TenderPipeline(components).run());
    return 0;
  } catch (err) {
    const code = err instanceof TrackerError ? ` [${err.code}]` : '';
    logger.error(`Exiting with failure${code}: ${describeError(err)}`);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((err: unknown) => {
      console.error('Unexpected failure:', err);
      process.exitCode = 1;
    });
}
