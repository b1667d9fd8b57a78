#!/usr/bin/env node
import process from 'node:process';
import chalk from 'chalk';
import meow from 'meow';
import { createLogger, formatError, isPipelineError, loadEnv, type LogLevel, type Logger } from '@keyreel/core';
import { runGenerate } from './commands/generate.js';
import { runInspect } from './commands/inspect.js';
import { createProgressPrinter, printReport, printRunSummary } from './lib/summary.js';

loadEnv(import.meta.url);

const cli = meow(
  `
Usage
  $ keyreel <command> [options]

Commands
  generate    Plan and render a clip from a prompt and reference images
  inspect     Show the report of a finished run

Options
  --inputs          YAML file with prompt, images, durationSec and segments
  --prompt, -p      What should happen in the clip
  --image, -i       Reference image (repeatable, at least one)
  --duration        Target duration in seconds
  --segments        Number of segments (defaults to what the duration needs)
  --fps             Frame rate of the generated segments and final video
  --run-id          Run id (defaults to a generated one)
  --storage-root    Directory for blobs and runs
  --backend         parallel or sequential
  --concurrency     Steps in flight with the parallel backend
  --mock / --live   Use mock or live generation services
  --log-level       info or debug

Examples
  $ keyreel generate -p "a fox chasing fireflies at dusk" -i fox.png --duration=20
  $ keyreel generate -p "a kitten's first snow" -i front.jpg -i side.jpg --live --backend=sequential
  $ keyreel generate --inputs=clips/fox.yaml --mock
  $ keyreel inspect --run-id=run-1a2b3c4d
`,
  {
    importMeta: import.meta,
    flags: {
      inputs: { type: 'string' },
      prompt: { type: 'string', shortFlag: 'p' },
      image: { type: 'string', shortFlag: 'i', isMultiple: true },
      duration: { type: 'number' },
      segments: { type: 'number' },
      fps: { type: 'number' },
      runId: { type: 'string' },
      storageRoot: { type: 'string' },
      backend: { type: 'string' },
      concurrency: { type: 'number' },
      mock: { type: 'boolean' },
      live: { type: 'boolean' },
      logLevel: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command] = cli.input;
  const { flags } = cli;
  const logger = globalThis.console;

  let logLevel: LogLevel;
  try {
    logLevel = resolveLogLevel(flags.logLevel);
  } catch (error) {
    logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
    return;
  }
  const cliLogger = createLogger({ level: logLevel });

  switch (command) {
    case 'generate': {
      if (flags.mock && flags.live) {
        logger.error('Error: use either --mock or --live, not both.');
        process.exitCode = 1;
        return;
      }
      const controller = new AbortController();
      const onInterrupt = () => {
        cliLogger.warn('Interrupted, cancelling the run...');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);
      try {
        const { config, run } = await runGenerate(
          {
            inputsPath: flags.inputs,
            prompt: flags.prompt,
            images: flags.image ?? [],
            durationSec: flags.duration,
            segments: flags.segments,
            fps: flags.fps,
            runId: flags.runId,
            storageRoot: flags.storageRoot,
            backend: flags.backend,
            concurrency: flags.concurrency,
            mocks: flags.live ? false : flags.mock ? true : undefined,
            logLevel,
          },
          { logger: cliLogger, onProgress: createProgressPrinter(cliLogger), signal: controller.signal },
        );
        printRunSummary(cliLogger, run, config.storageRoot);
        if (run.status !== 'succeeded') {
          process.exitCode = 1;
        }
      } finally {
        process.off('SIGINT', onInterrupt);
      }
      return;
    }
    case 'inspect': {
      if (!flags.runId) {
        logger.error('Error: --run-id is required.');
        process.exitCode = 1;
        return;
      }
      const report = await runInspect({ runId: flags.runId, storageRoot: flags.storageRoot });
      printReport(cliLogger, report);
      return;
    }
    default: {
      cli.showHelp(command ? 1 : 0);
    }
  }
}

function resolveLogLevel(levelFlag: string | undefined): LogLevel {
  if (levelFlag === undefined || levelFlag === 'info') {
    return 'info';
  }
  if (levelFlag === 'debug') {
    return 'debug';
  }
  throw new Error('Invalid log level. Use "info" or "debug".');
}

function reportFailure(logger: Pick<Logger, 'error'>, error: unknown): void {
  if (isPipelineError(error)) {
    logger.error(chalk.red(formatError(error)));
    return;
  }
  logger.error(chalk.red(error instanceof Error ? error.message : String(error)));
}

main().catch((error: unknown) => {
  reportFailure(globalThis.console, error);
  process.exitCode = 1;
});
