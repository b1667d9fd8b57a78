import chalk from 'chalk';
import type { Logger, PipelineRunResult, ProgressEvent, ProgressHandler, Report } from '@keyreel/core';

/**
 * Prints step completions. Step starts go to debug; retries and rework are
 * already logged by the engine.
 */
export function createProgressPrinter(logger: Pick<Logger, 'info' | 'debug'>): ProgressHandler {
  return (event: ProgressEvent) => {
    const line = formatProgressEvent(event);
    if (!line) {
      return;
    }
    if (event.type === 'step-start') {
      logger.debug(line);
    } else {
      logger.info(line);
    }
  };
}

export function formatProgressEvent(event: ProgressEvent): string | undefined {
  const counter = event.progress ? chalk.dim(`[${event.progress.completed}/${event.progress.total}] `) : '';
  switch (event.type) {
    case 'run-start':
      return chalk.bold(`Run ${event.runId} started (${event.progress?.total ?? 0} steps)`);
    case 'step-start':
      return `${event.stepId} started (attempt ${event.attempt ?? 1})`;
    case 'step-complete':
      return event.state === 'succeeded'
        ? `${counter}${chalk.green('✓')} ${event.stepId}`
        : `${counter}${chalk.red('✗')} ${event.stepId} ${event.state ?? ''}`.trimEnd();
    default:
      return undefined;
  }
}

export function printRunSummary(logger: Pick<Logger, 'info'>, run: PipelineRunResult, storageRoot: string): void {
  const colorizeStatus =
    run.status === 'succeeded' ? chalk.green : run.status === 'failed' ? chalk.red : chalk.yellow;
  const invocations = run.steps.reduce((total, step) => total + step.invocations, 0);

  logger.info('');
  logger.info(chalk.bold(`Run ${chalk.blue(run.runId)}`));
  logger.info(colorizeStatus(`Status: ${run.status} • ${run.segmentCount} segment(s) • ${invocations} invocation(s)`));
  if (run.failure) {
    logger.info(chalk.red(`Failed at ${run.failure.stepId} [${run.failure.code}]: ${run.failure.message}`));
  }

  const bullet = chalk.dim('•');
  const details: Array<[string, string]> = [[chalk.bold('Storage'), storageRoot]];
  if (run.report) {
    details.push([chalk.bold('Final video'), run.report.finalVideoPath]);
  }
  for (const [label, value] of details) {
    logger.info(`${bullet} ${label}: ${value}`);
  }
}

export function printReport(logger: Pick<Logger, 'info'>, report: Report): void {
  logger.info(chalk.bold(`Run ${chalk.blue(report.runId)}`));
  logger.info(`${chalk.dim('•')} Reference hash: ${report.referenceHash}`);
  logger.info(`${chalk.dim('•')} ${report.segments.length} segment(s) at ${report.globalFps} fps`);
  report.segments.forEach((segment, position) => {
    const video = report.videoIds[position] ?? '?';
    logger.info(`  ${segment.index}. ${segment.durationSec}s ${segment.shot} ${chalk.dim(video.slice(0, 12))}`);
  });
  logger.info(`${chalk.dim('•')} Keyframes: ${report.keyframeIds.length}`);
  logger.info(`${chalk.dim('•')} Final video: ${report.finalVideoPath}`);
}
