import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { performance } from 'node:perf_hooks';

import {
  loadReportConfig,
  parseSeverityThreshold,
  SEVERITY_THRESHOLDS,
  SummaryReporter,
  summaryToString,
  type SeverityThreshold,
} from '@lintstat/summary';
import { CommanderError, InvalidArgumentError } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import type { CliCommandModule } from '../../kernel/types.js';
import { describeCliError } from '../../utils/format-cli-error.js';
import { parseReportEvents } from './report-events.js';
import { replayReportEvents } from './replay-report-events.js';

const LOGGER_NAME = 'lintstat-cli';
const STDIN_PATH = '-';

interface ReportCommandOptions {
  readonly config?: string;
  readonly minSeverity?: SeverityThreshold;
}

const parseMinSeverityOption = (value: string): SeverityThreshold => {
  const threshold = parseSeverityThreshold(value);
  if (threshold === undefined) {
    throw new InvalidArgumentError(`Expected one of: ${SEVERITY_THRESHOLDS.join(', ')}.`);
  }
  return threshold;
};

const readEvents = async (eventsFile: string, io: CliIo): Promise<string> => {
  if (eventsFile === STDIN_PATH) {
    return io.readStdin();
  }
  return fs.readFile(path.resolve(process.cwd(), eventsFile), 'utf8');
};

export const reportCommandModule: CliCommandModule = {
  id: 'report.summary',
  register(program, context) {
    const reportCommand = program
      .command('report')
      .summary('Summarise analyzer diagnostics as a table.')
      .description(
        'Replay a JSON-lines stream of analyzer events and print the per-package summary table.',
      );

    reportCommand
      .argument('<events-file>', 'JSON-lines event stream to replay, or - to read stdin.')
      .option('--config <path>', 'Path to a lintstat configuration file.')
      .option(
        '--min-severity <level>',
        'Drop messages below this severity. Overrides report.minimumSeverity.',
        parseMinSeverityOption,
      );

    reportCommand.action(async (eventsFile: string, options: ReportCommandOptions) => {
      const logger = context.getLogger();
      const startedAt = performance.now();

      try {
        const loaded = await loadReportConfig({
          cwd: process.cwd(),
          ...(options.config === undefined ? {} : { configPath: options.config }),
        });
        const minimumSeverity = options.minSeverity ?? loaded.config.minimumSeverity;
        const events = parseReportEvents(await readEvents(eventsFile, context.io));
        const reporter = new SummaryReporter({ minimumSeverity, logger });

        replayReportEvents(events, reporter);
        context.io.writeOut(summaryToString(reporter.result));

        logger.log({
          level: 'info',
          name: LOGGER_NAME,
          event: 'report.completed',
          elapsedMs: performance.now() - startedAt,
          data: {
            events: events.length,
            droppedMessages: reporter.droppedMessageCount,
            minimumSeverity,
            config: loaded.path ?? null,
          },
        });
      } catch (error) {
        const message = describeCliError(error);
        context.io.writeErr(`Failed to build report: ${message}\n`);
        throw new CommanderError(1, 'REPORT_FAILED', message);
      }
    });
  },
};
