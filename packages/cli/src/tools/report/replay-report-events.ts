import { NoCurrentUnitError, type SummaryReporter } from '@lintstat/summary';

import type { ParsedReportEvent, ReportEvent } from './report-events.js';

const applyCompilationUnit = (
  reporter: SummaryReporter,
  event: Extract<ReportEvent, { type: 'compilationUnit' }>,
): void => {
  if (event.lines !== undefined) {
    reporter.recordLineCount(event.lines);
    return;
  }
  const unit = reporter.currentUnit;
  if (!unit) {
    throw new NoCurrentUnitError('enter a compilation unit');
  }
  reporter.enterCompilationUnit({
    uri: event.uri ?? unit.identifier,
    content: event.content ?? '',
  });
};

const applyEvent = (reporter: SummaryReporter, event: ReportEvent): void => {
  switch (event.type) {
    case 'enterLibrary': {
      reporter.enterLibrary(event.uri);
      return;
    }
    case 'enterHtml': {
      reporter.enterHtml(event.uri);
      return;
    }
    case 'compilationUnit': {
      applyCompilationUnit(reporter, event);
      return;
    }
    case 'log': {
      reporter.log({
        kind: event.kind,
        severity: event.severity,
        begin: event.begin,
        end: event.end,
        message: event.message,
      });
      return;
    }
    case 'leaveLibrary': {
      reporter.leaveCompilationUnit();
      reporter.leaveLibrary();
      return;
    }
    case 'leaveHtml': {
      reporter.leaveCompilationUnit();
      reporter.leaveHtml();
      return;
    }
    case 'clearLibrary': {
      reporter.clearLibrary(event.uri);
      return;
    }
    case 'clearHtml': {
      reporter.clearHtml(event.uri);
      return;
    }
    case 'clearAll': {
      reporter.clearAll();
      return;
    }
  }
};

/**
 * Feeds parsed events into `reporter` in order.
 *
 * @returns The reporter, for chaining.
 */
export function replayReportEvents(
  events: Iterable<ParsedReportEvent>,
  reporter: SummaryReporter,
): SummaryReporter {
  for (const { event } of events) {
    applyEvent(reporter, event);
  }
  return reporter;
}
