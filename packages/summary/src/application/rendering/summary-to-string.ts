import { formatPercentage } from '@lintstat/core/reporting';

import type { GlobalSummary } from '../../domain/summary/summary-nodes.js';
import { SummaryCounter } from '../aggregation/summary-counter.js';
import { SummaryTable, type TableEntry } from './summary-table.js';

const ANALYZER_ERROR = 'AnalyzerError';
const LINES_OF_CODE = 'LinesOfCode';

/**
 * Renders the message counts of `summary` as a table with one row per package,
 * a totals row, and a row of counts relative to the total lines of code.
 *
 * Package rows cover every package that contributed a library or a message, so a
 * package with lines of code but no messages still gets a row of zeros. The
 * `AnalyzerError` column always comes first and is never declared again when
 * that kind was reported. Percentages are `0.00` when no lines were counted.
 */
export function summaryToString(summary: GlobalSummary): string {
  const counter = new SummaryCounter();
  summary.accept(counter);

  const table = new SummaryTable();
  table.declareColumn('package');
  table.declareColumn(ANALYZER_ERROR, { abbreviate: true });

  const activeKinds = [...counter.totals.keys()].filter((kind) => kind !== ANALYZER_ERROR);
  for (const kind of activeKinds) {
    table.declareColumn(kind, { abbreviate: true });
  }
  table.declareColumn(LINES_OF_CODE, { abbreviate: true });
  table.addHeader();

  const appendRow = (label: TableEntry, cell: (kind: string) => TableEntry, last: TableEntry) => {
    table.addEntry(label);
    table.addEntry(cell(ANALYZER_ERROR));
    for (const kind of activeKinds) {
      table.addEntry(cell(kind));
    }
    table.addEntry(last);
  };

  for (const name of counter.packages) {
    const counts = counter.errorCount.get(name);
    appendRow(name, (kind) => counts?.get(kind) ?? 0, counter.linesOfCode.get(name) ?? 0);
  }

  table.addEmptyRow();
  table.addHeader();
  appendRow('total', (kind) => counter.totals.get(kind) ?? 0, counter.totalLinesOfCode);
  appendRow(
    '%',
    (kind) => formatPercentage(counter.totals.get(kind) ?? 0, counter.totalLinesOfCode),
    100,
  );

  return table.toString();
}
