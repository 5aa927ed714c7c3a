export type SummaryReportErrorCode = 'NO_CURRENT_UNIT' | 'MALFORMED_TABLE' | 'SCHEMA_FROZEN';

/**
 * Base class for the fatal conditions raised while collecting or rendering summaries.
 */
export abstract class SummaryReportError extends Error {
  abstract readonly code: SummaryReportErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a diagnostic or line count arrives while no unit has been entered.
 */
export class NoCurrentUnitError extends SummaryReportError {
  override readonly code = 'NO_CURRENT_UNIT';

  constructor(readonly operation: string) {
    super(`Cannot ${operation}: no library or HTML unit is currently entered.`);
  }
}

/**
 * Raised when table rows are incomplete, i.e. the number of entries is not a
 * multiple of the number of declared columns.
 */
export class MalformedTableError extends SummaryReportError {
  override readonly code = 'MALFORMED_TABLE';
}

/**
 * Raised when a column is declared after rows have been added to a table.
 */
export class SchemaFrozenError extends SummaryReportError {
  override readonly code = 'SCHEMA_FROZEN';

  constructor(readonly column: string) {
    super(`Cannot declare column "${column}" after rows have been added.`);
  }
}
