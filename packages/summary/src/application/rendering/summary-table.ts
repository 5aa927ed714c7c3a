import { MalformedTableError, SchemaFrozenError } from '../../domain/errors.js';

export type TableEntry = string | number;

export interface DeclareColumnOptions {
  /** Shorten the header to its non-lowercase characters and list it in the legend. */
  readonly abbreviate?: boolean;
}

const MIN_COLUMN_WIDTH = 5;
const LEGEND_KEY_WIDTH = 7;
const LOWERCASE_LETTERS = /[a-z]/g;

/**
 * Plain-text table for terminal output.
 *
 * Columns are declared first; entries then fill rows left to right, starting a
 * new row every {@link totalColumns} entries. Column widths only grow while
 * entries are added, so rows are buffered and laid out when the table is
 * rendered.
 */
export class SummaryTable {
  /** Abbreviated header → full column name, in declaration order. */
  readonly abbreviations = new Map<string, string>();

  private readonly widths: number[] = [];
  private readonly header: string[] = [];
  private readonly rows: (readonly string[])[] = [];
  private currentRow: string[] = [];
  private sealed = false;

  get totalColumns(): number {
    return this.header.length;
  }

  /** Width of every column, excluding the separating space. */
  get columnWidths(): readonly number[] {
    return [...this.widths];
  }

  /**
   * Adds a column named `name`.
   *
   * @throws {SchemaFrozenError} When rows have already been added.
   */
  declareColumn(name: string, options: DeclareColumnOptions = {}): void {
    if (this.sealed) {
      throw new SchemaFrozenError(name);
    }

    let headerName = name;
    if (options.abbreviate) {
      headerName = name.replaceAll(LOWERCASE_LETTERS, '');
      while (this.abbreviations.has(headerName)) {
        headerName = `${headerName}'`;
      }
      this.abbreviations.set(headerName, name);
    }

    this.widths.push(Math.max(MIN_COLUMN_WIDTH, headerName.length + 1));
    this.header.push(headerName);
  }

  /**
   * Appends one cell to the current row, completing the row once it holds
   * {@link totalColumns} cells.
   */
  addEntry(entry: TableEntry): void {
    if (this.totalColumns === 0) {
      throw new MalformedTableError('Cannot add entries to a table without columns.');
    }
    this.sealed = true;

    const text = String(entry);
    const position = this.currentRow.length;
    this.widths[position] = Math.max(this.widthAt(position), text.length + 1);
    this.currentRow.push(text);

    if (this.currentRow.length === this.totalColumns) {
      this.rows.push(this.currentRow);
      this.currentRow = [];
    }
  }

  /** Adds a divider row of dashes sized to the current column widths. */
  addEmptyRow(): void {
    this.startRow('divider');
    this.rows.push(this.widths.map((width) => '-'.repeat(width)));
  }

  /** Repeats the header titles; useful more than once in long tables. */
  addHeader(): void {
    this.startRow('header');
    this.rows.push([...this.header]);
  }

  /**
   * Renders the table: the first column is left aligned, the others right
   * aligned, followed by the abbreviation legend.
   *
   * @throws {MalformedTableError} When the last row is incomplete.
   */
  toString(): string {
    this.assertComplete();

    let output = '\n';
    for (const row of this.rows) {
      output += row
        .map((cell, index) =>
          index === 0 ? cell.padEnd(this.widthAt(index)) : cell.padStart(this.widthAt(index) + 1),
        )
        .join('');
      output += '\n';
    }

    output += '\nWhere:\n';
    for (const [abbreviation, name] of this.abbreviations) {
      output += `  ${abbreviation}:`.padEnd(LEGEND_KEY_WIDTH);
      output += ` ${name}\n`;
    }
    return output;
  }

  private widthAt(index: number): number {
    return this.widths[index] ?? MIN_COLUMN_WIDTH;
  }

  private startRow(kind: 'divider' | 'header'): void {
    this.assertComplete();
    if (this.totalColumns === 0) {
      throw new MalformedTableError(`Cannot add a ${kind} row to a table without columns.`);
    }
    this.sealed = true;
  }

  private assertComplete(): void {
    if (this.currentRow.length > 0) {
      throw new MalformedTableError(
        `Incomplete row: ${this.currentRow.length} of ${this.totalColumns} entries.`,
      );
    }
  }
}
