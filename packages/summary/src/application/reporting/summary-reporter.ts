import { noopLogger, type StructuredLogger } from '@lintstat/core/logging';

import { NoCurrentUnitError } from '../../domain/errors.js';
import type { UnitIdentifier } from '../../domain/identity/unit-identity.js';
import { meetsSeverityThreshold, type SeverityThreshold } from '../../domain/severity/severity.js';
import {
  countSourceLines,
  createSourceSpan,
  createUnitSpan,
  type CompilationUnitSource,
} from '../../domain/source/source-span.js';
import {
  GlobalSummary,
  MessageSummary,
  type UnitSummary,
} from '../../domain/summary/summary-nodes.js';
import {
  findUnit,
  getOrCreateHtml,
  getOrCreateLibrary,
} from '../../domain/summary/summary-tree.js';
import { CompilerReporter, type DiagnosticMessage } from './compiler-reporter.js';

const LOGGER_NAME = 'lintstat-summary';

export interface SummaryReporterOptions {
  /** Messages below this severity are dropped. Defaults to `all`. */
  readonly minimumSeverity?: SeverityThreshold;
  readonly logger?: StructuredLogger;
}

/**
 * Handle on an entered unit. Recording through a handle only works while it is
 * the reporter's current unit; once it has been left, replaced by another enter
 * or discarded by `clearAll`, every recording call throws {@link NoCurrentUnitError}.
 */
export interface UnitHandle {
  readonly identifier: string;
  readonly summary: UnitSummary;
  log(message: DiagnosticMessage): void;
  /**
   * Adds `lines` to the unit's line count. HTML units do not track lines.
   *
   * @throws {RangeError} When `lines` is not a non-negative integer.
   */
  recordLineCount(lines: number): void;
  /** Records the unit's line count and resolves later messages against `source`. */
  enterCompilationUnit(source: CompilationUnitSource): void;
  /** Whether recording through this handle is still allowed. */
  readonly active: boolean;
  leaveCompilationUnit(): void;
  /** Stops being the reporter's current unit. No-op when another unit is current. */
  leave(): void;
}

class UnitCursor implements UnitHandle {
  private source: CompilationUnitSource | undefined;

  constructor(
    private readonly reporter: SummaryReporter,
    readonly summary: UnitSummary,
  ) {}

  get identifier(): string {
    return this.summary.identifier;
  }

  get active(): boolean {
    return this.reporter.currentUnit === this;
  }

  log(message: DiagnosticMessage): void {
    if (!this.reporter.accepts(message)) {
      return;
    }
    this.requireActive('log a diagnostic');
    const span = this.source
      ? createSourceSpan(this.source, message.begin, message.end)
      : createUnitSpan(this.summary.identifier);
    this.summary.messages.push(
      new MessageSummary(message.kind, message.severity, span, message.message),
    );
  }

  recordLineCount(lines: number): void {
    this.requireActive('record a line count');
    if (!Number.isInteger(lines) || lines < 0) {
      throw new RangeError(`Line counts must be non-negative integers, received ${lines}.`);
    }
    if (this.summary.type === 'library') {
      this.summary.lines += lines;
    }
  }

  enterCompilationUnit(source: CompilationUnitSource): void {
    this.requireActive('enter a compilation unit');
    this.recordLineCount(countSourceLines(source.content));
    this.source = source;
  }

  leaveCompilationUnit(): void {
    this.source = undefined;
  }

  leave(): void {
    this.reporter.release(this);
  }

  private requireActive(operation: string): void {
    if (!this.active) {
      throw new NoCurrentUnitError(operation);
    }
  }
}

/**
 * Reporter that gathers every diagnostic into a {@link GlobalSummary}.
 *
 * Logging while no unit is entered fails with {@link NoCurrentUnitError}; messages
 * below the configured minimum severity are dropped before that check.
 */
export class SummaryReporter extends CompilerReporter {
  private summary = new GlobalSummary();
  private current: UnitCursor | undefined;
  private dropped = 0;
  private readonly minimumSeverity: SeverityThreshold;
  private readonly logger: StructuredLogger;

  constructor(options: SummaryReporterOptions = {}) {
    super();
    this.minimumSeverity = options.minimumSeverity ?? 'all';
    this.logger = options.logger ?? noopLogger;
  }

  get result(): GlobalSummary {
    return this.summary;
  }

  get currentUnit(): UnitHandle | undefined {
    return this.current;
  }

  /** Number of messages dropped for falling below the minimum severity. */
  get droppedMessageCount(): number {
    return this.dropped;
  }

  enterLibrary(uri: UnitIdentifier): UnitHandle {
    return this.enter(getOrCreateLibrary(this.summary, uri), 'library');
  }

  leaveLibrary(): void {
    this.current = undefined;
  }

  enterHtml(uri: UnitIdentifier): UnitHandle {
    return this.enter(getOrCreateHtml(this.summary, uri), 'html');
  }

  leaveHtml(): void {
    this.current = undefined;
  }

  /** Spans are resolved per unit by its handle, not through the inherited source. */
  override enterCompilationUnit(source: CompilationUnitSource): void {
    this.requireCurrent('enter a compilation unit').enterCompilationUnit(source);
  }

  override leaveCompilationUnit(): void {
    this.current?.leaveCompilationUnit();
  }

  recordLineCount(lines: number): void {
    this.requireCurrent('record a line count').recordLineCount(lines);
  }

  log(message: DiagnosticMessage): void {
    if (!this.accepts(message)) {
      return;
    }
    this.requireCurrent('log a diagnostic').log(message);
  }

  clearLibrary(uri: UnitIdentifier): void {
    const unit = getOrCreateLibrary(this.summary, uri);
    unit.messages.length = 0;
    if (unit.type === 'library') {
      unit.lines = 0;
    }
    this.logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'summary.unit.clear',
      data: { identifier: unit.identifier, type: unit.type },
    });
  }

  clearHtml(uri: UnitIdentifier): void {
    const unit = findUnit(this.summary, uri);
    if (unit?.type !== 'html') {
      return;
    }
    unit.messages.length = 0;
    this.logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'summary.unit.clear',
      data: { identifier: unit.identifier, type: unit.type },
    });
  }

  clearAll(): void {
    this.summary = new GlobalSummary();
    this.current = undefined;
    this.dropped = 0;
    this.logger.log({ level: 'debug', name: LOGGER_NAME, event: 'summary.reset' });
  }

  /** @internal */
  accepts(message: DiagnosticMessage): boolean {
    if (meetsSeverityThreshold(message.severity, this.minimumSeverity)) {
      return true;
    }
    this.dropped += 1;
    return false;
  }

  /** @internal */
  release(handle: UnitHandle): void {
    if (this.current === handle) {
      this.current = undefined;
    }
  }

  private enter(unit: UnitSummary, entered: UnitSummary['type']): UnitHandle {
    const cursor = new UnitCursor(this, unit);
    this.current = cursor;
    this.logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'summary.unit.enter',
      data: { identifier: unit.identifier, type: entered },
    });
    return cursor;
  }

  private requireCurrent(operation: string): UnitCursor {
    if (!this.current) {
      throw new NoCurrentUnitError(operation);
    }
    return this.current;
  }
}
