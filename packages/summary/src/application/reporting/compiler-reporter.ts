import type { UnitIdentifier } from '../../domain/identity/unit-identity.js';
import type { Severity } from '../../domain/severity/severity.js';
import {
  createSourceSpan,
  createUnitSpan,
  type CompilationUnitSource,
  type SourceSpan,
} from '../../domain/source/source-span.js';

/**
 * A diagnostic produced by the checker. Offsets point into the compilation unit
 * that is current when the message is logged.
 */
export interface DiagnosticMessage {
  /** Category of the diagnostic, e.g. the checker's error class name. */
  readonly kind: string;
  readonly severity: Severity;
  readonly begin: number;
  readonly end: number;
  readonly message: string;
}

export interface CheckerReporter {
  log(message: DiagnosticMessage): void;
}

/**
 * Receives the lifecycle of an analysis run: units are entered and left, and
 * diagnostics logged in between belong to the entered unit. The `clear*`
 * hooks drop stale results before a unit is analyzed again.
 */
export abstract class CompilerReporter implements CheckerReporter {
  protected unitSource: CompilationUnitSource | undefined;

  abstract enterLibrary(uri: UnitIdentifier): void;
  abstract leaveLibrary(): void;

  abstract enterHtml(uri: UnitIdentifier): void;
  abstract leaveHtml(): void;

  abstract log(message: DiagnosticMessage): void;

  abstract clearLibrary(uri: UnitIdentifier): void;
  abstract clearHtml(uri: UnitIdentifier): void;
  abstract clearAll(): void;

  /**
   * Called when a compilation unit of the entered unit starts. Subsequent
   * messages are resolved against its content until the next call.
   */
  enterCompilationUnit(source: CompilationUnitSource): void {
    this.unitSource = source;
  }

  leaveCompilationUnit(): void {
    this.unitSource = undefined;
  }

  protected createSpan(begin: number, end: number, fallbackFile: string): SourceSpan {
    return this.unitSource
      ? createSourceSpan(this.unitSource, begin, end)
      : createUnitSpan(fallbackFile);
  }
}
