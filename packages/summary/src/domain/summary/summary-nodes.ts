import type { Severity } from '../severity/severity.js';
import type { SourceSpan } from '../source/source-span.js';
import type { SummaryVisitor } from './summary-visitor.js';

/**
 * Node of the summary tree. Every node dispatches to the matching visitor method.
 */
export interface SummaryNode {
  accept(visitor: SummaryVisitor): void;
}

/**
 * One recorded diagnostic.
 */
export class MessageSummary implements SummaryNode {
  constructor(
    /** Category of the diagnostic, e.g. the analyzer error class name. */
    readonly kind: string,
    readonly severity: Severity,
    readonly location: SourceSpan,
    readonly text: string,
  ) {
    Object.freeze(this);
  }

  accept(visitor: SummaryVisitor): void {
    visitor.visitMessage(this);
  }
}

/**
 * Summary of one analyzed library. `lines` accumulates the line counts of every
 * compilation unit recorded for the library until it is cleared.
 */
export class LibrarySummary implements SummaryNode {
  readonly type = 'library';
  readonly messages: MessageSummary[] = [];
  lines = 0;

  constructor(readonly identifier: string) {}

  accept(visitor: SummaryVisitor): void {
    visitor.visitLibrary(this);
  }
}

/**
 * Summary of one analyzed HTML document. Line counts are not tracked for HTML.
 */
export class HtmlSummary implements SummaryNode {
  readonly type = 'html';
  readonly messages: MessageSummary[] = [];

  constructor(readonly identifier: string) {}

  accept(visitor: SummaryVisitor): void {
    visitor.visitHtml(this);
  }
}

export type UnitSummary = LibrarySummary | HtmlSummary;

export class PackageSummary implements SummaryNode {
  readonly libraries = new Map<string, LibrarySummary>();

  constructor(readonly name: string) {}

  accept(visitor: SummaryVisitor): void {
    visitor.visitPackage(this);
  }
}

/**
 * Root of the summary tree: platform libraries, packages, and everything else.
 */
export class GlobalSummary implements SummaryNode {
  readonly system = new Map<string, LibrarySummary>();
  readonly packages = new Map<string, PackageSummary>();
  readonly loose = new Map<string, UnitSummary>();

  accept(visitor: SummaryVisitor): void {
    visitor.visitGlobal(this);
  }
}
