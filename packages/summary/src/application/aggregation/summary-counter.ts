import { getOrCreate, incrementCount } from '@lintstat/core/collections';

import type {
  LibrarySummary,
  MessageSummary,
  PackageSummary,
} from '../../domain/summary/summary-nodes.js';
import { RecursiveSummaryVisitor } from '../../domain/summary/summary-visitor.js';

/**
 * Row label used for units that belong to no package (system and loose units).
 */
export const OTHER_PACKAGE = '*other*';

/**
 * Visitor that counts messages per package and kind, and lines of code per
 * package, plus totals across the whole tree.
 *
 * Every map preserves the order in which keys were first seen during traversal.
 */
export class SummaryCounter extends RecursiveSummaryVisitor {
  /** package → kind → number of messages. */
  readonly errorCount = new Map<string, Map<string, number>>();
  /** package → lines of code. */
  readonly linesOfCode = new Map<string, number>();
  /** kind → number of messages across every unit. */
  readonly totals = new Map<string, number>();
  totalLinesOfCode = 0;

  private readonly packageOrder = new Set<string>();
  private currentPackageName: string | undefined;

  get currentPackage(): string {
    return this.currentPackageName ?? OTHER_PACKAGE;
  }

  /**
   * Every package that contributed a library or a message, in first-seen order.
   */
  get packages(): readonly string[] {
    return [...this.packageOrder];
  }

  override visitPackage(summary: PackageSummary): void {
    this.currentPackageName = summary.name;
    super.visitPackage(summary);
    this.currentPackageName = undefined;
  }

  override visitLibrary(library: LibrarySummary): void {
    this.packageOrder.add(this.currentPackage);
    super.visitLibrary(library);
    incrementCount(this.linesOfCode, this.currentPackage, library.lines);
    this.totalLinesOfCode += library.lines;
  }

  override visitMessage(message: MessageSummary): void {
    this.packageOrder.add(this.currentPackage);
    const counts = getOrCreate(
      this.errorCount,
      this.currentPackage,
      () => new Map<string, number>(),
    );
    incrementCount(counts, message.kind);
    incrementCount(this.totals, message.kind);
  }
}
