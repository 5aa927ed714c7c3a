import type {
  GlobalSummary,
  HtmlSummary,
  LibrarySummary,
  MessageSummary,
  PackageSummary,
} from './summary-nodes.js';

export interface SummaryVisitor {
  visitGlobal(global: GlobalSummary): void;
  visitPackage(summary: PackageSummary): void;
  visitLibrary(library: LibrarySummary): void;
  visitHtml(html: HtmlSummary): void;
  visitMessage(message: MessageSummary): void;
}

/**
 * Visitor that walks the whole tree depth-first, parents before children:
 * system libraries, then packages, then loose units. Subclasses override the
 * methods they care about and call `super` to keep descending.
 */
export class RecursiveSummaryVisitor implements SummaryVisitor {
  visitGlobal(global: GlobalSummary): void {
    for (const library of global.system.values()) {
      library.accept(this);
    }
    for (const summary of global.packages.values()) {
      summary.accept(this);
    }
    for (const unit of global.loose.values()) {
      unit.accept(this);
    }
  }

  visitPackage(summary: PackageSummary): void {
    for (const library of summary.libraries.values()) {
      library.accept(this);
    }
  }

  visitLibrary(library: LibrarySummary): void {
    for (const message of library.messages) {
      message.accept(this);
    }
  }

  visitHtml(html: HtmlSummary): void {
    for (const message of html.messages) {
      message.accept(this);
    }
  }

  visitMessage(_message: MessageSummary): void {
    // Leaf node.
  }
}
