import { createManifest, type PackageManifest } from '@lintstat/core';

export {
  MalformedTableError,
  NoCurrentUnitError,
  SchemaFrozenError,
  SummaryReportError,
  type SummaryReportErrorCode,
} from './domain/errors.js';

export {
  resolveUnitIdentity,
  type UnitIdentifier,
  type UnitIdentity,
  type UnitScope,
} from './domain/identity/unit-identity.js';

export {
  isSeverity,
  isSeverityThreshold,
  meetsSeverityThreshold,
  parseSeverityThreshold,
  SEVERITIES,
  SEVERITY_THRESHOLDS,
  SEVERITY_WEIGHTS,
  severityToLogLevel,
  type Severity,
  type SeverityThreshold,
} from './domain/severity/severity.js';

export {
  countSourceLines,
  createSourceSpan,
  createUnitSpan,
  formatSpanMessage,
  type CompilationUnitSource,
  type SourcePosition,
  type SourceSpan,
} from './domain/source/source-span.js';

export {
  GlobalSummary,
  HtmlSummary,
  LibrarySummary,
  MessageSummary,
  PackageSummary,
  type SummaryNode,
  type UnitSummary,
} from './domain/summary/summary-nodes.js';

export { RecursiveSummaryVisitor, type SummaryVisitor } from './domain/summary/summary-visitor.js';

export {
  findUnit,
  getOrCreateHtml,
  getOrCreateLibrary,
  iterateUnits,
  mergeGlobalSummaries,
} from './domain/summary/summary-tree.js';

export {
  CompilerReporter,
  type CheckerReporter,
  type DiagnosticMessage,
} from './application/reporting/compiler-reporter.js';

export {
  SummaryReporter,
  type SummaryReporterOptions,
  type UnitHandle,
} from './application/reporting/summary-reporter.js';

export { LogReporter } from './application/reporting/log-reporter.js';

export { OTHER_PACKAGE, SummaryCounter } from './application/aggregation/summary-counter.js';

export {
  SummaryTable,
  type DeclareColumnOptions,
  type TableEntry,
} from './application/rendering/summary-table.js';

export { summaryToString } from './application/rendering/summary-to-string.js';

export {
  DEFAULT_REPORT_CONFIG,
  loadReportConfig,
  parseReportConfig,
  type LoadedReportConfig,
  type LoadReportConfigOptions,
  type ReportConfig,
} from './application/configuration/report-config.js';

const manifestDefinition = {
  name: '@lintstat/summary',
  summary:
    'Hierarchical diagnostic summaries, aggregation visitors, and table reports for ' +
    'analyzed source units.',
} as const satisfies PackageManifest;

export const manifest = createManifest(manifestDefinition);
