import type { StructuredLogger } from '@lintstat/core/logging';

import type { UnitIdentifier } from '../../domain/identity/unit-identity.js';
import { severityToLogLevel } from '../../domain/severity/severity.js';
import { formatSpanMessage } from '../../domain/source/source-span.js';
import { CompilerReporter, type DiagnosticMessage } from './compiler-reporter.js';

const LOGGER_NAME = 'lintstat-checker';

/**
 * Reporter that forwards each diagnostic to a structured logger as soon as it is
 * seen. Unit lifecycle and clear hooks are ignored.
 */
export class LogReporter extends CompilerReporter {
  private currentUnit = '<unknown>';

  constructor(private readonly logger: StructuredLogger) {
    super();
  }

  enterLibrary(uri: UnitIdentifier): void {
    this.currentUnit = String(uri);
  }

  leaveLibrary(): void {}

  enterHtml(uri: UnitIdentifier): void {
    this.currentUnit = String(uri);
  }

  leaveHtml(): void {}

  log(message: DiagnosticMessage): void {
    const span = this.createSpan(message.begin, message.end, this.currentUnit);
    const text = `[${message.kind}] ${message.message}`;
    this.logger.log({
      level: severityToLogLevel(message.severity),
      name: LOGGER_NAME,
      event: 'checker.message',
      data: {
        kind: message.kind,
        severity: message.severity,
        file: span.file,
        line: span.start.line,
        column: span.start.column,
        message: formatSpanMessage(span, text),
      },
    });
  }

  clearLibrary(_uri: UnitIdentifier): void {}
  clearHtml(_uri: UnitIdentifier): void {}
  clearAll(): void {}
}
