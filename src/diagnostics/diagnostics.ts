// Structured diagnostics with error codes and spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
}

export enum DiagnosticCode {
  // Synthesis errors (N001-N099)
  N001_MalformedPair = 'N001',
  N002_EmptyKey = 'N002',
  N003_InvalidVariable = 'N003',

  // Self-test case file errors (N101-N199)
  N101_CaseFileNotFound = 'N101',
  N102_CaseFileParseError = 'N102',
  N103_CaseFileInvalid = 'N103',

  // Rule table errors (N201-N299)
  N201_DuplicateRuleId = 'N201',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

/**
 * 合成错误：指令命中了某条规则的模板，但捕获内容无法安全渲染。
 *
 * 与“无法识别”不同，后者是正常返回值（哨兵文本）。
 */
export class SynthesisError extends DiagnosticError {
  constructor(diagnostic: Diagnostic, public readonly ruleId: string) {
    super(diagnostic);
    this.name = 'SynthesisError';
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  /** 以单行文本的 0 基偏移区间设置 span（列号转为 1 基） */
  withColumns(startOffset: number, endOffset: number): DiagnosticBuilder {
    this.span = {
      start: { line: 1, col: startOffset + 1 },
      end: { line: 1, col: endOffset + 1 },
    };
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
    };
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  malformedPair: (pair: string, startOffset: number): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N001_MalformedPair)
      .withMessage(`Expected exactly one ':' in dictionary pair '${pair}'`)
      .withColumns(startOffset, startOffset + pair.length),

  emptyKey: (pair: string, startOffset: number): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N002_EmptyKey)
      .withMessage(`Dictionary pair '${pair}' has an empty key`)
      .withColumns(startOffset, startOffset + pair.length),

  invalidVariable: (name: string, startOffset: number): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N003_InvalidVariable)
      .withMessage(`'${name}' is not a valid variable name`)
      .withColumns(startOffset, startOffset + name.length),

  caseFileNotFound: (file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N101_CaseFileNotFound)
      .withMessage(`Case file not found: ${file}`)
      .withPosition(dummyPosition()),

  caseFileParseError: (file: string, reason: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N102_CaseFileParseError)
      .withMessage(`Cannot parse case file ${file}: ${reason}`)
      .withPosition(dummyPosition()),

  caseFileInvalid: (path: string, reason: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N103_CaseFileInvalid)
      .withMessage(`Invalid case file entry at ${path}: ${reason}`)
      .withPosition(dummyPosition()),

  duplicateRuleId: (id: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.N201_DuplicateRuleId)
      .withMessage(`Duplicate rule id '${id}'`)
      .withPosition(dummyPosition()),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.col - 1)}^`;
    }
  }

  return result;
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}
