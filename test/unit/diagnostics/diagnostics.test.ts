import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticSeverity,
  Diagnostics,
  SynthesisError,
  formatDiagnostic,
} from '../../../src/diagnostics/diagnostics.js';

describe('diagnostics', () => {
  it('DiagnosticBuilder 要求 code、message 与 span', () => {
    assert.throws(() => new DiagnosticBuilder().build(), /Diagnostic code is required/);
    assert.throws(() => DiagnosticBuilder.error(DiagnosticCode.N001_MalformedPair).build(), /message is required/);
    assert.throws(
      () => DiagnosticBuilder.error(DiagnosticCode.N001_MalformedPair).withMessage('m').build(),
      /span is required/
    );
  });

  it('withColumns 把 0 基偏移转为 1 基列号', () => {
    const diagnostic = DiagnosticBuilder.warning(DiagnosticCode.N002_EmptyKey)
      .withMessage('empty')
      .withColumns(3, 7)
      .build();
    assert.deepEqual(diagnostic, {
      severity: DiagnosticSeverity.Warning,
      code: DiagnosticCode.N002_EmptyKey,
      message: 'empty',
      span: { start: { line: 1, col: 4 }, end: { line: 1, col: 8 } },
    });
  });

  it('严重级别只有 error 与 warning', () => {
    assert.deepEqual(Object.values(DiagnosticSeverity), ['error', 'warning']);
  });

  it('invalidVariable 的列区间覆盖变量名', () => {
    const diagnostic = Diagnostics.invalidVariable('1abc', 3).build();
    assert.equal(diagnostic.code, DiagnosticCode.N003_InvalidVariable);
    assert.equal(diagnostic.message, "'1abc' is not a valid variable name");
    assert.deepEqual(diagnostic.span, { start: { line: 1, col: 4 }, end: { line: 1, col: 8 } });
  });

  it('SynthesisError 是携带规则 id 的 DiagnosticError', () => {
    const error = new SynthesisError(Diagnostics.malformedPair('name', 18).build(), 'create-dictionary');
    assert.ok(error instanceof DiagnosticError);
    assert.equal(error.name, 'SynthesisError');
    assert.equal(error.ruleId, 'create-dictionary');
    assert.deepEqual(error.pos, { line: 1, col: 19 });
  });

  it('formatDiagnostic 在源文本下方标出列位置', () => {
    const diagnostic = Diagnostics.malformedPair('name', 18).build();
    assert.equal(
      formatDiagnostic(diagnostic, 'create dictionary name'),
      [
        "error N001: Expected exactly one ':' in dictionary pair 'name' at 1:19",
        '> 1| create dictionary name',
        `>    ${' '.repeat(18)}^`,
      ].join('\n')
    );
  });
});
