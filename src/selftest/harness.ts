/**
 * @module selftest/harness
 *
 * 批量自测：逐条翻译固定指令，检查输出是否包含期望片段。
 */

import { DiagnosticError, formatDiagnostic } from '../diagnostics/diagnostics.js';
import { translate } from '../engine/translator.js';
import type { SelfTestCase } from './case-file.js';

export interface SelfTestOutcome {
  readonly instruction: string;
  readonly expected: string;
  readonly actual: string;
  readonly passed: boolean;
}

export interface SelfTestReport {
  readonly outcomes: readonly SelfTestOutcome[];
  readonly passed: number;
  readonly failed: number;
}

export type TranslateFn = (instruction: string) => string;

/**
 * 运行自测用例。合成错误记为失败用例，不中断后续用例。
 */
export function runSelfTest(cases: readonly SelfTestCase[], translateFn: TranslateFn = translate): SelfTestReport {
  const outcomes = cases.map(testCase => runCase(testCase, translateFn));
  const passed = outcomes.filter(outcome => outcome.passed).length;
  return { outcomes, passed, failed: outcomes.length - passed };
}

function runCase({ instruction, expected }: SelfTestCase, translateFn: TranslateFn): SelfTestOutcome {
  let actual: string;
  try {
    actual = translateFn(instruction);
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
    return { instruction, expected, actual: formatDiagnostic(error.diagnostic), passed: false };
  }
  return { instruction, expected, actual, passed: actual.includes(expected) };
}
