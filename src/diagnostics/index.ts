/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 合成错误 (SynthesisError)
 * - 诊断严重级别与诊断代码
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  SynthesisError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
  dummyPosition,
  type Diagnostic,
} from './diagnostics.js';
