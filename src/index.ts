/**
 * @module nlcode
 *
 * 受限英文指令到 Python 代码片段的规则翻译引擎。
 *
 * **翻译管道**：
 * ```
 * 指令 → normalize → match（有序规则表，首个整串匹配胜出）→ synthesize → 代码 / 哨兵文本
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { translate, getCatalog, DEFAULT_RULES } from 'nlcode';
 *
 * translate('create list 1,2,apple');   // my_list = [1, 2, "apple"]
 * translate('do a backflip');           // # I don't understand. Type 'help' for available commands.
 * getCatalog(DEFAULT_RULES);            // 帮助目录（数据形式）
 * ```
 */

// 翻译引擎
export {
  Translator,
  translate,
  translateDetailed,
  match,
  UNRECOGNIZED_MARKER,
  EMPTY_INSTRUCTION_MARKER,
} from './engine/index.js';
export { normalize } from './frontend/index.js';

// 规则表与合成
export {
  createRuleTable,
  defineRule,
  DEFAULT_RULES,
  DEFAULT_RULE_DEFINITIONS,
  getCatalog,
  renderHelp,
  HELP_HEADER,
  ARITHMETIC_OPERATORS,
  inferLiteral,
  isIntegerToken,
  renderInteger,
  renderString,
  type RuleDefinition,
  type ArithmeticKeyword,
} from './rules/index.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  SynthesisError,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics/index.js';

// 宿主：执行与自测
export {
  executeSnippet,
  buildProgram,
  spawnRunner,
  SANDBOX_PRELUDE,
  type ExecutionResult,
  type ExecuteOptions,
  type ProcessRunner,
  type ProcessOutcome,
} from './runtime/python-host.js';
export {
  loadCaseFile,
  validateCaseData,
  isCaseList,
  runSelfTest,
  DEFAULT_CASE_FILE,
  type SelfTestCase,
  type SelfTestReport,
  type SelfTestOutcome,
} from './selftest/index.js';

export type {
  Capture,
  CatalogEntry,
  Rule,
  RuleMatch,
  RuleTable,
  Synthesizer,
  SynthesisContext,
  TranslationResult,
} from './types.js';
