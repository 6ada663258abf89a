/**
 * @module engine/translator
 *
 * 翻译引擎：规范化 → 按序匹配 → 合成。
 *
 * **契约**：
 * - 纯函数：输出只取决于指令与规则表，调用之间不保留任何状态
 * - 无规则匹配时返回哨兵文本，不抛异常
 * - 命中规则但捕获无法渲染时抛出 `SynthesisError`
 *
 * @example
 * ```typescript
 * import { translate } from './engine/translator.js';
 *
 * translate('print numbers from 1 to 5');
 * // for i in range(1, 6):
 * //     print(i)
 * ```
 */

import type { RuleTable, SynthesisContext, TranslationResult } from '../types.js';
import { normalize } from '../frontend/normalizer.js';
import { DiagnosticError, SynthesisError } from '../diagnostics/diagnostics.js';
import { DEFAULT_RULES } from '../rules/rule-table.js';
import { getCatalog } from '../rules/catalog.js';
import { ConfigService } from '../config/config-service.js';
import { createLogger } from '../utils/logger.js';
import { match } from './matcher.js';

export const UNRECOGNIZED_MARKER = "# I don't understand. Type 'help' for available commands.";
export const EMPTY_INSTRUCTION_MARKER = '# Please enter an instruction';

/**
 * 日志级别与追踪开关在每次记录时读取配置，默认实例缓存后仍随配置变化。
 */
export class Translator {
  private readonly context: SynthesisContext;

  constructor(readonly rules: RuleTable = DEFAULT_RULES) {
    this.context = Object.freeze({ catalog: getCatalog(rules) });
  }

  /**
   * 翻译指令，返回生成的代码或哨兵文本。
   */
  translate(instruction: string): string {
    return this.translateDetailed(instruction).code;
  }

  /**
   * 翻译指令，返回带规则 id 的结构化结果。
   *
   * @throws SynthesisError 指令命中模板但捕获内容无法渲染
   */
  translateDetailed(instruction: string): TranslationResult {
    const normalized = normalize(instruction);
    if (normalized === '') {
      return { kind: 'empty', code: EMPTY_INSTRUCTION_MARKER };
    }

    const found = match(normalized, this.rules);
    if (!found) {
      this.trace('no rule matched', { instruction: normalized });
      return { kind: 'unrecognized', code: UNRECOGNIZED_MARKER };
    }

    const { rule, captures } = found;
    this.trace('rule matched', { instruction: normalized, ruleId: rule.id });

    try {
      return { kind: 'code', ruleId: rule.id, code: rule.synthesize(captures, this.context) };
    } catch (error) {
      if (error instanceof DiagnosticError && !(error instanceof SynthesisError)) {
        createLogger('translator').warn('synthesis failed', {
          ruleId: rule.id,
          code: error.diagnostic.code,
          message: error.message,
        });
        throw new SynthesisError(error.diagnostic, rule.id);
      }
      throw error;
    }
  }

  private trace(message: string, meta: Record<string, unknown>): void {
    const logger = createLogger('translator');
    if (ConfigService.getInstance().traceMatches) {
      logger.info(message, meta);
    } else {
      logger.debug(message, meta);
    }
  }
}

let defaultTranslator: Translator | null = null;

function getDefaultTranslator(): Translator {
  if (defaultTranslator === null) {
    defaultTranslator = new Translator();
  }
  return defaultTranslator;
}

/** 使用默认规则表翻译指令 */
export function translate(instruction: string): string {
  return getDefaultTranslator().translate(instruction);
}

/** 使用默认规则表翻译指令，返回结构化结果 */
export function translateDetailed(instruction: string): TranslationResult {
  return getDefaultTranslator().translateDetailed(instruction);
}
