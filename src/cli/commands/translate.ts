import { translateDetailed } from '../../engine/translator.js';
import type { TranslationResult } from '../../types.js';
import { code, warn } from '../utils/logger.js';

export interface TranslateOptions {
  json?: boolean;
}

/**
 * 翻译命令行传入的指令（多个参数以空格拼接）并输出代码。
 *
 * 无法识别的指令照常输出哨兵文本，退出码保持 0。
 */
export async function translateCommand(words: readonly string[], options: TranslateOptions = {}): Promise<TranslationResult> {
  const instruction = words.join(' ');
  const result = translateDetailed(instruction);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  code(result.code);
  if (result.kind === 'unrecognized') {
    warn('No rule matched this instruction');
  }
  return result;
}
