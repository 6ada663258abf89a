/**
 * @module rules/literals
 *
 * 字面量推断与渲染：列表、追加、字典三类规则共用。
 *
 * **推断规则**：
 * - 去除首尾空白后匹配 `-?\d+` 的记号视为整数，输出数值字面量
 * - 其他记号一律输出带双引号的字符串字面量
 */

import type { Capture } from '../types.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';

const INTEGER_RE = /^-?\d+$/;

export function isIntegerToken(token: string): boolean {
  return INTEGER_RE.test(token.trim());
}

/**
 * 渲染整数字面量。
 *
 * 通过 BigInt 去掉前导零（Python 3 不接受 `007` 这样的十进制字面量），且不丢精度。
 */
export function renderInteger(digits: string): string {
  return BigInt(digits.trim()).toString();
}

/**
 * 渲染双引号字符串字面量，转义反斜杠与双引号。
 */
export function renderString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * 数值/字符串推断后的字面量。
 */
export function inferLiteral(token: string): string {
  const trimmed = token.trim();
  return isIntegerToken(trimmed) ? renderInteger(trimmed) : renderString(trimmed);
}

/**
 * 逗号分隔的记号，保留原始顺序，不去重。
 */
export function renderListItems(capture: Capture): string[] {
  return capture.text.split(',').map(inferLiteral);
}

/**
 * 渲染 `key:value` 列表为字典条目。
 *
 * 键始终为字符串；值按 `inferLiteral` 推断。缺少或多于一个 `:` 的条目、
 * 以及空键，都会抛出带列位置的诊断错误。
 */
export function renderDictionaryEntries(capture: Capture): string[] {
  const entries: string[] = [];
  let offset = capture.start;

  for (const pair of capture.text.split(',')) {
    const parts = pair.split(':');
    if (parts.length !== 2) {
      throw new DiagnosticError(Diagnostics.malformedPair(pair.trim(), offset + leadingSpace(pair)).build());
    }
    const [key = '', value = ''] = parts;
    if (key.trim() === '') {
      throw new DiagnosticError(Diagnostics.emptyKey(pair.trim(), offset + leadingSpace(pair)).build());
    }
    entries.push(`${renderString(key.trim())}: ${inferLiteral(value)}`);
    offset += pair.length + 1;
  }

  return entries;
}

function leadingSpace(text: string): number {
  return text.length - text.trimStart().length;
}
