/**
 * @module rules/synthesizers
 *
 * 合成函数：把触发器捕获渲染为 Python 代码。
 *
 * 所有函数均为纯函数，只依赖捕获与只读上下文。生成的代码引用的
 * `my_list`、`my_string`、`my_dict` 由宿主在执行环境中预先提供。
 */

import type { Capture, SynthesisContext, Synthesizer } from '../types.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import {
  inferLiteral,
  renderDictionaryEntries,
  renderInteger,
  renderListItems,
  renderString,
} from './literals.js';

/** 算术关键词到 Python 运算符的映射；触发器词汇封闭，不存在未知关键词 */
export const ARITHMETIC_OPERATORS = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
} as const;

export type ArithmeticKeyword = keyof typeof ARITHMETIC_OPERATORS;

function isArithmeticKeyword(word: string): word is ArithmeticKeyword {
  return Object.prototype.hasOwnProperty.call(ARITHMETIC_OPERATORS, word);
}

function capture(captures: readonly Capture[], index: number): Capture {
  const found = captures[index];
  if (!found) {
    throw new Error(`Missing capture group ${index + 1}`);
  }
  return found;
}

/** 零参数命令：每次返回同一段代码 */
export function fixed(code: string): Synthesizer {
  return () => code;
}

export const printText: Synthesizer = captures => `print(${renderString(capture(captures, 0).text)})`;

/** 闭区间：循环上界为 end + 1 */
export const printRange: Synthesizer = captures => {
  const start = renderInteger(capture(captures, 0).text);
  const end = (BigInt(capture(captures, 1).text) + 1n).toString();
  return `for i in range(${start}, ${end}):\n    print(i)`;
};

export const arithmetic: Synthesizer = captures => {
  const keyword = capture(captures, 0).text;
  if (!isArithmeticKeyword(keyword)) {
    throw new Error(`Unknown arithmetic keyword '${keyword}'`);
  }
  const left = renderInteger(capture(captures, 1).text);
  const right = renderInteger(capture(captures, 2).text);
  return `print(${left} ${ARITHMETIC_OPERATORS[keyword]} ${right})`;
};

export const createList: Synthesizer = captures =>
  `my_list = [${renderListItems(capture(captures, 0)).join(', ')}]`;

export const appendToList: Synthesizer = captures =>
  `my_list.append(${inferLiteral(capture(captures, 0).text)})`;

export const square: Synthesizer = captures => `print(${renderInteger(capture(captures, 0).text)} ** 2)`;

export const createString: Synthesizer = captures =>
  `my_string = ${renderString(capture(captures, 0).text)}`;

export const createDictionary: Synthesizer = captures =>
  `my_dict = {${renderDictionaryEntries(capture(captures, 0)).join(', ')}}`;

/** 变量与整数按值相等比较，消息始终加引号 */
const DIGITS_RE = /^[0-9]+$/;
const IDENTIFIER_RE = /^[\p{L}_][\p{L}\p{N}_]*$/u;

// 规范化后均为小写，True/False/None 不会出现
const PYTHON_KEYWORDS: ReadonlySet<string> = new Set([
  'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
  'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from',
  'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not',
  'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

/**
 * 条件左侧的操作数：纯数字按整数渲染（去前导零），否则必须是合法且非关键字的标识符。
 */
function renderOperand(token: Capture): string {
  if (DIGITS_RE.test(token.text)) {
    return renderInteger(token.text);
  }
  if (IDENTIFIER_RE.test(token.text) && !PYTHON_KEYWORDS.has(token.text)) {
    return token.text;
  }
  throw new DiagnosticError(Diagnostics.invalidVariable(token.text, token.start).build());
}

export const conditional: Synthesizer = captures => {
  const variable = renderOperand(capture(captures, 0));
  const value = renderInteger(capture(captures, 1).text);
  const message = renderString(capture(captures, 2).text);
  return `if ${variable} == ${value}: print(${message})`;
};

export const askInput: Synthesizer = captures =>
  `user_input = input(${renderString(capture(captures, 0).text)})`;

export const HELP_HEADER = '# Available commands:';

/**
 * 帮助：从目录渲染命令清单，每行 `# 模板 - 说明`。
 */
export function renderHelp(context: SynthesisContext): string {
  const lines = context.catalog.map(entry => `# ${entry.template} - ${entry.description}`);
  return [HELP_HEADER, ...lines].join('\n');
}

export const help: Synthesizer = (_captures, context) => renderHelp(context);
