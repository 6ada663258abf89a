/**
 * CLI 专用输出工具：带颜色的 ℹ/✓/⚠/✗ 前缀，与 JSON 结构化日志（utils/logger）分开。
 *
 * 生成的代码经 `code()` 原样写到 stdout，不加颜色，便于管道与重定向。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
  Dim = '\u001B[2m',
}

const RULE_WIDTH = 40;

function colorize(symbol: string, message: string, color: AnsiColor): string {
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function info(message: string): void {
  console.log(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.log(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}

/** 分隔线 */
export function divider(): void {
  console.log(`${AnsiColor.Dim}${'-'.repeat(RULE_WIDTH)}${AnsiColor.Reset}`);
}

/** 原样输出生成的代码 */
export function code(text: string): void {
  console.log(text);
}

/** 原样输出子进程的标准输出（去掉末尾换行，避免多一个空行） */
export function raw(text: string): void {
  if (text === '') return;
  console.log(text.endsWith('\n') ? text.slice(0, -1) : text);
}
