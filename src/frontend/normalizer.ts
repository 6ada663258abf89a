/**
 * @module normalizer
 *
 * 指令规范化：转为小写并去除首尾空白。
 *
 * 内部空白与标点原样保留，规则触发器依赖 `,`、`:` 这类分隔符的精确写法。
 * 规范化是幂等的：`normalize(normalize(s)) === normalize(s)`。
 */

export function normalize(instruction: string): string {
  return instruction.toLowerCase().trim();
}
