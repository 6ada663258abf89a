import type { Capture, RuleMatch, RuleTable } from '../types.js';

/**
 * 按声明顺序查找第一个整串匹配的规则。
 *
 * 不打分、不跨规则回溯；命中即停。
 *
 * @param instruction - 已规范化的指令
 * @param rules - 有序规则表
 * @returns 命中的规则及位置捕获；无规则匹配时返回 null
 */
export function match(instruction: string, rules: RuleTable): RuleMatch | null {
  for (const rule of rules) {
    const result = rule.trigger.exec(instruction);
    if (result) {
      return { rule, captures: toCaptures(result) };
    }
  }
  return null;
}

function toCaptures(result: RegExpExecArray): Capture[] {
  const captures: Capture[] = [];
  for (let i = 1; i < result.length; i++) {
    // 未参与匹配的可选分组记为空片段
    const text = result[i] ?? '';
    const start = result.indices?.[i]?.[0] ?? 0;
    captures.push({ text, start });
  }
  return captures;
}
