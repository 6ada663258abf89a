/**
 * @module rules/rule-table
 *
 * 有序规则表：声明顺序即匹配优先级，第一个整串匹配的规则胜出。
 *
 * **顺序约束**：
 * 宽泛的触发器必须排在以其为前缀的字面触发器之后。`print (.+)` 能接受
 * `print list`、`print string`、`print dictionary` 和 `print numbers from ...`，
 * 因此它必须位于这些规则之后，否则后者永远不可达。
 */

import type { Rule, RuleTable, Synthesizer } from '../types.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import {
  appendToList,
  arithmetic,
  askInput,
  conditional,
  createDictionary,
  createList,
  createString,
  fixed,
  help,
  printRange,
  printText,
  square,
} from './synthesizers.js';

export interface RuleDefinition {
  readonly id: string;
  readonly template: string;
  readonly description: string;
  readonly example: string;
  /** 触发器正则源码，不含锚点；`defineRule` 负责整串锚定 */
  readonly pattern: string;
  readonly synthesize: Synthesizer;
}

/**
 * 由定义构造不可变规则。触发器被包裹为 `^(?:...)$`，启用 `d` 标志以获取捕获位置，
 * 启用 `u` 标志以便模式使用 `\p{L}` 等 Unicode 属性类。
 */
export function defineRule(definition: RuleDefinition): Rule {
  const { pattern, ...rest } = definition;
  return Object.freeze({
    ...rest,
    trigger: new RegExp(`^(?:${pattern})$`, 'du'),
  });
}

/**
 * 构造规则表并冻结。规则 id 必须唯一。
 */
export function createRuleTable(definitions: readonly RuleDefinition[]): RuleTable {
  const seen = new Set<string>();
  const rules: Rule[] = [];
  for (const definition of definitions) {
    if (seen.has(definition.id)) {
      throw new DiagnosticError(Diagnostics.duplicateRuleId(definition.id).build());
    }
    seen.add(definition.id);
    rules.push(defineRule(definition));
  }
  return Object.freeze(rules);
}

export const DEFAULT_RULE_DEFINITIONS: readonly RuleDefinition[] = [
  {
    id: 'print-range',
    template: 'print numbers from X to Y',
    description: 'Print range of numbers',
    example: 'print numbers from 1 to 5',
    pattern: String.raw`print numbers from (\d+) to (\d+)`,
    synthesize: printRange,
  },
  {
    id: 'print-list',
    template: 'print list',
    description: 'Print the list',
    example: 'print list',
    pattern: 'print list',
    synthesize: fixed('print(my_list)'),
  },
  {
    id: 'print-string',
    template: 'print string',
    description: 'Print the string',
    example: 'print string',
    pattern: 'print string',
    synthesize: fixed('print(my_string)'),
  },
  {
    id: 'print-dictionary',
    template: 'print dictionary',
    description: 'Print dictionary',
    example: 'print dictionary',
    pattern: 'print dictionary',
    synthesize: fixed('print(my_dict)'),
  },
  {
    id: 'print-text',
    template: 'print [text]',
    description: 'Print any text',
    example: 'print hello world',
    pattern: 'print (.+)',
    synthesize: printText,
  },
  {
    id: 'arithmetic',
    template: 'add/subtract/multiply/divide X and Y',
    description: 'Math operations',
    example: 'add 10 and 20',
    pattern: String.raw`(add|subtract|multiply|divide) (\d+) and (\d+)`,
    synthesize: arithmetic,
  },
  {
    id: 'create-list',
    template: 'create list X,Y,Z',
    description: 'Create a list',
    example: 'create list 1,2,3',
    pattern: 'create list (.+)',
    synthesize: createList,
  },
  {
    id: 'append-list',
    template: 'append X to list',
    description: 'Add to list',
    example: 'append 6 to list',
    pattern: 'append (.+) to list',
    synthesize: appendToList,
  },
  {
    id: 'sort-list',
    template: 'sort list',
    description: 'Sort the list',
    example: 'sort list',
    pattern: 'sort list',
    synthesize: fixed('my_list.sort()'),
  },
  {
    id: 'square',
    template: 'square X',
    description: 'Square a number',
    example: 'square 5',
    pattern: String.raw`square (\d+)`,
    synthesize: square,
  },
  {
    id: 'create-string',
    template: 'create string X',
    description: 'Create a string',
    example: 'create string hello python',
    pattern: 'create string (.+)',
    synthesize: createString,
  },
  {
    id: 'uppercase-string',
    template: 'uppercase string',
    description: 'Convert to uppercase',
    example: 'uppercase string',
    pattern: 'uppercase string',
    synthesize: fixed('my_string = my_string.upper()'),
  },
  {
    id: 'create-dictionary',
    template: 'create dictionary key:value',
    description: 'Create dictionary',
    example: 'create dictionary name:john, age:25',
    pattern: 'create dictionary (.+)',
    synthesize: createDictionary,
  },
  {
    id: 'conditional',
    template: 'if X equals Y then print Z',
    description: 'Simple if statement',
    example: 'if x equals 10 then print correct',
    pattern: String.raw`if ([\p{L}\p{N}_]+) equals (\d+) then print (.+)`,
    synthesize: conditional,
  },
  {
    id: 'loop-list',
    template: 'loop list',
    description: 'Loop through list',
    example: 'loop list',
    pattern: 'loop list',
    synthesize: fixed('for item in my_list:\n    print(item)'),
  },
  {
    id: 'ask-input',
    template: 'ask input [message]',
    description: 'Get user input',
    example: 'ask input enter your name:',
    pattern: 'ask input (.+)',
    synthesize: askInput,
  },
  {
    id: 'help',
    template: 'help',
    description: 'Show this message',
    example: 'help',
    pattern: 'help|show commands',
    synthesize: help,
  },
];

export const DEFAULT_RULES: RuleTable = createRuleTable(DEFAULT_RULE_DEFINITIONS);
