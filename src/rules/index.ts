/**
 * @module rules
 *
 * 规则表、合成函数与字面量推断。
 */

export {
  createRuleTable,
  defineRule,
  DEFAULT_RULES,
  DEFAULT_RULE_DEFINITIONS,
  type RuleDefinition,
} from './rule-table.js';
export { getCatalog } from './catalog.js';
export { ARITHMETIC_OPERATORS, HELP_HEADER, renderHelp, type ArithmeticKeyword } from './synthesizers.js';
export {
  inferLiteral,
  isIntegerToken,
  renderDictionaryEntries,
  renderInteger,
  renderListItems,
  renderString,
} from './literals.js';
