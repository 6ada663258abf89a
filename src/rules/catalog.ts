import type { CatalogEntry, RuleTable } from '../types.js';

/**
 * 从规则表派生帮助目录，保持规则声明顺序。
 *
 * 目录是规则表的投影，CLI 与 `help` 规则都从这里取数据，不另行维护文本。
 */
export function getCatalog(rules: RuleTable): readonly CatalogEntry[] {
  return Object.freeze(
    rules.map(({ id, template, description, example }) => Object.freeze({ id, template, description, example }))
  );
}
