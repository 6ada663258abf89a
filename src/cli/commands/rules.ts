import { getCatalog } from '../../rules/catalog.js';
import { DEFAULT_RULES } from '../../rules/rule-table.js';
import type { CatalogEntry, RuleTable } from '../../types.js';

export interface RulesOptions {
  json?: boolean;
}

/**
 * 输出帮助目录。顺序即规则匹配顺序。
 */
export async function rulesCommand(options: RulesOptions = {}, rules: RuleTable = DEFAULT_RULES): Promise<void> {
  const catalog = getCatalog(rules);

  if (options.json) {
    console.log(JSON.stringify(catalog, null, 2));
    return;
  }

  printTable(catalog);
}

function printTable(catalog: readonly CatalogEntry[]): void {
  const width = Math.max(...catalog.map(entry => entry.template.length));
  for (const entry of catalog) {
    console.log(`${entry.template.padEnd(width)}  ${entry.description} (e.g. "${entry.example}")`);
  }
}
