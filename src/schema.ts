import type { TransactionProps } from './config';
import { TRANSACTION_TYPES } from './types';

export interface PropertyDef {
  type: string;
  select?: { options: Array<{ name: string }> };
}

export type PropertyMap = Record<string, PropertyDef>;

const EXPECTED: Array<{ key: keyof TransactionProps; types: string[] }> = [
  { key: 'category', types: ['title', 'rich_text'] },
  { key: 'date', types: ['date'] },
  { key: 'type', types: ['select'] },
  { key: 'amount', types: ['number'] },
];

/**
 * Compares a database's properties against the configured transaction
 * properties and returns one line per problem (empty when usable).
 * Missing select options are reported but Notion creates them on insert.
 */
export function checkTransactionsSchema(properties: PropertyMap, p: TransactionProps): string[] {
  const problems: string[] = [];
  for (const { key, types } of EXPECTED) {
    const name = p[key];
    const def = properties[name];
    if (!def) {
      problems.push(`missing property "${name}" (${types.join(' or ')})`);
      continue;
    }
    if (!types.includes(def.type)) {
      problems.push(`property "${name}" is ${def.type}, expected ${types.join(' or ')}`);
    }
  }
  const typeDef = properties[p.type];
  if (typeDef?.type === 'select') {
    const names = new Set((typeDef.select?.options || []).map((o) => o.name));
    const absent = TRANSACTION_TYPES.filter((t) => !names.has(t));
    if (absent.length) problems.push(`select "${p.type}" has no option for ${absent.join(', ')} (created on first insert)`);
  }
  return problems;
}

export function describeProperties(properties: PropertyMap): string {
  const rows = Object.entries(properties)
    .map(([name, def]) => {
      const options = def.select?.options.map((o) => o.name).filter(Boolean) || [];
      return `- ${name} (${def.type}${options.length ? `: ${options.join(', ')}` : ''})`;
    })
    .join('\n');
  return rows || '(no properties)';
}
