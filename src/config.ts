import dotenv from 'dotenv';
dotenv.config();

export type Env = Record<string, string | undefined>;

export interface TransactionProps {
  date: string;
  type: string;
  category: string;
  amount: string;
}

export interface AppConfig {
  notionToken: string;
  transactionsDbId: string;
  notionBaseUrl?: string;
  notionTimeoutMs?: number;
  port: number;
  transactionProps: TransactionProps;
}

const DB_ID_RE = /([0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12})/gi;

// Accepts a bare id, a dashed uuid, or a database URL copied from Notion
// (https://www.notion.so/<workspace>/<Title>-<id>?v=<view>).
export function parseDatabaseId(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return '';
  const path = trimmed.split('?')[0];
  const matches = path.match(DB_ID_RE);
  if (!matches) return trimmed;
  return matches[matches.length - 1].replace(/-/g, '').toLowerCase();
}

function positiveInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    notionToken: env.NOTION_TOKEN || '',
    transactionsDbId: parseDatabaseId(env.NOTION_TRANSACTIONS_DB || ''),
    notionBaseUrl: env.NOTION_BASE_URL || undefined,
    notionTimeoutMs: positiveInt(env.NOTION_TIMEOUT_MS),
    port: positiveInt(env.PORT) ?? 3000,
    transactionProps: {
      date: env.TX_PROP_DATE || 'Date',
      type: env.TX_PROP_TYPE || 'Type',
      category: env.TX_PROP_CATEGORY || 'Category',
      amount: env.TX_PROP_AMOUNT || 'Amount',
    },
  };
}

export const config = loadConfig();

export function assertConfig(c: AppConfig = config) {
  const missing: string[] = [];
  if (!c.notionToken) missing.push('NOTION_TOKEN');
  if (!c.transactionsDbId) missing.push('NOTION_TRANSACTIONS_DB');
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(', ')}`);
  }
}
