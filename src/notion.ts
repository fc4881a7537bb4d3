import { Client, LogLevel, isFullPage } from '@notionhq/client';
import type {
  CreatePageParameters,
  PageObjectResponse,
  QueryDatabaseParameters,
  QueryDatabaseResponse,
} from '@notionhq/client/build/src/api-endpoints';
import dayjs from 'dayjs';
import type { AppConfig, TransactionProps } from './config';
import { StoreError, errorMessage } from './errors';
import { createLogger, notionLogger, type Logger } from './logger';
import type { DateRange, NewTransaction, Transaction, TransactionStore, TransactionType } from './types';

type ClientOptions = NonNullable<ConstructorParameters<typeof Client>[0]>;

export function createNotionClient(c: AppConfig, overrides: Partial<ClientOptions> = {}): Client {
  return new Client({
    auth: c.notionToken,
    baseUrl: c.notionBaseUrl,
    timeoutMs: c.notionTimeoutMs,
    logLevel: LogLevel.WARN,
    logger: notionLogger(createLogger('notion')),
    ...overrides,
  });
}

type PageProperty = PageObjectResponse['properties'][string];

// Notion caps each rich-text item at 2000 characters; longer text spans several items.
const TEXT_ITEM_LIMIT = 2000;

export function splitText(text: string, limit: number = TEXT_ITEM_LIMIT): string[] {
  const parts: string[] = [];
  let current = '';
  for (const ch of text) {
    if (current.length + ch.length > limit) {
      parts.push(current);
      current = '';
    }
    current += ch;
  }
  if (current || !parts.length) parts.push(current);
  return parts;
}

function getProp(page: PageObjectResponse, name: string): PageProperty | undefined {
  return page.properties[name];
}

function getText(page: PageObjectResponse, name: string): string {
  const prop = getProp(page, name);
  if (prop?.type === 'title') return prop.title.map((t) => t.plain_text).join('').trim();
  if (prop?.type === 'rich_text') return prop.rich_text.map((t) => t.plain_text).join('').trim();
  return '';
}

function getSelectName(page: PageObjectResponse, name: string): string {
  const prop = getProp(page, name);
  return prop?.type === 'select' ? (prop.select?.name || '').trim() : '';
}

function getNumber(page: PageObjectResponse, name: string): number | undefined {
  const prop = getProp(page, name);
  return prop?.type === 'number' && typeof prop.number === 'number' ? prop.number : undefined;
}

function getDate(page: PageObjectResponse, name: string): string | undefined {
  const prop = getProp(page, name);
  if (prop?.type !== 'date') return undefined;
  return prop.date?.start || undefined;
}

export function pageToTransaction(page: PageObjectResponse, p: TransactionProps): Transaction | undefined {
  const date = getDate(page, p.date);
  if (!date) return undefined;
  return {
    id: page.id,
    date: date.slice(0, 10),
    type: getSelectName(page, p.type),
    category: getText(page, p.category),
    amount: getNumber(page, p.amount) ?? 0,
  };
}

export class NotionTransactionStore implements TransactionStore {
  private readonly log: Logger;

  constructor(
    private readonly notion: Client,
    private readonly databaseId: string,
    private readonly props: TransactionProps,
    log?: Logger,
  ) {
    this.log = log ?? createLogger('store');
  }

  async addRecord(
    type: TransactionType,
    category: string,
    amount: number,
    today: string = dayjs().format('YYYY-MM-DD'),
  ): Promise<Transaction[]> {
    const p = this.props;
    const row: NewTransaction = { date: today, type, category, amount: Number(amount) };
    const properties: CreatePageParameters['properties'] = {
      [p.category]: { title: splitText(category).map((content) => ({ type: 'text', text: { content } })) },
      [p.date]: { date: { start: row.date } },
      [p.type]: { select: { name: row.type } },
      [p.amount]: { number: row.amount },
    };
    try {
      const created = await this.notion.pages.create({ parent: { database_id: this.databaseId }, properties });
      if (!isFullPage(created)) return [{ id: created.id, ...row }];
      const inserted = pageToTransaction(created, p);
      return inserted ? [inserted] : [];
    } catch (e) {
      this.log.error(`insert failed: ${errorMessage(e)}`);
      throw new StoreError('insert', e);
    }
  }

  async fetchTransactions(range: DateRange = {}): Promise<Transaction[]> {
    const p = this.props;
    const filter: QueryDatabaseParameters['filter'] =
      range.start && range.end
        ? {
            and: [
              { property: p.date, date: { on_or_after: range.start } },
              { property: p.date, date: { on_or_before: range.end } },
            ],
          }
        : undefined;
    const items: Transaction[] = [];
    let cursor: string | undefined = undefined;
    try {
      do {
        const res: QueryDatabaseResponse = await this.notion.databases.query({
          database_id: this.databaseId,
          start_cursor: cursor,
          page_size: 100,
          filter,
          sorts: [{ property: p.date, direction: 'descending' }],
        });
        for (const page of res.results) {
          if (!isFullPage(page)) continue;
          const t = pageToTransaction(page, p);
          if (t) items.push(t);
        }
        cursor = res.has_more ? res.next_cursor ?? undefined : undefined;
      } while (cursor);
    } catch (e) {
      this.log.error(`fetch failed: ${errorMessage(e)}`);
      throw new StoreError('fetch', e);
    }
    return items;
  }
}

export function createTransactionStore(c: AppConfig, notion: Client = createNotionClient(c)): TransactionStore {
  return new NotionTransactionStore(notion, c.transactionsDbId, c.transactionProps);
}
