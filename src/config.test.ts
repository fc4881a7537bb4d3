import { describe, it, expect } from 'vitest';
import { assertConfig, loadConfig, parseDatabaseId } from './config';

describe('parseDatabaseId', () => {
  it('extracts the id from a copied database URL', () => {
    expect(
      parseDatabaseId('https://www.notion.so/acme/Transactions-0123456789abcdef0123456789abcdef?v=fedcba98765432100123456789abcdef'),
    ).toBe('0123456789abcdef0123456789abcdef');
  });

  it('accepts bare and dashed ids', () => {
    expect(parseDatabaseId('0123456789ABCDEF0123456789ABCDEF')).toBe('0123456789abcdef0123456789abcdef');
    expect(parseDatabaseId(' 01234567-89ab-cdef-0123-456789abcdef ')).toBe('0123456789abcdef0123456789abcdef');
    expect(parseDatabaseId('')).toBe('');
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const c = loadConfig({});
    expect(c.port).toBe(3000);
    expect(c.notionBaseUrl).toBeUndefined();
    expect(c.notionTimeoutMs).toBeUndefined();
    expect(c.transactionProps).toEqual({ date: 'Date', type: 'Type', category: 'Category', amount: 'Amount' });
  });

  it('reads overrides', () => {
    const c = loadConfig({
      NOTION_TOKEN: 'test-secret',
      NOTION_TRANSACTIONS_DB: '0123456789abcdef0123456789abcdef',
      NOTION_TIMEOUT_MS: '5000',
      PORT: 'abc',
      TX_PROP_CATEGORY: 'Source',
    });
    expect(c.notionToken).toBe('test-secret');
    expect(c.notionTimeoutMs).toBe(5000);
    expect(c.port).toBe(3000);
    expect(c.transactionProps.category).toBe('Source');
  });
});

describe('assertConfig', () => {
  it('names every missing secret', () => {
    expect(() => assertConfig(loadConfig({}))).toThrow('Missing required env vars: NOTION_TOKEN, NOTION_TRANSACTIONS_DB');
    expect(() => assertConfig(loadConfig({ NOTION_TOKEN: 'test-secret', NOTION_TRANSACTIONS_DB: 'abc' }))).not.toThrow();
  });
});
