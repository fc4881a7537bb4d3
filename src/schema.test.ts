import { describe, it, expect } from 'vitest';
import { checkTransactionsSchema, describeProperties, type PropertyMap } from './schema';
import { DEFAULT_PROPS } from './test/fakeNotion';

const options = (...names: string[]) => ({ options: names.map((name) => ({ name })) });

describe('checkTransactionsSchema', () => {
  it('accepts the expected layout', () => {
    const props: PropertyMap = {
      Category: { type: 'title' },
      Date: { type: 'date' },
      Type: { type: 'select', select: options('Income', 'Expense', 'Savings') },
      Amount: { type: 'number' },
    };
    expect(checkTransactionsSchema(props, DEFAULT_PROPS)).toEqual([]);
  });

  it('reports missing and mistyped properties and absent options', () => {
    const props: PropertyMap = {
      Name: { type: 'title' },
      Date: { type: 'rich_text' },
      Type: { type: 'select', select: options('Income') },
      Amount: { type: 'number' },
    };
    expect(checkTransactionsSchema(props, DEFAULT_PROPS)).toEqual([
      'missing property "Category" (title or rich_text)',
      'property "Date" is rich_text, expected date',
      'select "Type" has no option for Expense, Savings (created on first insert)',
    ]);
  });
});

describe('describeProperties', () => {
  it('lists each property with its type and options', () => {
    expect(describeProperties({ Type: { type: 'select', select: options('Income', 'Expense') }, Amount: { type: 'number' } })).toBe(
      '- Type (select: Income, Expense)\n- Amount (number)',
    );
    expect(describeProperties({})).toBe('(no properties)');
  });
});
