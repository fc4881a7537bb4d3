import { describe, it, expect } from 'vitest';
import { inflateSync } from 'zlib';
import { buildPieChart } from './chart';
import { buildReport, reportContent, toWinAnsi } from './report';
import { summarize } from './summary';
import type { Transaction } from './types';

const rows: Transaction[] = [
  { date: '2024-01-10', type: 'Savings', category: 'Bond', amount: 300 },
  { date: '2024-01-05', type: 'Expense', category: 'Rent', amount: 1200 },
  { date: '2024-01-01', type: 'Income', category: 'Salary', amount: 5000 },
];

function pageCount(pdf: Buffer): number {
  return pdf.toString('latin1').match(/\/Type \/Page[^s]/g)?.length ?? 0;
}

function inflated(data: string): string | undefined {
  try {
    return inflateSync(Buffer.from(data, 'latin1')).toString('latin1');
  } catch {
    return undefined; // not a deflated stream
  }
}

// Text runs drawn in the page content streams, one entry per TJ operator.
function textRuns(pdf: Buffer): string[] {
  const streams = [...pdf.toString('latin1').matchAll(/stream\n([\s\S]*?)\nendstream/g)]
    .map((m) => inflated(m[1]))
    .filter((s): s is string => s !== undefined);
  return streams.flatMap((content) =>
    [...content.matchAll(/\[([^\]]*)\] TJ/g)].map((m) =>
      [...m[1].matchAll(/<([0-9a-fA-F]*)>/g)].map((h) => Buffer.from(h[1], 'hex').toString('latin1')).join(''),
    ),
  );
}

describe('toWinAnsi', () => {
  it('keeps Latin-1 and the WinAnsi extras and replaces everything else', () => {
    expect(toWinAnsi('食費 🍣 Café €5')).toBe('?? ? Café €5');
  });
});

describe('reportContent', () => {
  it('lists the summary then one table row per transaction in the given order', () => {
    const content = reportContent(summarize(rows), rows);
    expect(content.title).toBe('Personal Finance Summary');
    expect(content.summaryLines).toEqual([
      'Total Income: 5000',
      'Total Expense: 1200',
      'Total Savings: 300',
      'Balance: 3500',
    ]);
    expect(content.table).toEqual([
      ['Date', 'Type', 'Category', 'Amount'],
      ['2024-01-10', 'Savings', 'Bond', '300'],
      ['2024-01-05', 'Expense', 'Rent', '1200'],
      ['2024-01-01', 'Income', 'Salary', '5000'],
    ]);
    expect(content.placeholder).toBeUndefined();
  });

  it('uses a placeholder line instead of a table when there are no transactions', () => {
    const content = reportContent(summarize([]), []);
    expect(content.placeholder).toBe('No transactions available.');
    expect(content.table).toBeUndefined();
    expect(content.summaryLines).toEqual(['Total Income: 0', 'Total Expense: 0', 'Total Savings: 0', 'Balance: 0']);
  });
});

describe('buildReport', () => {
  it('produces a single-page PDF for an empty listing', async () => {
    const pdf = await buildReport(summarize([]), []);
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pageCount(pdf)).toBe(1);
    const runs = textRuns(pdf);
    expect(runs).toContain('Personal Finance Summary');
    expect(runs).toContain('Balance: 0');
    expect(runs).toContain('No transactions available.');
    expect(runs).not.toContain('Date');
  });

  it('draws the table header and rows, with unsupported characters as "?"', async () => {
    const listed: Transaction[] = [...rows, { date: '2024-01-11', type: 'Expense', category: '食費 🍣', amount: 12 }];
    const runs = textRuns(await buildReport(summarize(listed), listed));
    expect(runs).toEqual(expect.arrayContaining(['Date', 'Type', 'Category', 'Amount', 'Bond', '?? ?']));
    expect(runs).not.toContain('No transactions available.');
  });

  it('embeds the chart and paginates long tables', async () => {
    const many: Transaction[] = Array.from({ length: 120 }, (_, i) => ({
      date: `2024-03-${String((i % 28) + 1).padStart(2, '0')}`,
      type: i % 2 ? 'Expense' : 'Income',
      category: `Item ${i}`,
      amount: 10 + i,
    }));
    const summary = summarize(many);
    const pdf = await buildReport(summary, many, buildPieChart(summary.totalIncome, summary.totalExpense, summary.totalSavings));
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pageCount(pdf)).toBeGreaterThan(1);
  });
});
