import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { buildPieChart, hasChartData, type PieChart } from './chart';
import { StoreError, errorMessage } from './errors';
import { createLogger } from './logger';
import { buildReport } from './report';
import { summarize } from './summary';
import { isTransactionType, type Summary, type Transaction, type TransactionStore, type TransactionType } from './types';

dayjs.extend(customParseFormat);

const log = createLogger('controller');

export const DATE_FORMAT = 'YYYY-MM-DD';
export const DEFAULT_RANGE_DAYS = 30;

export const MESSAGES = {
  added: 'Record added successfully!',
  addFailed: 'Failed to add record.',
  invalid: 'Please enter a category and amount.',
  fetchFailed: 'Failed to load transactions.',
  noChart: 'No transactions in this date range.',
  noTransactions: 'No transactions to display.',
} as const;

export interface AddForm {
  type?: string;
  category?: string;
  amount?: string | number;
}

export interface AddResult {
  status: 'success' | 'error' | 'invalid';
  message: string;
  record?: Transaction;
}

export interface RequiredRange {
  start: string;
  end: string;
}

export interface SummaryView {
  range: RequiredRange;
  summary: Summary;
  chart?: PieChart;
  transactions: Transaction[];
  notices: string[];
  error?: string;
  pdfAvailable: boolean;
}

export interface ValidAdd {
  type: TransactionType;
  category: string;
  amount: number;
}

export function validateAddForm(form: AddForm): ValidAdd | undefined {
  const type = form.type ?? 'Income';
  const category = (form.category ?? '').trim();
  const amount = typeof form.amount === 'number' ? form.amount : Number(String(form.amount ?? '').trim() || NaN);
  if (!isTransactionType(type) || !category || !Number.isFinite(amount) || amount <= 0) return undefined;
  return { type, category, amount };
}

export async function handleAddRecord(store: TransactionStore, form: AddForm, today?: string): Promise<AddResult> {
  const valid = validateAddForm(form);
  if (!valid) return { status: 'invalid', message: MESSAGES.invalid };
  try {
    const rows = await store.addRecord(valid.type, valid.category, valid.amount, today);
    if (!rows.length) return { status: 'error', message: MESSAGES.addFailed };
    log.info(`added ${valid.type} ${valid.category} ${valid.amount}`);
    return { status: 'success', message: MESSAGES.added, record: rows[0] };
  } catch (e) {
    if (e instanceof StoreError) return { status: 'error', message: MESSAGES.addFailed };
    throw e;
  }
}

export function defaultRange(today: string = dayjs().format(DATE_FORMAT)): RequiredRange {
  const end = dayjs(today, DATE_FORMAT, true);
  return { start: end.subtract(DEFAULT_RANGE_DAYS, 'day').format(DATE_FORMAT), end: end.format(DATE_FORMAT) };
}

export function isValidDate(value: unknown): value is string {
  return typeof value === 'string' && dayjs(value, DATE_FORMAT, true).isValid();
}

// Each bound falls back to the default independently.
export function parseRange(query: { start?: unknown; end?: unknown }, today?: string): RequiredRange {
  const fallback = defaultRange(today);
  return {
    start: isValidDate(query.start) ? query.start : fallback.start,
    end: isValidDate(query.end) ? query.end : fallback.end,
  };
}

function emptySummary(): Summary {
  return { totalIncome: 0, totalExpense: 0, totalSavings: 0, balance: 0 };
}

export async function handleShowSummary(store: TransactionStore, range: RequiredRange): Promise<SummaryView> {
  let transactions: Transaction[];
  try {
    transactions = await store.fetchTransactions(range);
  } catch (e) {
    if (!(e instanceof StoreError)) throw e;
    log.warn(`summary unavailable: ${errorMessage(e)}`);
    return { range, summary: emptySummary(), transactions: [], notices: [], error: MESSAGES.fetchFailed, pdfAvailable: false };
  }

  const summary = summarize(transactions);
  const notices: string[] = [];
  let chart: PieChart | undefined;
  if (hasChartData(summary)) chart = buildPieChart(summary.totalIncome, summary.totalExpense, summary.totalSavings);
  else notices.push(MESSAGES.noChart);
  if (!transactions.length) notices.push(MESSAGES.noTransactions);

  return { range, summary, chart, transactions, notices, pdfAvailable: transactions.length > 0 };
}

/** Resolves to undefined when the range holds no transactions. */
export async function handleReportDownload(store: TransactionStore, range: RequiredRange): Promise<Buffer | undefined> {
  const transactions = await store.fetchTransactions(range);
  if (!transactions.length) return undefined;
  const summary = summarize(transactions);
  const chart = hasChartData(summary)
    ? buildPieChart(summary.totalIncome, summary.totalExpense, summary.totalSavings)
    : undefined;
  return buildReport(summary, transactions, chart);
}
