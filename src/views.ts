import { renderChartSvg } from './chart';
import type { AddForm, AddResult, RequiredRange, SummaryView } from './controller';
import { formatAmount } from './summary';
import { TRANSACTION_TYPES } from './types';

export const PAGE_TITLE = 'Personal Finance Tracker';

const STYLE = [
  'body{font-family:system-ui,sans-serif;max-width:860px;margin:2rem auto;padding:0 1rem}',
  'section{margin-bottom:2rem}',
  'label{display:block;margin:.4rem 0}',
  'fieldset label{display:inline}',
  'table{border-collapse:collapse;width:100%}',
  'th,td{border-bottom:1px solid #ddd;padding:.3rem .5rem;text-align:left}',
  'td.num{text-align:right}',
  '.msg.success{color:#2e7d32}',
  '.msg.error{color:#c62828}',
  '.msg.info{color:#1565c0}',
].join('');

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export interface PageState {
  range: RequiredRange;
  form?: AddForm;
  addResult?: AddResult;
  view?: SummaryView;
}

function rangeQuery(range: RequiredRange) {
  return `start=${encodeURIComponent(range.start)}&end=${encodeURIComponent(range.end)}`;
}

function renderAddForm(form: AddForm = {}, result?: AddResult): string {
  const selected = form.type ?? 'Income';
  // keep what the user typed when validation or the insert failed
  const keep = result && result.status !== 'success';
  const category = keep ? escapeHtml(form.category ?? '') : '';
  const amount = keep ? escapeHtml(String(form.amount ?? '')) : '';
  const radios = TRANSACTION_TYPES.map(
    (t) =>
      `<label><input type="radio" name="type" value="${t}"${t === selected ? ' checked' : ''}> ${t}</label>`,
  ).join(' ');
  const message = result
    ? `<p class="msg ${result.status === 'success' ? 'success' : 'error'}">${escapeHtml(result.message)}</p>`
    : '';
  return `<section>
<h2>Add a Record</h2>
${message}
<form method="post" action="/records">
<fieldset><legend>Select type:</legend>${radios}</fieldset>
<label>Category/Source: <input type="text" name="category" value="${category}"></label>
<label>Amount: <input type="number" name="amount" min="0" step="100" value="${amount}"></label>
<button type="submit">Add Record</button>
</form>
</section>`;
}

function renderRangeForm(range: RequiredRange): string {
  return `<form method="get" action="/summary">
<label>Start Date <input type="date" name="start" value="${escapeHtml(range.start)}"></label>
<label>End Date <input type="date" name="end" value="${escapeHtml(range.end)}"></label>
<button type="submit">Show Summary &amp; Transactions</button>
</form>`;
}

function renderTable(view: SummaryView): string {
  const rows = view.transactions
    .map(
      (t) =>
        `<tr><td>${escapeHtml(t.date)}</td><td>${escapeHtml(t.type)}</td><td>${escapeHtml(t.category)}</td><td class="num">${formatAmount(t.amount)}</td></tr>`,
    )
    .join('\n');
  return `<h3>Transactions</h3>
<table>
<thead><tr><th>Date</th><th>Type</th><th>Category</th><th>Amount</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`;
}

export function renderSummary(view: SummaryView): string {
  if (view.error) return `<p class="msg error">${escapeHtml(view.error)}</p>`;
  const s = view.summary;
  const parts = [
    '<h3>Summary</h3>',
    '<ul class="summary">',
    `<li><strong>Total Income:</strong> ${formatAmount(s.totalIncome)}</li>`,
    `<li><strong>Total Expense:</strong> ${formatAmount(s.totalExpense)}</li>`,
    `<li><strong>Total Savings:</strong> ${formatAmount(s.totalSavings)}</li>`,
    `<li><strong>Balance (Income - Expense - Savings):</strong> ${formatAmount(s.balance)}</li>`,
    '</ul>',
  ];
  if (view.chart) parts.push(`<figure class="chart">${renderChartSvg(view.chart)}</figure>`);
  if (view.transactions.length) parts.push(renderTable(view));
  for (const n of view.notices) parts.push(`<p class="msg info">${escapeHtml(n)}</p>`);
  if (view.pdfAvailable) {
    parts.push(`<p><a class="button" href="/report.pdf?${rangeQuery(view.range)}" download>Download PDF</a></p>`);
  }
  return parts.join('\n');
}

export function renderPage(state: PageState): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${PAGE_TITLE}</title>
<style>${STYLE}</style>
</head>
<body>
<h1>${PAGE_TITLE}</h1>
${renderAddForm(state.form, state.addResult)}
<section>
<h2>Summary &amp; Transactions</h2>
${renderRangeForm(state.range)}
${state.view ? renderSummary(state.view) : ''}
</section>
</body>
</html>
`;
}
