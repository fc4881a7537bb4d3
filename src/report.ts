import PDFDocument from 'pdfkit';
import { CHART_TITLE, type PieChart } from './chart';
import { formatAmount } from './summary';
import type { Summary, Transaction } from './types';

export const REPORT_TITLE = 'Personal Finance Summary';
export const REPORT_FILENAME = 'finance_summary.pdf';
export const REPORT_MIME = 'application/pdf';
export const NO_TRANSACTIONS_LINE = 'No transactions available.';
export const TABLE_HEADER = ['Date', 'Type', 'Category', 'Amount'];

const CHART_BOX = { width: 400, height: 300 };
const COLUMN_WIDTHS = [90, 80, 210, 90];
const ROW_HEIGHT = 18;

// Code points above Latin-1 that the standard fonts' WinAnsi encoding still covers.
const WIN_ANSI_EXTRA = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

/**
 * The built-in Helvetica only encodes WinAnsi; anything else would be written
 * as unreadable bytes, so it is replaced with "?".
 */
export function toWinAnsi(text: string): string {
  let out = '';
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    const ok = (cp >= 0x20 && cp <= 0x7e) || (cp >= 0xa0 && cp <= 0xff) || WIN_ANSI_EXTRA.has(ch);
    out += ok ? ch : '?';
  }
  return out;
}

export interface ReportContent {
  title: string;
  summaryLines: string[];
  table?: string[][]; // header row first
  placeholder?: string;
}

export function reportContent(summary: Summary, transactions: Transaction[]): ReportContent {
  const summaryLines = [
    `Total Income: ${formatAmount(summary.totalIncome)}`,
    `Total Expense: ${formatAmount(summary.totalExpense)}`,
    `Total Savings: ${formatAmount(summary.totalSavings)}`,
    `Balance: ${formatAmount(summary.balance)}`,
  ];
  if (!transactions.length) {
    return { title: REPORT_TITLE, summaryLines, placeholder: NO_TRANSACTIONS_LINE };
  }
  const rows = transactions.map((t) => [t.date, t.type, t.category, formatAmount(t.amount)]);
  return { title: REPORT_TITLE, summaryLines, table: [TABLE_HEADER, ...rows] };
}

function drawChart(doc: PDFKit.PDFDocument, chart: PieChart) {
  const x0 = doc.page.margins.left;
  const y0 = doc.y;
  const sx = CHART_BOX.width / chart.size.width;
  const sy = CHART_BOX.height / chart.size.height;

  doc.save();
  doc.translate(x0, y0).scale(sx, sy);
  doc.font('Helvetica-Bold').fontSize(12).fillColor('#000');
  doc.text(CHART_TITLE, 0, 8, { width: chart.size.width, align: 'center', lineBreak: false });
  for (const s of chart.slices) {
    if (!s.path) continue;
    doc.path(s.path).fill(s.color);
  }
  doc.font('Helvetica').fontSize(9).fillColor('#fff');
  for (const s of chart.slices) {
    if (!s.labelAt) continue;
    doc.text(s.percentLabel, s.labelAt.x - 25, s.labelAt.y - 4, { width: 50, align: 'center', lineBreak: false });
  }
  const legendX = chart.size.width - 110;
  chart.slices.forEach((s, i) => {
    const y = 50 + i * 22;
    doc.rect(legendX, y, 12, 12).fill(s.color);
    doc.fillColor('#000').fontSize(10).text(`${s.label} (${s.percentLabel})`, legendX + 18, y + 2, { lineBreak: false });
  });
  doc.restore();

  doc.x = x0;
  doc.y = y0 + CHART_BOX.height + 12;
}

function drawRow(doc: PDFKit.PDFDocument, cells: string[], bold: boolean) {
  const x0 = doc.page.margins.left;
  const y = doc.y;
  doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(10).fillColor('#000');
  let x = x0;
  cells.forEach((cell, i) => {
    const width = COLUMN_WIDTHS[i] ?? 80;
    doc.text(toWinAnsi(cell), x + 2, y + 4, { width: width - 4, height: ROW_HEIGHT - 4, ellipsis: true, lineBreak: false });
    x += width;
  });
  const right = x0 + COLUMN_WIDTHS.reduce((a, b) => a + b, 0);
  doc.moveTo(x0, y + ROW_HEIGHT).lineTo(right, y + ROW_HEIGHT).lineWidth(0.5).strokeColor('#999').stroke();
  doc.x = x0;
  doc.y = y + ROW_HEIGHT;
}

function drawTable(doc: PDFKit.PDFDocument, table: string[][]) {
  const [header, ...rows] = table;
  drawRow(doc, header, true);
  for (const row of rows) {
    if (doc.y + ROW_HEIGHT > doc.page.height - doc.page.margins.bottom) {
      doc.addPage();
      drawRow(doc, header, true);
    }
    drawRow(doc, row, false);
  }
}

/**
 * Renders the summary, the optional chart and the transaction table into an
 * in-memory PDF. Transactions are listed in the order given.
 */
export function buildReport(summary: Summary, transactions: Transaction[], chart?: PieChart): Promise<Buffer> {
  const content = reportContent(summary, transactions);
  const doc = new PDFDocument({ size: 'A4', margin: 50, info: { Title: content.title } });
  const chunks: Buffer[] = [];

  const done = new Promise<Buffer>((resolve, reject) => {
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });

  doc.font('Helvetica-Bold').fontSize(20).text(content.title, { align: 'center' });
  doc.moveDown();
  doc.font('Helvetica').fontSize(12);
  for (const line of content.summaryLines) doc.text(line);
  doc.moveDown();

  if (chart) drawChart(doc, chart);

  if (content.table) drawTable(doc, content.table);
  else doc.font('Helvetica').fontSize(12).text(content.placeholder ?? NO_TRANSACTIONS_LINE);

  doc.end();
  return done;
}
