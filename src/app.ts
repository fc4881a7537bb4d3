import express, { type NextFunction, type Request, type Response } from 'express';
import dayjs from 'dayjs';
import {
  DATE_FORMAT,
  MESSAGES,
  defaultRange,
  handleAddRecord,
  handleReportDownload,
  handleShowSummary,
  isValidDate,
  parseRange,
  type AddForm,
} from './controller';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { REPORT_FILENAME, REPORT_MIME } from './report';
import { summarize } from './summary';
import type { DateRange, TransactionStore } from './types';
import { renderPage } from './views';

const log = createLogger('server');

export interface AppOptions {
  today?: () => string; // YYYY-MM-DD
}

// body-parser rejects malformed bodies with a 4xx `status` on the error.
function clientErrorStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function formBody(body: unknown): AddForm {
  if (!body || typeof body !== 'object') return {};
  const fields = new Map<string, unknown>(Object.entries(body));
  const str = (key: string) => {
    const v = fields.get(key);
    return typeof v === 'string' ? v : undefined;
  };
  const amount = fields.get('amount');
  return {
    type: str('type'),
    category: str('category'),
    amount: typeof amount === 'number' ? amount : str('amount'),
  };
}

// The JSON API filters only when both bounds are valid dates; otherwise it lists everything.
function optionalRange(query: Request['query']): DateRange {
  const { start, end } = query;
  return isValidDate(start) && isValidDate(end) ? { start, end } : {};
}

export function createApp(store: TransactionStore, opts: AppOptions = {}) {
  const today = opts.today ?? (() => dayjs().format(DATE_FORMAT));
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.get('/api/transactions', async (req, res) => {
    try {
      const items = await store.fetchTransactions(optionalRange(req.query));
      res.json({ items });
    } catch (e) {
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.post('/api/transactions', async (req, res) => {
    try {
      const result = await handleAddRecord(store, formBody(req.body), today());
      if (result.status === 'invalid') { res.status(400).json({ error: result.message }); return; }
      if (result.status === 'error') { res.status(500).json({ error: result.message }); return; }
      res.status(201).json({ ok: true, record: result.record });
    } catch (e) {
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.get('/api/summary', async (req, res) => {
    try {
      const range = optionalRange(req.query);
      const items = await store.fetchTransactions(range);
      res.json({ ...range, count: items.length, summary: summarize(items) });
    } catch (e) {
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.get('/', (_req, res) => {
    res.type('html').send(renderPage({ range: defaultRange(today()) }));
  });

  app.post('/records', async (req, res, next) => {
    try {
      const form = formBody(req.body);
      const addResult = await handleAddRecord(store, form, today());
      res.type('html').send(renderPage({ range: defaultRange(today()), form, addResult }));
    } catch (e) {
      next(e);
    }
  });

  app.get('/summary', async (req, res, next) => {
    try {
      const range = parseRange(req.query, today());
      const view = await handleShowSummary(store, range);
      res.type('html').send(renderPage({ range, view }));
    } catch (e) {
      next(e);
    }
  });

  app.get('/report.pdf', async (req, res) => {
    try {
      const pdf = await handleReportDownload(store, parseRange(req.query, today()));
      if (!pdf) { res.status(404).type('text').send(MESSAGES.noTransactions); return; }
      res.attachment(REPORT_FILENAME);
      res.type(REPORT_MIME).send(pdf);
    } catch (e) {
      log.error(`report failed: ${errorMessage(e)}`);
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status) {
      log.warn(`bad request ${req.method} ${req.path}: ${errorMessage(err)}`);
      if (req.path.startsWith('/api/')) res.status(status).json({ error: errorMessage(err) });
      else res.status(status).type('text').send('Bad request.');
      return;
    }
    log.error(`unhandled: ${errorMessage(err)}`);
    res.status(500).type('text').send('Something went wrong.');
  });

  return app;
}
