import { writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { assertConfig, config } from '../config';
import { handleReportDownload, parseRange } from '../controller';
import { createTransactionStore } from '../notion';
import { REPORT_FILENAME } from '../report';

// Usage: export-report [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--out file.pdf]
async function main() {
  const { values } = parseArgs({
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
      out: { type: 'string', default: REPORT_FILENAME },
    },
  });
  assertConfig();
  const range = parseRange(values);
  const pdf = await handleReportDownload(createTransactionStore(config), range);
  if (!pdf) {
    console.log(`[report] no transactions between ${range.start} and ${range.end}`);
    return;
  }
  const out = values.out ?? REPORT_FILENAME;
  await writeFile(out, pdf);
  console.log(`[report] ${range.start}..${range.end} -> ${out} (${pdf.length} bytes)`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
