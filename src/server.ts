import { assertConfig, config } from './config';
import { createApp } from './app';
import { createLogger } from './logger';
import { createTransactionStore } from './notion';

const log = createLogger('server');

assertConfig();
const app = createApp(createTransactionStore(config));

app.listen(config.port, () => {
  log.info(`listening on http://localhost:${config.port}`);
  log.info(`transactions database: ${config.transactionsDbId}`);
});
