import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';

const config = loadConfig();
const log = createLogger(config);
const app = createApp({ config, log });

app.listen(config.port, () =>
  log.info(
    { port: config.port, secretCheck: config.webhookSecret ? 'enabled' : 'disabled', echo: config.echoUrl ? 'enabled' : 'disabled' },
    'tavus webhook receiver running'
  )
);
