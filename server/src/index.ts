import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { setLogLevel } from './lib/logger';

const config = loadConfig();
setLogLevel(config.logLevel);

const app = createApp({ config });

app.listen(config.port, () => {
  console.log(`[server] running on http://localhost:${config.port}`);
});
