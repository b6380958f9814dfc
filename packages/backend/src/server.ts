import { createLogger, setLogLevel } from '@brillopad/parser';
import { createApp } from './app.js';
import { getConfig } from './config.js';

const log = createLogger('server');

// Start
const config = getConfig();
setLogLevel(config.logLevel);

const app = createApp(config);
app.listen(config.port, () => {
  // Startup lines are printed regardless of the log level.
  console.log(`[brillopad] Backend running on http://localhost:${config.port}`);
  console.log(`[brillopad] Upload dir: ${config.uploadDir}`);
  log.debug(`Results kept for ${config.resultTtlMs} ms`);
});

export default app;
