import { cfg } from './config.js';
import { createApp } from './app.js';
import { createBuyBoxAnalyzer } from './lib/analyzer.js';
import { createLogger } from './lib/logger.js';
import { errorMessage } from './lib/errors.js';

const logger = createLogger('server', { level: cfg.log.level });
const analyzer = createBuyBoxAnalyzer(cfg, { logger: logger.child('buybox') });

try {
  analyzer.credentials.assertCredentials();
} catch (e) {
  // Still serve /health; analyze requests answer 503 until credentials are set
  logger.warn(errorMessage(e));
}

const app = createApp(analyzer);

// start
app.listen(cfg.port, () => {
  logger.info(`Server running on :${cfg.port}`, { marketplace: cfg.spApi.marketplace.countryCode });
});
