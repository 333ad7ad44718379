import http from 'http';
import app from './app';
import { settings } from './config/settings';
import { dbConnect } from './config/database';
import { currencyService } from './services/CurrencyService';
import { logger, errorMessage } from './utils/logger';

const start = async () => {
  const connected = await dbConnect();
  if (connected) {
    await currencyService.ensureDefault();
  }

  const server = http.createServer(app);
  server.listen(settings.port, () => {
    logger.info(`Server is running on port ${settings.port}`, { env: settings.env });
  });
};

start().catch((error: unknown) => {
  logger.error('Server failed to start', { error: errorMessage(error) });
  process.exit(1);
});
