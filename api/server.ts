/**
 * EffMap v1.0 - Motor efficiency map API
 *
 * Architecture:
 *   POST /api/v1/maps         ← MapService ← MapSession (engine)
 *   POST /api/v1/area-ratios  ← MapService ← MapSession (engine)
 *
 * Stateless: every request carries its own table and config, and gets its own session.
 */
import 'dotenv/config';
import { createApp } from './src/app.js';
import { API_CONFIG, logger } from './src/utils/index.js';

const app = createApp();

const httpServer = app.listen(API_CONFIG.port, () =>
  logger.info(`✅ EffMap v1.0 listening on :${API_CONFIG.port}`, { module: 'Server' }),
);

function shutdown(signal: string) {
  logger.info(`${signal} received — shutting down…`, { module: 'Server' });
  httpServer.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
