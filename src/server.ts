import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { closeContext, createContext } from './context.js';

const config = loadConfig();
const context = createContext(config);
const { log } = context;

if (config.usingDevSecret) {
  log.warn('SESSION_SECRET not set, using a development-only secret');
}

const app = createApp(context);

const server = app.listen(config.port, (error?: Error) => {
  if (error != null) {
    log.error('Failed to start server', { error: String(error) });
    closeContext(context);
    process.exit(1);
  }
  log.info('Expense tracker listening', { port: config.port, env: config.nodeEnv });
});

const gracefulShutdown = async (): Promise<void> => {
  log.info('Shutting down server');
  await new Promise<void>(resolve => {
    server.close(error => {
      if (error != null) {
        log.error('Error closing HTTP server', { error: String(error) });
      }
      resolve();
    });
  });
  try {
    closeContext(context);
  } catch (error) {
    log.error('Error closing database', { error: String(error) });
  }
  log.info('Server shutdown complete');
  process.exit(0);
};

process.on('SIGINT', () => { void gracefulShutdown(); });
process.on('SIGTERM', () => { void gracefulShutdown(); });
