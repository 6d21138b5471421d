import { CredentialStore } from './auth/credentials.js';
import { AuthService } from './auth/service.js';
import { type AppConfig } from './config.js';
import { type DatabaseHandle, openDatabase } from './db/client.js';
import { ExportService } from './expenses/export.js';
import { ExpenseService } from './expenses/service.js';
import { ExpenseStore } from './expenses/store.js';
import { createLogger, type Logger } from './logger.js';

/** Everything a request handler needs, built once at startup. */
export interface AppContext {
  config: AppConfig
  log: Logger
  database: DatabaseHandle
  auth: AuthService
  expenses: ExpenseService
  exports: ExportService
}

export const createContext = (config: AppConfig, log: Logger = createLogger({ level: config.logLevel })): AppContext => {
  const database = openDatabase(config.databasePath, log.child({ component: 'db' }));
  const store = new ExpenseStore(database.db);
  return {
    config,
    log,
    database,
    auth: new AuthService(new CredentialStore(database.db), log.child({ component: 'auth' })),
    expenses: new ExpenseService(store, log.child({ component: 'expenses' })),
    exports: new ExportService(store, log.child({ component: 'export' }))
  };
};

export const closeContext = (context: AppContext): void => {
  context.database.close();
};
