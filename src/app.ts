import { Hono } from 'hono';
import type { IGrantStorage } from './storage/interfaces/grant-storage.js';
import { adminAuth, type AdminAuthOptions } from './middleware/admin-auth.js';
import { grantErrorHandler, requestLogger } from './middleware/error-handler.js';
import { createGrantRoutes } from './routes/grants.js';
import { createLogger, type Logger } from './logging/logger.js';

export interface GrantServerOptions {
  store: IGrantStorage;
  auth?: AdminAuthOptions;
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Create the grant store admin API
 */
export function createGrantServer(options: GrantServerOptions): Hono {
  const { store, auth, enableLogging = true, logger = createLogger() } = options;

  const app = new Hono();

  app.onError(grantErrorHandler(logger));

  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.use('/grants/*', adminAuth(auth));
  app.route('/grants', createGrantRoutes({ store }));

  app.notFound((c) => c.json({ error: 'not_found', message: 'Route not found' }, 404));

  return app;
}
