import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import type { ApiErrorBody } from '@record-table/shared';
import { getConfig, isLogLevelEnabled } from './services/config';

// Route imports
import { tableRoutes } from './routes/tables';

const VERSION = '0.1.0';

const app = new Hono();
const requestLogger = logger();

// Middleware
app.use('*', async (c, next) => {
  if (!isLogLevelEnabled('info')) {
    return next();
  }
  return requestLogger(c, next);
});
app.use('*', secureHeaders());
app.use(
  '*',
  cors({
    origin: (origin) => (getConfig().server.allowedOrigins.includes(origin) ? origin : null),
    credentials: true,
  })
);

app.get('/', (c) => {
  return c.json({
    name: 'Record Table API',
    version: VERSION,
    docs: '/api/health',
  });
});

// Health check
app.get('/api/health', (c) => {
  return c.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: VERSION,
  });
});

// API Routes
app.route('/api/tables', tableRoutes);

app.notFound((c) => {
  const body: ApiErrorBody = { error: { code: 'NOT_FOUND', message: 'Route not found' } };
  return c.json(body, 404);
});

app.onError((err, c) => {
  console.error('Unhandled error:', err);
  const body: ApiErrorBody = {
    error: {
      code: 'INTERNAL_ERROR',
      message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    },
  };
  return c.json(body, 500);
});

export default app;
