import { serve } from '@hono/node-server';
import app from './index';
import { loadConfig } from './services/config';

const { port } = loadConfig().server;

console.log(`Starting server on port ${port}...`);

serve({
  fetch: app.fetch,
  port,
});

console.log(`Server running at http://localhost:${port}`);
