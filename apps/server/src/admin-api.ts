import { Hono } from 'hono';
import type { DNSServer } from './dns-server.js';
import { ValidationError } from './errors.js';
import { handleError } from './error-handler.js';
import { requireApiKey } from './middleware.js';
import { Zone } from './zone.js';

export interface AdminApiOptions {
  apiKey?: string | null;
}

async function readJson(request: Request): Promise<unknown> {
  try {
    const body: unknown = await request.json();
    return body;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

/**
 * HTTP routes for managing a running server:
 *
 * - `GET /api/health`: running state and bound ports
 * - `GET /api/records`: current records
 * - `POST /api/records`: add one zone
 * - `PUT /api/records`: replace every record; one invalid zone rejects the batch
 */
export function createAdminApp(server: DNSServer, options: AdminApiOptions = {}): Hono {
  const app = new Hono();

  app.onError(handleError);
  app.use('/api/*', requireApiKey(options.apiKey ?? null));

  app.get('/api/health', (c) => {
    return c.json({
      running: server.isRunning,
      ports: server.getPorts(),
    });
  });

  app.get('/api/records', async (c) => {
    const records = await server.getRecords();
    return c.json({ records: records.map((record) => record.toJSON()) });
  });

  app.post('/api/records', async (c) => {
    const zone = Zone.fromRaw(0, await readJson(c.req.raw));
    const record = await server.addRecord(zone);
    return c.json({ record: record.toJSON() }, 201);
  });

  app.put('/api/records', async (c) => {
    const zones = Zone.fromRawList(await readJson(c.req.raw));
    await server.setRecords(zones);
    return c.json({ count: zones.length });
  });

  return app;
}
