import express, { type Express } from 'express';
import request from 'supertest';
import { GatewayRouter } from '../../../src/gateway/gateway-router.js';
import { LocalInstanceNamespace, type DurableInstance } from '../../../src/gateway/local-namespace.js';
import { RemoteInstanceNamespace } from '../../../src/gateway/remote-namespace.js';
import type { InstanceHandle, InstanceNamespace } from '../../../src/gateway/types.js';
import { setupGatewayRoutes } from '../../../src/server/routes/gateway-routes.js';

const BOT = 'DiscordBot test-token';

function buildApp(namespace: InstanceNamespace, timeoutMs = 1000): Express {
  const router = express.Router();
  setupGatewayRoutes(router, new GatewayRouter({ namespace, timeoutMs }));
  const app = express();
  app.use('/api', router);
  return app;
}

const echo: DurableInstance = {
  fetch: async (incoming) => new Response(`${incoming.method} ${await incoming.text()}`, {
    status: 202,
    headers: {
      'x-instance-path': new URL(incoming.url).pathname + new URL(incoming.url).search,
      'x-saw-host': incoming.headers.get('host') ?? 'none',
      'x-saw-caller': incoming.headers.get('user-agent') ?? 'none',
    },
  }),
  accept: () => undefined,
};

/**
 * Namespace whose forward step is supplied by the test
 */
function forwardingNamespace(forward: InstanceNamespace['forward']): InstanceNamespace {
  return {
    kind: 'test',
    resolve: (identifier: string): InstanceHandle => ({ id: `id-${identifier}`, name: identifier }),
    forward,
    connect: () => Promise.reject(new Error('not used')),
  };
}

describe('GatewayRouter over HTTP', () => {
  it('rejects callers the guard does not recognize', async () => {
    const response = await request(buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM' })))
      .get('/api/guild/gateway/abc')
      .set('User-Agent', 'Mozilla/5.0');

    expect(response.status).toBe(401);
  });

  it('returns the room status of the resolved instance', async () => {
    const app = buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM' }));

    const first = await request(app).get('/api/guild/gateway/abc').set('User-Agent', BOT);
    const again = await request(app).get('/api/guild/gateway/abc').set('User-Agent', BOT);
    const other = await request(app).get('/api/guild/gateway/xyz').set('User-Agent', BOT);

    expect(first.status).toBe(200);
    expect(first.body.name).toBe('abc');
    expect(again.body.id).toBe(first.body.id);
    expect(other.body.id).not.toBe(first.body.id);
  });

  it('streams the method, body and query through and relays the response', async () => {
    const app = buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM', factory: () => echo }));

    const response = await request(app)
      .post('/api/guild/gateway/abc?since=5')
      .set('User-Agent', BOT)
      .set('Content-Type', 'text/plain')
      .send('payload');

    expect(response.status).toBe(202);
    expect(response.text).toBe('POST payload');
    expect(response.headers['x-instance-path']).toBe('/api/guild/gateway/abc?since=5');
    expect(response.headers['x-saw-host']).toBe('none');
    expect(response.headers['x-saw-caller']).toBe(BOT);
  });

  it('answers 400 for an invalid shard identifier', async () => {
    const response = await request(buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM' })))
      .get('/api/guild/gateway/has%20space')
      .set('User-Agent', BOT);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'invalid_shard_identifier', error_description: 'Invalid shard identifier' });
  });

  it('answers 400 for a malformed percent-escape in the identifier', async () => {
    const response = await request(buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM' })))
      .get('/api/guild/gateway/%E0%A4%A')
      .set('User-Agent', BOT);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'invalid_shard_identifier', error_description: 'Invalid shard identifier' });
  });

  it('runs the caller check before decoding the identifier', async () => {
    const response = await request(buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM' })))
      .get('/api/guild/gateway/%E0%A4%A')
      .unset('User-Agent');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'invalid_request', error_description: 'Missing caller identity header' });
  });

  it('accepts a trailing slash and decodes escapes in the identifier', async () => {
    const app = buildApp(new LocalInstanceNamespace({ namespace: 'BOTROOM' }));

    const response = await request(app).get('/api/guild/gateway/shard%2D7/').set('User-Agent', BOT);

    expect(response.status).toBe(200);
    expect(response.body.name).toBe('shard-7');
  });

  it('answers 503 when the instance cannot be looked up', async () => {
    const response = await request(buildApp(new RemoteInstanceNamespace({ namespace: 'BOTROOM', nodes: [] })))
      .get('/api/guild/gateway/abc')
      .set('User-Agent', BOT);

    expect(response.status).toBe(503);
    expect(response.body.error).toBe('instance_lookup_failed');
  });

  it('answers 502 when the instance cannot be obtained', async () => {
    const namespace = new LocalInstanceNamespace({
      namespace: 'BOTROOM',
      factory: () => {
        throw new Error('no storage');
      },
    });

    const response = await request(buildApp(namespace)).get('/api/guild/gateway/abc').set('User-Agent', BOT);

    expect(response.status).toBe(502);
    expect(response.body.error).toBe('instance_unavailable');
  });

  it('answers 502 when the backend is unreachable', async () => {
    const namespace = forwardingNamespace(() => Promise.reject(new TypeError('fetch failed')));

    const response = await request(buildApp(namespace)).get('/api/guild/gateway/abc').set('User-Agent', BOT);

    expect(response.status).toBe(502);
    expect(response.body.error).toBe('backend_unreachable');
  });

  it('answers 504 when the backend does not answer in time', async () => {
    const namespace = forwardingNamespace((_handle, _request, signal) => new Promise<Response>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason));
    }));

    const response = await request(buildApp(namespace, 20)).get('/api/guild/gateway/abc').set('User-Agent', BOT);

    expect(response.status).toBe(504);
    expect(response.body).toEqual({ error: 'backend_timeout', error_description: 'Backend did not answer within 20ms' });
  });
});
