import { describe, expect, it, vi, type Mock } from 'vitest';
import { DashboardClient, apiKeyPreview, type FetchLike } from './client.js';
import { resolveConfig } from './config.js';
import { DashboardDocument, toPublishedSpecView } from './document.js';
import type { ClientConfig } from './types.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setupClient(
  overrides: Record<string, unknown> = {},
  handler: FetchLike = async () => jsonResponse(200, {})
) {
  const config: ClientConfig = resolveConfig({ api_key: 'test-key', ...overrides });
  const fetchMock = vi.fn<FetchLike>(handler);
  const logger = createLogger();
  const client = new DashboardClient(config, logger, { fetch: fetchMock });
  return { client, fetchMock, logger };
}

function callAt(fetchMock: Mock<FetchLike>, index: number) {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`no fetch call at ${index}`);
  const [url, init] = call;
  const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
  return {
    url,
    method: init?.method,
    headers: new Headers(init?.headers),
    body,
    signal: init?.signal
  };
}

describe('DashboardClient auth', () => {
  it('uses the API key header and ignores basic auth when both are set', async () => {
    const { client, fetchMock, logger } = setupClient({ auth_user: 'admin', auth_pass: 'test-pass' });
    await client.sendDashboard({ title: 'Both' });

    const call = callAt(fetchMock, 0);
    expect(call.headers.get('X-Grafana-API-Key')).toBe('test-key');
    expect(call.headers.get('Authorization')).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(client.authMethod).toBe('api-key');
  });

  it('sends the key as a bearer token when configured', async () => {
    const { client, fetchMock } = setupClient({ api_key_header: 'bearer' });
    await client.get('/api/datasources');

    const call = callAt(fetchMock, 0);
    expect(call.headers.get('Authorization')).toBe('Bearer test-key');
    expect(call.headers.get('X-Grafana-API-Key')).toBeNull();
  });

  it('falls back to basic auth without an API key', async () => {
    const { client, fetchMock, logger } = setupClient({ api_key: '', auth_user: 'admin', auth_pass: 'test-pass' });
    await client.get('/api/datasources');

    expect(callAt(fetchMock, 0).headers.get('Authorization')).toBe('Basic YWRtaW46dGVzdC1wYXNz');
    expect(logger.warn).not.toHaveBeenCalled();
    expect(client.authMethod).toBe('basic');
  });
});

describe('DashboardClient.sendDashboard', () => {
  it('posts the published view inside the send envelope', async () => {
    const { client, fetchMock } = setupClient();
    const document = DashboardDocument.from({ title: 'Hello', uid: 'hello' });

    const ok = await client.sendDashboard(document, true, 'initial import');

    expect(ok).toBe(true);
    const call = callAt(fetchMock, 0);
    expect(call.url).toBe('http://localhost:3000/api/dashboards/db');
    expect(call.method).toBe('POST');
    expect(call.body).toEqual({
      dashboard: toPublishedSpecView(document),
      overwrite: true,
      message: 'initial import'
    });
    expect(call.signal).toBeUndefined();
  });

  it('returns false on 401 and keeps the status for the caller', async () => {
    const { client, logger } = setupClient({}, async () => jsonResponse(401, { message: 'Invalid API key' }));

    const ok = await client.sendDashboard({ title: 'Denied' });

    expect(ok).toBe(false);
    expect(client.results).toEqual({
      status: 401,
      ok: false,
      message: 'Invalid API key',
      body: { message: 'Invalid API key' }
    });
    expect(logger.error).toHaveBeenCalledWith('request failed: HTTP %d', 401);
    expect(logger.error).toHaveBeenCalledWith('using API key: %s', 'yes');
  });

  it('keeps raw text when the error body is not JSON', async () => {
    const { client } = setupClient({}, async () => new Response('bad gateway', { status: 502 }));

    expect(await client.sendDashboard({ title: 'Proxy' })).toBe(false);
    expect(client.results).toEqual({ status: 502, ok: false, text: 'bad gateway' });
  });

  it('propagates transport failures', async () => {
    const { client } = setupClient({}, async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:3000');
    });

    await expect(client.sendDashboard({ title: 'Offline' })).rejects.toThrow('connect ECONNREFUSED');
  });

  it('applies the send timeout when one is configured', async () => {
    const { client, fetchMock } = setupClient({ send_timeout_ms: 30000 });
    await client.sendDashboard({ title: 'Timed' });
    expect(callAt(fetchMock, 0).signal).toBeInstanceOf(AbortSignal);
  });

  it('builds an https base url', () => {
    const { client } = setupClient({ host: 'grafana.test', port: 443, use_https: true });
    expect(client.baseUrl).toBe('https://grafana.test:443');
    expect(client.server).toBe('grafana.test:443');
  });
});

describe('DashboardClient.sendDatasource', () => {
  it('updates an existing datasource found by name', async () => {
    const { client, fetchMock, logger } = setupClient({}, async (url) =>
      url.endsWith('/api/datasources/name/prom') ? jsonResponse(200, { id: 7, name: 'prom' }) : jsonResponse(200, {})
    );

    const ok = await client.sendDatasource({ name: 'prom', type: 'prometheus', url: 'http://prom:9090' });

    expect(ok).toBe(true);
    const update = callAt(fetchMock, 1);
    expect(update.url).toBe('http://localhost:3000/api/datasources/7');
    expect(update.method).toBe('PUT');
    expect(update.body).toEqual({ name: 'prom', type: 'prometheus', url: 'http://prom:9090' });
    expect(logger.info).toHaveBeenCalledWith('found datasource id %d for %s, updating', 7, 'prom');
  });

  it('creates the datasource when the lookup misses', async () => {
    const { client, fetchMock } = setupClient({}, async (url) =>
      url.includes('/name/') ? jsonResponse(404, { message: 'Data source not found' }) : jsonResponse(200, {})
    );

    expect(await client.sendDatasource({ name: 'loki', type: 'loki' })).toBe(true);
    const create = callAt(fetchMock, 1);
    expect(create.url).toBe('http://localhost:3000/api/datasources');
    expect(create.method).toBe('POST');
  });

  it('rejects a datasource without a name before any request', async () => {
    const { client, fetchMock } = setupClient();
    await expect(client.sendDatasource({ type: 'loki' })).rejects.toThrow("datasource must have a 'name' field");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('DashboardClient datasource helpers', () => {
  it('lists datasources and deletes by id', async () => {
    const { client, fetchMock } = setupClient({}, async (url, init) =>
      init?.method === 'DELETE' ? jsonResponse(200, { message: 'Data source deleted' }) : jsonResponse(200, [{ id: 3, name: 'prom' }])
    );

    expect(await client.listDatasources()).toEqual([{ id: 3, name: 'prom' }]);
    expect(await client.deleteDatasource(3)).toBe(true);
    expect(callAt(fetchMock, 1).url).toBe('http://localhost:3000/api/datasources/3');
    expect(callAt(fetchMock, 1).method).toBe('DELETE');
  });

  it('returns null for a name lookup miss', async () => {
    const { client, logger } = setupClient({}, async () => jsonResponse(404, { message: 'Data source not found' }));
    expect(await client.getDatasourceIdByName('absent')).toBeNull();
    expect(logger.error).not.toHaveBeenCalled();
  });
});

describe('DashboardClient.getDashboard', () => {
  it('builds a document from the dashboard key', async () => {
    const { client, fetchMock } = setupClient({}, async () =>
      jsonResponse(200, {
        dashboard: { title: 'Remote', annotations: null, schemaVersion: 39 },
        meta: { slug: 'remote' }
      })
    );

    const document = await client.getDashboard('remote');

    expect(callAt(fetchMock, 0).url).toBe('http://localhost:3000/api/dashboards/db/remote');
    expect(document?.spec.title).toBe('Remote');
    if (document) {
      expect(toPublishedSpecView(document).annotations).toEqual({ list: [] });
    }
  });

  it('returns null when the dashboard is missing', async () => {
    const { client } = setupClient({}, async () => jsonResponse(404, { message: 'Dashboard not found' }));
    expect(await client.getDashboard('missing')).toBeNull();
    expect(client.results?.status).toBe(404);
  });
});

describe('DashboardClient checks', () => {
  it('calls the health endpoint without credentials', async () => {
    const { client, fetchMock } = setupClient({}, async () => jsonResponse(200, { database: 'ok', version: '11.0.0' }));

    const report = await client.checkHealth();

    expect(report).toEqual({ reachable: true, status: 200, database: 'ok', version: '11.0.0' });
    const call = callAt(fetchMock, 0);
    expect(call.url).toBe('http://localhost:3000/api/health');
    expect(call.headers.get('X-Grafana-API-Key')).toBeNull();
    expect(call.signal).toBeInstanceOf(AbortSignal);
  });

  it('reports an unreachable server', async () => {
    const { client } = setupClient({}, async () => {
      throw new Error('getaddrinfo ENOTFOUND grafana');
    });

    expect(await client.checkHealth()).toEqual({
      reachable: false,
      status: null,
      error: 'getaddrinfo ENOTFOUND grafana'
    });
  });

  it('counts datasources on a successful auth check', async () => {
    const { client } = setupClient({ api_key: 'abcdefghijklmnopqrstu' }, async () =>
      jsonResponse(200, [{ id: 1 }, { id: 2 }])
    );

    expect(await client.checkAuth()).toEqual({
      ok: true,
      status: 200,
      method: 'api-key',
      api_key_preview: 'abcdefgh...rstu',
      datasource_count: 2,
      message: undefined
    });
  });

  it('logs troubleshooting hints on a failed auth check', async () => {
    const { client, logger } = setupClient({}, async () => jsonResponse(401, { message: 'Unauthorized' }));

    const report = await client.checkAuth();

    expect(report.ok).toBe(false);
    expect(report.status).toBe(401);
    expect(report.message).toBe('Unauthorized');
    expect(report.api_key_preview).toBe('***');
    expect(logger.error).toHaveBeenCalledWith('using basic auth: %s', 'no');
  });
});

describe('apiKeyPreview', () => {
  it('hides short keys entirely', () => {
    expect(apiKeyPreview('short-key')).toBe('***');
    expect(apiKeyPreview('glsa_0123456789abcdef')).toBe('glsa_012...cdef');
  });
});
