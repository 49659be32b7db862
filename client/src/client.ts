import type {
  AuthReport,
  ClientConfig,
  Datasource,
  DashboardInput,
  HealthReport,
  Logger,
  ResponseDiagnostics
} from './types.js';
import { DashboardDocument, toPublishedSpecView } from './document.js';
import { asErrorMessage, isPlainObject, truncate } from './utils.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ClientDeps {
  fetch?: FetchLike;
}

export const NOOP_LOGGER: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};

const RAW_TEXT_LIMIT = 500;

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface RequestOptions {
  body?: unknown;
  timeoutMs?: number;
  authenticated?: boolean;
}

export function apiKeyPreview(key: string): string {
  return key.length > 12 ? `${key.slice(0, 8)}...${key.slice(-4)}` : '***';
}

async function readDiagnostics(response: Response): Promise<ResponseDiagnostics> {
  const diagnostics: ResponseDiagnostics = { status: response.status, ok: response.ok };
  const text = await response.text();
  if (!text) return diagnostics;

  try {
    const body: unknown = JSON.parse(text);
    diagnostics.body = body;
    if (isPlainObject(body) && typeof body.message === 'string') {
      diagnostics.message = body.message;
    }
  } catch {
    diagnostics.text = truncate(text, RAW_TEXT_LIMIT);
  }
  return diagnostics;
}

/**
 * HTTP client for the dashboard server. Holds the last response's diagnostics,
 * so one instance must not be shared by concurrent callers.
 */
export class DashboardClient {
  private readonly headers: Record<string, string>;
  private readonly basicAuth: string | null;
  private readonly fetchImpl: FetchLike;
  private lastResponse: ResponseDiagnostics | null = null;

  constructor(
    private readonly config: ClientConfig,
    private readonly logger: Logger = NOOP_LOGGER,
    deps: ClientDeps = {}
  ) {
    this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json'
    };
    this.basicAuth = null;

    const hasBasicCredentials = Boolean(config.auth_user || config.auth_pass);
    if (config.api_key) {
      if (config.api_key_header === 'bearer') {
        this.headers.Authorization = `Bearer ${config.api_key}`;
      } else {
        this.headers['X-Grafana-API-Key'] = config.api_key;
      }
      if (hasBasicCredentials) {
        this.logger.warn('both API key and basic auth configured; using API key, basic auth ignored');
      }
    } else if (config.auth_user && config.auth_pass) {
      const encoded = Buffer.from(`${config.auth_user}:${config.auth_pass}`, 'utf8').toString('base64');
      this.basicAuth = `Basic ${encoded}`;
    }
  }

  get server(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  get baseUrl(): string {
    return `${this.config.use_https ? 'https' : 'http'}://${this.server}`;
  }

  /** Diagnostics of the most recent request, `null` before the first one. */
  get results(): ResponseDiagnostics | null {
    return this.lastResponse;
  }

  get authMethod(): AuthReport['method'] {
    if (this.config.api_key) return 'api-key';
    return this.basicAuth ? 'basic' : 'none';
  }

  async sendDashboard(
    document: DashboardDocument | DashboardInput,
    overwrite = false,
    message = ''
  ): Promise<boolean> {
    const dashboard = toPublishedSpecView(DashboardDocument.from(document));
    return this.post('/api/dashboards/db', { dashboard, overwrite, message });
  }

  async getDashboard(slug: string): Promise<DashboardDocument | null> {
    const result = await this.get(`/api/dashboards/db/${encodeURIComponent(slug)}`);
    if (!isPlainObject(result) || !isPlainObject(result.dashboard)) {
      return null;
    }
    return DashboardDocument.from(result.dashboard);
  }

  /** Updates the datasource with the same name, or creates it. */
  async sendDatasource(datasource: Datasource | Record<string, unknown>): Promise<boolean> {
    const name = typeof datasource.name === 'string' ? datasource.name.trim() : '';
    if (!name) {
      throw new Error("datasource must have a 'name' field");
    }

    const id = await this.getDatasourceIdByName(name);
    if (id !== null) {
      this.logger.info('found datasource id %d for %s, updating', id, name);
      return this.put(`/api/datasources/${id}`, datasource);
    }
    this.logger.info('datasource %s not found, creating', name);
    return this.post('/api/datasources', datasource);
  }

  async getDatasourceIdByName(name: string): Promise<number | null> {
    const result = await this.get(`/api/datasources/name/${encodeURIComponent(name)}`);
    if (isPlainObject(result) && typeof result.id === 'number') {
      return result.id;
    }
    return null;
  }

  async listDatasources(): Promise<Record<string, unknown>[] | null> {
    const result = await this.get('/api/datasources');
    return Array.isArray(result) ? result.filter(isPlainObject) : null;
  }

  async deleteDatasource(id: number | string): Promise<boolean> {
    return this.delete(`/api/datasources/${encodeURIComponent(String(id))}`);
  }

  async checkHealth(): Promise<HealthReport> {
    try {
      const response = await this.request('GET', '/api/health', {
        timeoutMs: this.config.check_timeout_ms,
        authenticated: false
      });
      const diagnostics = await readDiagnostics(response);
      this.lastResponse = diagnostics;
      const body = isPlainObject(diagnostics.body) ? diagnostics.body : {};
      return {
        reachable: true,
        status: response.status,
        database: typeof body.database === 'string' ? body.database : undefined,
        version: typeof body.version === 'string' ? body.version : undefined
      };
    } catch (error) {
      return { reachable: false, status: null, error: asErrorMessage(error) };
    }
  }

  async checkAuth(): Promise<AuthReport> {
    const report: AuthReport = {
      ok: false,
      status: null,
      method: this.authMethod,
      api_key_preview: this.config.api_key ? apiKeyPreview(this.config.api_key) : undefined
    };

    try {
      const response = await this.request('GET', '/api/datasources', {
        timeoutMs: this.config.check_timeout_ms
      });
      const diagnostics = await readDiagnostics(response);
      this.lastResponse = diagnostics;
      report.status = response.status;
      report.ok = response.ok;
      report.message = diagnostics.message;
      if (response.ok && Array.isArray(diagnostics.body)) {
        report.datasource_count = diagnostics.body.length;
      }
      if (response.status === 401) {
        this.logAuthHints();
      }
    } catch (error) {
      report.error = asErrorMessage(error);
    }
    return report;
  }

  async get(path: string): Promise<unknown> {
    const response = await this.request('GET', path);
    const diagnostics = await readDiagnostics(response);
    this.lastResponse = diagnostics;
    if (response.ok) {
      return diagnostics.body ?? null;
    }
    if (response.status === 401) {
      this.reportFailure(diagnostics);
    }
    return null;
  }

  async post(path: string, data: unknown): Promise<boolean> {
    return this.write('POST', path, data);
  }

  async put(path: string, data: unknown): Promise<boolean> {
    return this.write('PUT', path, data);
  }

  async delete(path: string): Promise<boolean> {
    return this.write('DELETE', path);
  }

  private async write(method: HttpMethod, path: string, data?: unknown): Promise<boolean> {
    const response = await this.request(method, path, {
      body: data,
      timeoutMs: this.config.send_timeout_ms
    });
    const diagnostics = await readDiagnostics(response);
    this.lastResponse = diagnostics;
    if (response.ok) {
      return true;
    }
    this.reportFailure(diagnostics);
    return false;
  }

  private async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = { ...this.headers };
    if (options.authenticated === false) {
      delete headers['X-Grafana-API-Key'];
      delete headers.Authorization;
    } else if (this.basicAuth) {
      headers.Authorization = this.basicAuth;
    }

    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }
    if (options.timeoutMs && options.timeoutMs > 0) {
      init.signal = AbortSignal.timeout(options.timeoutMs);
    }
    return this.fetchImpl(`${this.baseUrl}${path}`, init);
  }

  private reportFailure(diagnostics: ResponseDiagnostics): void {
    this.logger.error('request failed: HTTP %d', diagnostics.status);
    if (diagnostics.message) {
      this.logger.error('message: %s', diagnostics.message);
    }
    if (diagnostics.body !== undefined) {
      this.logger.error('response: %s', JSON.stringify(diagnostics.body, null, 2));
    } else if (diagnostics.text) {
      this.logger.error('response text: %s', diagnostics.text);
    }
    if (diagnostics.status === 401) {
      this.logAuthHints();
    }
  }

  private logAuthHints(): void {
    const apiKey = this.config.api_key;
    this.logger.error(
      [
        'authentication failed, check:',
        '  - the API key is correct and has the Admin role',
        "  - service account tokens start with 'glsa_'",
        '  - the API key has not expired',
        '  - basic auth username and password, when used'
      ].join('\n')
    );
    this.logger.error('using API key: %s', apiKey ? 'yes' : 'no');
    if (apiKey) {
      this.logger.error(
        'API key preview: %s (length %d, header %s)',
        apiKeyPreview(apiKey),
        apiKey.length,
        this.config.api_key_header === 'bearer' ? 'Authorization: Bearer' : 'X-Grafana-API-Key'
      );
    }
    this.logger.error('using basic auth: %s', this.basicAuth ? 'yes' : 'no');
  }
}
