import type { ApiKeyHeader, ClientConfig } from './types.js';

function asNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function asString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function asOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on') return true;
    if (normalized === 'false' || normalized === '0' || normalized === 'no' || normalized === 'off') return false;
  }
  return fallback;
}

function asObject(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : {};
}

function resolveApiKeyHeader(value: unknown): ApiKeyHeader {
  return asString(value, '').toLowerCase() === 'bearer' ? 'bearer' : 'x-grafana-api-key';
}

export function resolveConfig(input: unknown): ClientConfig {
  const raw = asObject(input);

  return {
    host: asString(raw.host, 'localhost'),
    port: Math.max(1, Math.min(65535, Math.floor(asNumber(raw.port, 3000)))),
    use_https: asBoolean(raw.use_https, false),
    api_key: asOptionalString(raw.api_key),
    api_key_header: resolveApiKeyHeader(raw.api_key_header),
    auth_user: asOptionalString(raw.auth_user),
    auth_pass: typeof raw.auth_pass === 'string' && raw.auth_pass ? raw.auth_pass : undefined,
    check_timeout_ms: Math.max(100, Math.floor(asNumber(raw.check_timeout_ms, 5000))),
    send_timeout_ms: Math.max(0, Math.floor(asNumber(raw.send_timeout_ms, 0)))
  };
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return resolveConfig({
    host: env.GRAFANA_HOST,
    port: env.GRAFANA_PORT,
    use_https: env.GRAFANA_USE_HTTPS,
    api_key: env.GRAFANA_API_KEY,
    api_key_header: env.GRAFANA_API_KEY_HEADER,
    auth_user: env.GRAFANA_USER,
    auth_pass: env.GRAFANA_PASSWORD
  });
}
