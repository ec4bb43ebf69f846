// yomikata/conn - Database connection, lazy caches and debug logging

import postgres from 'postgres';

export interface ConnectionSpec {
  database: string;
  user: string;
  password: string;
  host: string;
  port?: number;
  ssl?: boolean;
}

let connection: postgres.Sql | null = null;

export const DB_URL_ENV = 'YOMIKATA_DB_URL';

/**
 * Parse a postgres URL (postgres:// or postgresql://) into a ConnectionSpec.
 * `?ssl=true|false` and `?sslmode=require|disable|verify-*` are honoured.
 */
export function parseConnectionUrl(dbUrl: string): ConnectionSpec {
  try {
    const normalized = dbUrl.replace(/^postgresql:\/\//, 'postgres://');
    const url = new URL(normalized);

    const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
    if (!database) {
      throw new Error('Database name missing');
    }

    const hostParam = url.searchParams.get('host');
    let host = url.hostname;
    if (!host && hostParam) {
      host = decodeURIComponent(hostParam);
    }
    if (!host) {
      host = 'localhost';
    }

    const portParam = url.port || url.searchParams.get('port') || undefined;
    const spec: ConnectionSpec = {
      user: url.username ? decodeURIComponent(url.username) : '',
      password: url.password ? decodeURIComponent(url.password) : '',
      host,
      database
    };

    if (portParam) {
      const parsedPort = Number(portParam);
      if (!Number.isFinite(parsedPort)) {
        throw new Error(`Invalid port: ${portParam}`);
      }
      spec.port = parsedPort;
    }

    const sslParam = url.searchParams.get('ssl');
    const sslMode = url.searchParams.get('sslmode');
    if (sslParam) {
      const normalizedSsl = sslParam.toLowerCase();
      if (['true', '1', 'require'].includes(normalizedSsl)) {
        spec.ssl = true;
      } else if (['false', '0', 'disable'].includes(normalizedSsl)) {
        spec.ssl = false;
      }
    } else if (sslMode) {
      const normalizedSslmode = sslMode.toLowerCase();
      if (['require', 'verify-ca', 'verify-full'].includes(normalizedSslmode)) {
        spec.ssl = true;
      } else if (normalizedSslmode === 'disable') {
        spec.ssl = false;
      }
    }

    return spec;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid database URL (${dbUrl}): ${message}`);
  }
}

export function getConnectionFromEnv(): ConnectionSpec | null {
  const dbUrl = process.env[DB_URL_ENV];
  if (!dbUrl) return null;
  return parseConnectionUrl(dbUrl);
}

function createSqlConnection(spec: ConnectionSpec): postgres.Sql {
  return postgres({
    host: spec.host,
    port: spec.port ?? 5432,
    database: spec.database,
    user: spec.user,
    password: spec.password,
    ssl: spec.ssl ? 'require' : false,
    transform: postgres.camel,
    prepare: true,
    // Close idle connections so one-shot CLI runs exit
    idle_timeout: 1,
    max_lifetime: 60 * 5
  });
}

export function setConnection(spec: ConnectionSpec): void {
  const existing = connection;

  if (existing) {
    connection = null;
    existing.end().catch((error: unknown) => {
      console.warn('Failed to close existing Postgres connection cleanly:', error);
    });
  }

  connection = createSqlConnection(spec);
}

export function getConnection(): postgres.Sql {
  if (connection) return connection;

  const spec = getConnectionFromEnv();
  if (!spec) {
    throw new Error(`No database connection configured. Set ${DB_URL_ENV} environment variable.`);
  }
  const created = createSqlConnection(spec);
  connection = created;
  return created;
}

export async function closeConnection(): Promise<void> {
  const existing = connection;
  connection = null;
  if (existing) {
    await existing.end();
  }
}

// Cache infrastructure
interface Cache<T> {
  entry: { value: T } | null;
  init: () => Promise<T>;
}

// Reset hooks by cache name
const caches = new Map<string, () => void>();

/**
 * Register a named cache that is filled by `initFn` on first use.
 */
export function defineCache<T>(
  name: string,
  initFn: () => Promise<T>
): () => Promise<T> {
  const cache: Cache<T> = {
    entry: null,
    init: initFn
  };

  const load = async (): Promise<T> => {
    const value = await cache.init();
    cache.entry = { value };
    return value;
  };

  caches.set(name, () => {
    cache.entry = null;
  });

  return async () => {
    if (cache.entry) return cache.entry.value;
    return load();
  };
}

export function resetCache(name: string): void {
  caches.get(name)?.();
}

// Debug logging
export let DEBUG = false;

export function setDebug(value: boolean): void {
  DEBUG = value;
}

export function dp(...args: unknown[]): void {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}
