import { credential, integer, number, port, text } from '../../config/fields';

// Fields shared by the network databases.
export const networkShape = {
  host: text(),
  port: port(),
  database: text(),
  username: text(),
  password: credential(),
  pool_size: integer({ positive: true }).default(5),
  max_overflow: integer({ min: 0 }).default(10),
  // seconds
  pool_timeout: number({ positive: true }).default(30),
  // seconds; -1 keeps idle connections forever
  pool_recycle: integer({ min: -1 }).default(3600),
};

// seconds to wait for a new connection; drivers that take it add it to their schema
export const connectTimeout = () => number({ positive: true }).default(10);

export type NetworkParams = {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  pool_size: number;
  max_overflow: number;
  pool_timeout: number;
  pool_recycle: number;
};

type QueryValue = string | number | boolean | undefined;

export function networkUrl(scheme: string, params: NetworkParams, query: Record<string, QueryValue> = {}): string {
  const auth = `${encodeURIComponent(params.username)}:${encodeURIComponent(params.password)}`;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const qs = search.toString();
  const suffix = qs ? `?${qs}` : '';
  return `${scheme}://${auth}@${params.host}:${params.port}/${encodeURIComponent(params.database)}${suffix}`;
}

export function describeNetwork(params: NetworkParams): Record<string, unknown> {
  return {
    host: params.host,
    port: params.port,
    database: params.database,
    pool_size: params.pool_size,
    max_overflow: params.max_overflow,
  };
}

export const seconds = (value: number): number => Math.round(value * 1000);
