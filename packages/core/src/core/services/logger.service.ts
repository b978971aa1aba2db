import { Injectable } from '@nestjs/common';
import type { LogLevel } from './config.service';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type SanitizationOptions = {
  redactKeyRe: RegExp;
  redactValuePatterns: ReadonlyArray<readonly [RegExp, string]>;
  MAX_STRING: number;
  MAX_JSON: number;
  MAX_DEPTH: number;
  MAX_KEYS: number;
};

const DEFAULT_SANITIZATION: SanitizationOptions = {
  redactKeyRe: /(authorization|token|api[_-]?key|password|secret|credential)/i,
  redactValuePatterns: [
    [/(Bearer)\s+[-A-Za-z0-9._~+/]+=*/gi, 'Bearer [REDACTED]'],
    [/([?&])(access_token|token|api[_-]?key|authorization|auth|password|secret)=([^&#]*)/gi, '$1$2=[REDACTED]'],
    // user:password@ inside connection strings
    [/(:\/\/[^:/@\s]+):([^@\s]+)@/g, '$1:[REDACTED]@'],
  ],
  MAX_STRING: 2000,
  MAX_JSON: 20000,
  MAX_DEPTH: 3,
  MAX_KEYS: 100,
};

@Injectable()
export class LoggerService {
  constructor(private readonly level: LogLevel = 'info') {}

  info(message: string, ...optionalParams: unknown[]) {
    this.log('info', message, optionalParams);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.log('debug', message, optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.log('warn', message, optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.log('error', message, optionalParams);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, message: string, optionalParams: unknown[]) {
    if (!this.isEnabled(level)) return;

    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level: level.toUpperCase(),
      message,
    };

    if (optionalParams.length > 0) {
      try {
        const context = this.sanitizeParams(optionalParams, DEFAULT_SANITIZATION);
        const [first] = context;
        if (context.length === 1 && this.isPlainRecord(first) && !this.hasReservedKey(first)) {
          Object.assign(record, first);
        } else if (context.length > 0) {
          record.context = context;
        }
      } catch (err) {
        record.context = [{ __serialization_error__: this.safeString(err) }];
      }
    }

    const payload = JSON.stringify(record);

    switch (level) {
      case 'debug':
        console.debug(payload);
        break;
      case 'warn':
        console.warn(payload);
        break;
      case 'error':
        console.error(payload);
        break;
      default:
        console.info(payload);
    }
  }

  private sanitizeParams(params: unknown[], options: SanitizationOptions): unknown[] {
    const seen = new WeakSet<object>();

    const redactString = (s: string): string => {
      let out = s;
      for (const [re, replacement] of options.redactValuePatterns) {
        out = out.replace(re, replacement);
      }
      if (out.length > options.MAX_STRING) {
        const extra = out.length - options.MAX_STRING;
        out = out.slice(0, options.MAX_STRING) + `…(+${extra} chars)`;
      }
      return out;
    };

    const toSafe = (v: unknown, depth = 0): unknown => {
      if (v instanceof Error) {
        const safe: Record<string, unknown> = {
          name: v.name,
          message: redactString(v.message),
          stack: v.stack ? redactString(v.stack) : undefined,
        };
        if ('code' in v && typeof v.code === 'string') safe.code = v.code;
        if (v.cause !== undefined) {
          if (depth + 1 >= options.MAX_DEPTH) safe.cause = '[Truncated]';
          else if (v.cause && typeof v.cause === 'object') safe.cause = toSafe(v.cause, depth + 1);
          else safe.cause = redactString(String(v.cause));
        }
        return safe;
      }
      if (Array.isArray(v)) {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        return v.slice(0, options.MAX_KEYS).map((x: unknown) => toSafe(x, depth + 1));
      }
      if (v && typeof v === 'object') {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        const entries = Object.entries(v);
        const out: Record<string, unknown> = {};
        let count = 0;
        for (const [k, val] of entries) {
          if (count++ >= options.MAX_KEYS) {
            out['__truncated__'] = `[+${entries.length - options.MAX_KEYS} keys omitted]`;
            break;
          }
          out[k] = options.redactKeyRe.test(k) ? '[REDACTED]' : toSafe(val, depth + 1);
        }
        return out;
      }
      if (typeof v === 'bigint') return v.toString();
      if (typeof v === 'string') return redactString(v);
      return v;
    };

    const safeParams = params.map((p) => toSafe(p, 0));
    const json = JSON.stringify(safeParams);
    if (json.length > options.MAX_JSON) {
      return [{ __truncated__: `context truncated after ${options.MAX_JSON} chars` }];
    }
    return safeParams;
  }

  private isPlainRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
  }

  private hasReservedKey(obj: Record<string, unknown>): boolean {
    const reserved = new Set(['ts', 'level', 'message']);
    return Object.keys(obj).some((key) => reserved.has(key));
  }

  private safeString(input: unknown): string {
    if (typeof input === 'string') return input;
    if (input instanceof Error) return input.message;
    return String(input);
  }
}
