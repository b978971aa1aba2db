import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { z } from 'zod';
dotenv.config();

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const configSchema = z.object({
  // Path of the YAML document holding the `llm` and `datasources` sections
  configPath: z.string().min(1).default('config.yaml'),
  logLevel: z
    .string()
    .default('info')
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
});

export type Config = z.infer<typeof configSchema>;

@Injectable()
export class ConfigService implements Config {
  private static instance?: ConfigService;
  private _params?: Config;

  private get params(): Config {
    if (!this._params) {
      throw new Error('ConfigService not initialized with parameters');
    }
    return this._params;
  }

  init(params: Config): this {
    this._params = params;
    return this;
  }

  get configPath(): string {
    return this.params.configPath;
  }

  get logLevel(): LogLevel {
    return this.params.logLevel;
  }

  static fromEnv(): ConfigService {
    const parsed = configSchema.parse({
      configPath: process.env.SWITCHYARD_CONFIG_PATH || undefined,
      logLevel: process.env.LOG_LEVEL || undefined,
    });
    return new ConfigService().init(parsed);
  }

  static register(service: ConfigService): ConfigService {
    ConfigService.assertInitialized(service);
    ConfigService.instance = service;
    return service;
  }

  // Falls back to the environment when nothing was registered.
  static getInstance(): ConfigService {
    if (!ConfigService.instance) ConfigService.instance = ConfigService.fromEnv();
    return ConfigService.instance;
  }

  static clearInstanceForTest(): void {
    ConfigService.instance = undefined;
  }

  static assertInitialized(service: unknown): asserts service is ConfigService {
    if (!(service instanceof ConfigService) || !service._params) {
      throw new Error('ConfigService is not initialized; call ConfigService.fromEnv() or init() first');
    }
  }
}
