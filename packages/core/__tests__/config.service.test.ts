import { afterEach, describe, expect, it } from 'vitest';
import { ConfigService } from '../src/core/services/config.service';

const previousEnv: Record<string, string | undefined> = {
  configPath: process.env.SWITCHYARD_CONFIG_PATH,
  logLevel: process.env.LOG_LEVEL,
};

function restore(name: string, value: string | undefined) {
  if (value === undefined) delete process.env[name];
  else process.env[name] = value;
}

describe('ConfigService', () => {
  afterEach(() => {
    restore('SWITCHYARD_CONFIG_PATH', previousEnv.configPath);
    restore('LOG_LEVEL', previousEnv.logLevel);
    ConfigService.clearInstanceForTest();
  });

  it('reads the configuration path and log level from the environment', () => {
    process.env.SWITCHYARD_CONFIG_PATH = '/etc/switchyard/clients.yaml';
    process.env.LOG_LEVEL = ' WARN ';

    const config = ConfigService.fromEnv();

    expect(config.configPath).toBe('/etc/switchyard/clients.yaml');
    expect(config.logLevel).toBe('warn');
  });

  it('falls back to defaults for unset or empty variables', () => {
    delete process.env.SWITCHYARD_CONFIG_PATH;
    process.env.LOG_LEVEL = '';

    const config = ConfigService.fromEnv();

    expect(config.configPath).toBe('config.yaml');
    expect(config.logLevel).toBe('info');
  });

  it('rejects unknown log levels', () => {
    process.env.LOG_LEVEL = 'loud';
    expect(() => ConfigService.fromEnv()).toThrow();
  });

  it('keeps one registered instance', () => {
    const registered = ConfigService.register(
      new ConfigService().init({ configPath: 'clients.yaml', logLevel: 'debug' }),
    );

    expect(ConfigService.getInstance()).toBe(registered);
    ConfigService.clearInstanceForTest();
    expect(ConfigService.getInstance()).not.toBe(registered);
  });

  it('refuses an uninitialised service', () => {
    expect(() => ConfigService.assertInitialized(new ConfigService())).toThrow(
      'ConfigService is not initialized; call ConfigService.fromEnv() or init() first',
    );
    expect(() => new ConfigService().configPath).toThrow('ConfigService not initialized with parameters');
  });
});
