import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationLoadError } from '../src/common/errors';
import { StaticSettingsSource, YamlFileSettingsSource } from '../src/settings/settings.source';

describe('YamlFileSettingsSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'switchyard-settings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses the YAML document', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(
      path,
      ['llm:', '  default: openai.fast', '  openai:', '    fast:', '      model_name: gpt-4o-mini', '      organization: ~', ''].join('\n'),
    );

    await expect(new YamlFileSettingsSource(path).load()).resolves.toEqual({
      llm: { default: 'openai.fast', openai: { fast: { model_name: 'gpt-4o-mini', organization: null } } },
    });
  });

  it('reads an empty file as an empty document', async () => {
    const path = join(dir, 'empty.yaml');
    await writeFile(path, '');
    await expect(new YamlFileSettingsSource(path).load()).resolves.toEqual({});
  });

  it('wraps read and parse failures', async () => {
    const missing = join(dir, 'missing.yaml');
    const attempt = new YamlFileSettingsSource(missing).load();
    await expect(attempt).rejects.toBeInstanceOf(ConfigurationLoadError);
    await expect(attempt).rejects.toThrow(`Cannot read configuration file ${missing}`);

    const broken = join(dir, 'broken.yaml');
    await writeFile(broken, 'llm: [unclosed\n');
    await expect(new YamlFileSettingsSource(broken).load()).rejects.toThrow(
      `Cannot parse configuration file ${broken}`,
    );
  });
});

describe('StaticSettingsSource', () => {
  it('hands out independent copies', async () => {
    const source = new StaticSettingsSource({ llm: { default: 'openai.fast' } }, 'fixture');
    const first = await source.load();
    if (first && typeof first === 'object') Object.assign(first, { llm: {} });

    await expect(source.load()).resolves.toEqual({ llm: { default: 'openai.fast' } });
    expect(source.describe()).toBe('fixture');
  });
});
