import { readFile } from 'node:fs/promises';
import { Injectable } from '@nestjs/common';
import { parse as parseYaml } from 'yaml';
import { ConfigurationLoadError } from '../common/errors';

/** Supplies the raw hierarchical configuration document. */
@Injectable()
export abstract class SettingsSource {
  abstract describe(): string;
  abstract load(): Promise<unknown>;
}

export class YamlFileSettingsSource extends SettingsSource {
  constructor(private readonly path: string) {
    super();
  }

  describe(): string {
    return this.path;
  }

  async load(): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      throw new ConfigurationLoadError(`Cannot read configuration file ${this.path}`, { source: this.path }, err);
    }
    try {
      return parseYaml(text) ?? {};
    } catch (err) {
      throw new ConfigurationLoadError(`Cannot parse configuration file ${this.path}`, { source: this.path }, err);
    }
  }
}

export class StaticSettingsSource extends SettingsSource {
  constructor(
    private readonly document: unknown,
    private readonly label = 'inline',
  ) {
    super();
  }

  describe(): string {
    return this.label;
  }

  async load(): Promise<unknown> {
    return structuredClone(this.document);
  }
}
