import { z } from 'zod';
import { zodParams } from '../../src/config/configuration.record';
import { flag, text } from '../../src/config/fields';
import { LoggerService } from '../../src/core/services/logger.service';
import { defineProvider, type ProviderDefinition } from '../../src/registry/provider.definition';
import { SettingsSource } from '../../src/settings/settings.source';

export const quietLogger = () => new LoggerService('error');

// Source whose document can be swapped between loads; counts loads.
export class MutableSettingsSource extends SettingsSource {
  loads = 0;

  constructor(public document: unknown) {
    super();
  }

  describe(): string {
    return 'test-document';
  }

  async load(): Promise<unknown> {
    this.loads += 1;
    return structuredClone(this.document);
  }
}

export type EchoClient = { serial: number; provider: string; model: string };

export type EchoCounters = { built: number; disposed: number; failNext: boolean };

const echoSchema = z.strictObject({
  model_name: text(),
  slow: flag().default(false),
});

type EchoParams = z.infer<typeof echoSchema>;
type EchoKwargs = { model: string; slow: boolean };

export const tick = (ms = 5) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** In-process provider that hands out plain objects and records constructions. */
export function echoProvider(
  id: string,
  counters: EchoCounters,
  extra: Partial<Pick<ProviderDefinition<EchoParams, EchoKwargs, EchoClient>, 'requires' | 'envOverrides'>> = {},
): ProviderDefinition<EchoParams, EchoKwargs, EchoClient> {
  return defineProvider<EchoParams, EchoKwargs, EchoClient>({
    id,
    domain: 'llm',
    parse: zodParams(echoSchema),
    ...extra,
    render(params) {
      return { model: params.model_name, slow: params.slow };
    },
    async create(kwargs, { provider }) {
      if (kwargs.slow) await tick();
      if (counters.failNext) {
        counters.failNext = false;
        throw new Error('handshake refused');
      }
      counters.built += 1;
      return { serial: counters.built, provider, model: kwargs.model };
    },
    dispose() {
      counters.disposed += 1;
    },
  });
}

export const newCounters = (): EchoCounters => ({ built: 0, disposed: 0, failNext: false });
