import { Embeddings, type ChatModel } from '@switchyard/llm';
import { Inject, Injectable } from '@nestjs/common';
import { InvalidSelectionError } from '../common/errors';
import { LoggerService } from '../core/services/logger.service';
import { ClientFactory } from '../factory/client.factory';
import { formatSelection } from '../settings/selection';
import type { LLMClient, LLMKind } from './llm.types';
import { LLMProviderRegistry } from './llmProvider.registry';
import { LLMSettingsResolver } from './llmSettings.resolver';

@Injectable()
export class LLMFactoryService extends ClientFactory<LLMClient, LLMKind> {
  constructor(
    @Inject(LLMSettingsResolver) settings: LLMSettingsResolver,
    @Inject(LLMProviderRegistry) registry: LLMProviderRegistry,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    super(settings, registry, logger);
  }

  /** Chat model for the kind/provider; missing parts come from the `llm.default` selection. */
  async getLLM(kind?: LLMKind, provider?: string): Promise<ChatModel> {
    const target = await this.settings.target(kind, provider);
    const client = await this.getClient(target.kind, target.provider);
    if (client instanceof Embeddings) {
      throw new InvalidSelectionError(formatSelection(target), 'resolves to an embeddings model, not a chat model', {
        domain: 'llm',
        ...target,
      });
    }
    return client;
  }

  async getEmbeddings(provider?: string): Promise<Embeddings> {
    const target = await this.settings.target('embedding', provider);
    const client = await this.getClient(target.kind, target.provider);
    if (!(client instanceof Embeddings)) {
      throw new InvalidSelectionError(formatSelection(target), 'does not resolve to an embeddings model', {
        domain: 'llm',
        ...target,
      });
    }
    return client;
  }

  async getModelsByProvider(provider: string): Promise<LLMKind[]> {
    const configured = await this.getAvailableModels();
    return configured.filter((s) => s.provider === provider).map((s) => s.kind);
  }

  async getModelsByKind(kind: LLMKind): Promise<string[]> {
    const configured = await this.getAvailableModels();
    return configured.filter((s) => s.kind === kind).map((s) => s.provider);
  }
}
