import { Injectable } from '@nestjs/common';
import { ProviderRegistry } from '../registry/provider.registry';
import type { LLMClient } from './llm.types';
import { registerBuiltinLLMProviders } from './providers';

@Injectable()
export class LLMProviderRegistry extends ProviderRegistry<LLMClient> {
  constructor() {
    super('llm');
    registerBuiltinLLMProviders(this);
  }
}
