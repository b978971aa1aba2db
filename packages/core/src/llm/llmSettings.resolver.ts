import { Inject, Injectable, Optional } from '@nestjs/common';
import { LoggerService } from '../core/services/logger.service';
import { SETTINGS_ENV, type EnvSource } from '../settings/env.overrides';
import { SettingsResolver } from '../settings/settings.resolver';
import { SettingsSource } from '../settings/settings.source';
import { LLM_DOMAIN, type LLMClient, type LLMKind } from './llm.types';
import { LLMProviderRegistry } from './llmProvider.registry';

@Injectable()
export class LLMSettingsResolver extends SettingsResolver<LLMClient, LLMKind> {
  constructor(
    @Inject(SettingsSource) source: SettingsSource,
    @Inject(LLMProviderRegistry) registry: LLMProviderRegistry,
    @Inject(LoggerService) logger: LoggerService,
    @Optional() @Inject(SETTINGS_ENV) env?: EnvSource,
  ) {
    super(LLM_DOMAIN, source, registry, logger, env ?? process.env);
  }
}
