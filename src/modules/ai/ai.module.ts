import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AiService } from './ai.service';
import { GEMINI_CLIENT } from './ai.types';
import { createGeminiClient } from './gemini.client';
import {
  GEMINI_CONFIG,
  GeminiConfig,
  geminiConfigFactory,
} from '../../config/gemini.config';

@Module({
  providers: [
    {
      provide: GEMINI_CONFIG,
      useFactory: geminiConfigFactory,
      inject: [ConfigService],
    },
    {
      provide: GEMINI_CLIENT,
      useFactory: (config: GeminiConfig) => createGeminiClient(config),
      inject: [GEMINI_CONFIG],
    },
    AiService,
  ],
  exports: [AiService],
})
export class AiModule {}
