import { ConfigService } from '@nestjs/config';

export const GEMINI_CONFIG = 'GEMINI_CONFIG';

export interface GeminiConfig {
  apiKey: string | undefined;
  model: string;
  timeoutMs: number;
}

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_GEMINI_TIMEOUT_MS = 120000;

export const geminiConfigFactory = (
  configService: ConfigService,
): GeminiConfig => ({
  apiKey: configService.get<string>('GEMINI_API_KEY') || undefined,
  model: configService.get<string>('GEMINI_MODEL') || DEFAULT_GEMINI_MODEL,
  timeoutMs:
    Number(configService.get<string>('GEMINI_TIMEOUT_MS')) ||
    DEFAULT_GEMINI_TIMEOUT_MS,
});
