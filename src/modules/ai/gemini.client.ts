import { Logger } from '@nestjs/common';
import { GoogleGenAI } from '@google/genai';
import { GeminiConfig } from '../../config/gemini.config';
import { GenerativeModelClient } from './ai.types';

const logger = new Logger('GeminiClient');

export function createGeminiClient(config: GeminiConfig): GenerativeModelClient {
  if (!config.apiKey) {
    logger.warn(
      'GEMINI_API_KEY is not set, AI service will run in DISABLED mode and every generation will fail',
    );
    return {
      generateContent: () =>
        Promise.reject(new Error('AI service is disabled: GEMINI_API_KEY is not set')),
    };
  }

  logger.log(`Initialized Google Gemini client for model ${config.model}`);
  return new GoogleGenAI({ apiKey: config.apiKey }).models;
}
