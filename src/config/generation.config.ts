import * as dotenv from 'dotenv';

dotenv.config();

export const GENERATION_CONFIG = 'GENERATION_CONFIG';

export interface GenerationConfig {
  // A `generating` claim older than this is treated as abandoned
  claimTtlMs: number;
  pollIntervalMs: number;
  waitTimeoutMs: number;
}

export const generationConfig: GenerationConfig = {
  claimTtlMs: Number(process.env.LESSON_CLAIM_TTL_MS ?? 5 * 60 * 1000),
  pollIntervalMs: Number(process.env.LESSON_WAIT_POLL_MS ?? 500),
  waitTimeoutMs: Number(process.env.LESSON_WAIT_TIMEOUT_MS ?? 150000),
};
