import { registerAs } from '@nestjs/config';
import { intFromEnv } from './env.util';

export default registerAs('ai', () => ({
  apiKey: process.env.GROQ_API_KEY || '',
  generationModel: process.env.GROQ_GENERATION_MODEL || 'llama-3.3-70b-versatile',
  analysisModel:
    process.env.GROQ_ANALYSIS_MODEL || 'meta-llama/llama-4-scout-17b-16e-instruct',
  maxRetries: intFromEnv('AI_MAX_RETRIES', 3),
  retryBaseDelayMs: intFromEnv('AI_RETRY_BASE_DELAY_MS', 1000),
  requestTimeoutMs: intFromEnv('AI_REQUEST_TIMEOUT_MS', 60000, 1),
  maxTokens: intFromEnv('AI_MAX_TOKENS', 4096, 1),
}));
