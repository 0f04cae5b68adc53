import { registerAs } from '@nestjs/config';
import { CHAT_CONTEXT_MAX_LENGTH } from '@engage/shared';

export interface LlmConfig {
  openaiApiKey: string | undefined;
  model: string;
  timeoutMs: number;
  chatContextMaxLength: number;
}

export default registerAs('llm', (): LlmConfig => ({
  openaiApiKey: process.env.OPENAI_API_KEY,
  model: process.env.LLM_MODEL || 'gpt-4o-mini',
  timeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || '30000', 10),
  chatContextMaxLength: parseInt(
    process.env.CHAT_CONTEXT_MAX_LENGTH || String(CHAT_CONTEXT_MAX_LENGTH),
    10,
  ),
}));
