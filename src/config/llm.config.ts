import { registerAs } from '@nestjs/config';

export interface LlmConfig {
  apiKey?: string;
  baseUrl: string;
  defaultSystemPrompt?: string;
}

export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';

export default registerAs(
  'llm',
  (): LlmConfig => ({
    apiKey: process.env[OPENAI_API_KEY_ENV] || undefined,
    baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
    defaultSystemPrompt: process.env.CHAT_DEFAULT_SYSTEM_PROMPT || undefined,
  }),
);
