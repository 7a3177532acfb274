import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { OPENAI_CLIENT } from './chatbot.constants';

/**
 * Resolves to null when no key is configured; the chatbot then answers from its rules.
 */
export const openAiClientProvider: Provider = {
  provide: OPENAI_CLIENT,
  inject: [ConfigService],
  useFactory: (configService: ConfigService): OpenAI | null => {
    const apiKey = configService.get<string>('OPENAI_API_KEY');
    return apiKey ? new OpenAI({ apiKey, timeout: 30_000, maxRetries: 1 }) : null;
  },
};
