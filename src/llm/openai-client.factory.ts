import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { LlmConfig, OPENAI_API_KEY_ENV } from '../config/llm.config';
import { ClientAvailability, LlmClientFactory } from './llm-client';
import { OpenAIChatClient } from './openai-chat.client';

@Injectable()
export class OpenAIClientFactory extends LlmClientFactory {
  private readonly logger = new Logger(OpenAIClientFactory.name);

  constructor(
    private readonly configService: ConfigService,
    // Absent when HttpModule is not registered in the injector
    @Optional() private readonly httpService?: HttpService,
  ) {
    super();
  }

  create(): ClientAvailability {
    const config = this.configService.get<LlmConfig>('llm');

    if (!config?.apiKey) {
      return {
        status: 'unavailable',
        reason: 'missing-credential',
        message: `${OPENAI_API_KEY_ENV} environment variable is not set.`,
      };
    }

    if (!this.httpService) {
      return {
        status: 'unavailable',
        reason: 'library-unavailable',
        message: 'OpenAI client library is not available on server.',
      };
    }

    try {
      const client = new OpenAIChatClient(this.httpService, {
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
      });
      return { status: 'available', client };
    } catch (error) {
      this.logger.error(
        `Failed to construct OpenAI client: ${error instanceof Error ? error.message : String(error)}`,
      );
      return {
        status: 'unavailable',
        reason: 'init-failed',
        message: 'Failed to initialize language model.',
      };
    }
  }
}
