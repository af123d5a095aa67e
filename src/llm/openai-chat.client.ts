import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import type {
  ChatCompletionParams,
  ChatCompletionPayload,
  LlmClient,
} from './llm-client';

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseUrl: string;
}

interface OpenAIErrorBody {
  error?: { message?: string };
}

/**
 * Single-attempt chat completion against the OpenAI REST API.
 */
export class OpenAIChatClient implements LlmClient {
  readonly provider = 'OpenAI';
  private readonly logger = new Logger(OpenAIChatClient.name);
  private readonly apiKey: string;
  private readonly completionsUrl: string;

  constructor(
    private readonly httpService: HttpService,
    options: OpenAIChatClientOptions,
  ) {
    if (!options.apiKey.trim()) {
      throw new Error('OpenAI API key is empty');
    }
    // Throws on a malformed base URL
    const base = new URL(options.baseUrl);
    this.apiKey = options.apiKey;
    this.completionsUrl = `${base.href.replace(/\/+$/, '')}/chat/completions`;
  }

  async completeChat(
    params: ChatCompletionParams,
  ): Promise<ChatCompletionPayload> {
    this.logger.debug(
      `Requesting completion from ${params.model} (${params.messages.length} messages)`,
    );

    try {
      const response = await firstValueFrom(
        this.httpService.post<ChatCompletionPayload>(
          this.completionsUrl,
          {
            model: params.model,
            messages: params.messages,
            temperature: params.temperature,
            stream: false,
          },
          {
            headers: {
              Authorization: `Bearer ${this.apiKey}`,
              'Content-Type': 'application/json',
            },
          },
        ),
      );
      return response.data;
    } catch (error) {
      throw new Error(describeOpenAIError(error));
    }
  }
}

/**
 * The API's own error message when OpenAI answered with an error body,
 * otherwise the transport error's message.
 */
export function describeOpenAIError(error: unknown): string {
  if (isAxiosError<OpenAIErrorBody>(error)) {
    const apiMessage = error.response?.data?.error?.message;
    if (apiMessage) {
      return apiMessage;
    }
  }
  return error instanceof Error ? error.message : String(error);
}
