import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { LlmConfig } from '../config/llm.config';
import {
  ChatCompletionOutput,
  ChatMessage,
  LlmClient,
  LlmClientFactory,
  extractAnswer,
} from '../llm/llm-client';
import { ChatRequest, parseChatRequest } from './chat-request.parser';
import {
  ChatError,
  ConfigurationError,
  EmptyUpstreamResponseError,
  UpstreamCallError,
} from './chat.errors';

export const CHAT_TEMPERATURE = 0.7;

export type ChatHttpResult =
  | { ok: true; statusCode: HttpStatus.OK; body: { answer: string } }
  | { ok: false; statusCode: HttpStatus; body: { error: string } };

/**
 * Optional system message followed by the user's (already trimmed) question.
 */
export function buildChatMessages(
  request: ChatRequest,
  defaultSystemPrompt?: string,
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  const systemPrompt = request.systemPrompt?.trim()
    ? request.systemPrompt
    : defaultSystemPrompt;

  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push({ role: 'user', content: request.question });

  return messages;
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly clientFactory: LlmClientFactory,
    private readonly configService: ConfigService,
  ) {}

  /**
   * One round trip to the LLM. Every failure is reported through the result;
   * nothing is retried.
   */
  async handleChat(rawBody: unknown): Promise<ChatHttpResult> {
    try {
      const request = parseChatRequest(rawBody);
      const client = this.acquireClient();
      const messages = buildChatMessages(
        request,
        this.configService.get<LlmConfig>('llm')?.defaultSystemPrompt,
      );

      const output = await this.complete(client, request.model, messages);
      const answer = extractAnswer(output);
      if (!answer) {
        throw new EmptyUpstreamResponseError(client.provider);
      }

      this.logger.debug(
        `✓ Answer from ${request.model} (${answer.length} chars)`,
      );
      return { ok: true, statusCode: HttpStatus.OK, body: { answer } };
    } catch (error) {
      if (error instanceof ChatError) {
        this.report(error);
        return {
          ok: false,
          statusCode: error.statusCode,
          body: { error: error.message },
        };
      }
      throw error;
    }
  }

  private acquireClient(): LlmClient {
    const availability = this.clientFactory.create();
    if (availability.status === 'unavailable') {
      throw new ConfigurationError(availability.reason, availability.message);
    }
    return availability.client;
  }

  private async complete(
    client: LlmClient,
    model: string,
    messages: ChatMessage[],
  ): Promise<ChatCompletionOutput> {
    try {
      return await client.completeChat({
        model,
        messages,
        temperature: CHAT_TEMPERATURE,
      });
    } catch (error) {
      throw new UpstreamCallError(
        client.provider,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private report(error: ChatError): void {
    if (error.statusCode < HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.warn(`Rejected chat request: ${error.message}`);
    } else {
      this.logger.error(`${error.kind}: ${error.message}`);
    }
  }
}
