/**
 * Provider-neutral chat completion contract consumed by the chat handler.
 */
export type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionParams {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

/**
 * Completion payloads differ between providers and client versions: an
 * OpenAI-style `choices` array, a message object with `content`, or plain text.
 */
export interface ChatCompletionPayload {
  choices?: Array<{ message?: { content?: string | null } | null }>;
  content?: string | null;
}

export type ChatCompletionOutput = ChatCompletionPayload | string | null;

export interface LlmClient {
  /** Display name used in error messages, e.g. "OpenAI" */
  readonly provider: string;
  completeChat(params: ChatCompletionParams): Promise<ChatCompletionOutput>;
}

export type ClientUnavailableReason =
  | 'missing-credential'
  | 'library-unavailable'
  | 'init-failed';

export type ClientAvailability =
  | { status: 'available'; client: LlmClient }
  | { status: 'unavailable'; reason: ClientUnavailableReason; message: string };

/**
 * Builds a configured client per request. Injection token for the chat module.
 */
export abstract class LlmClientFactory {
  abstract create(): ClientAvailability;
}

/**
 * Pull the first generated text out of a completion. Structured fields win;
 * a plain string output is used as-is.
 */
export function extractAnswer(
  output: ChatCompletionOutput | undefined,
): string | undefined {
  if (output == null) {
    return undefined;
  }
  if (typeof output === 'string') {
    return output || undefined;
  }

  // Payloads come off the wire; only string content counts
  const candidates: unknown[] = [
    output.choices?.[0]?.message?.content,
    output.content,
  ];
  return candidates.find(
    (content): content is string =>
      typeof content === 'string' && content.length > 0,
  );
}
