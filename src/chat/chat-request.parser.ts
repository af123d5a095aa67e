import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { InvalidInputError } from './chat.errors';
import { ChatRequestDto } from './dto/chat.dto';

export interface ChatRequest {
  question: string;
  model: string;
  systemPrompt?: string;
}

const FIELD_ERRORS: Record<string, string> = {
  question: "Field 'question' is required and must be a non-empty string.",
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an inbound JSON body. Anything but a plain object counts as `{}`.
 */
export function parseChatRequest(body: unknown): ChatRequest {
  const plain: Record<string, unknown> = isPlainObject(body) ? body : {};
  const dto = plainToInstance(ChatRequestDto, plain);
  const [failure] = validateSync(dto);

  if (failure) {
    const constraint = Object.values(failure.constraints ?? {})[0];
    throw new InvalidInputError(
      FIELD_ERRORS[failure.property] ??
        constraint ??
        `Field '${failure.property}' is invalid.`,
    );
  }

  return {
    question: dto.question,
    model: dto.model,
    systemPrompt: dto.system_prompt,
  };
}
