import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

export class ChatRequestDto {
  @ApiProperty({
    description: "The user's question to send to the chatbot.",
    example: 'What is the capital of France?',
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  question!: string;

  @ApiPropertyOptional({
    description: `Optional OpenAI model to use. Defaults to '${DEFAULT_CHAT_MODEL}' if not provided.`,
    example: DEFAULT_CHAT_MODEL,
  })
  @Transform(({ value }) =>
    typeof value === 'string' && value.trim()
      ? value.trim()
      : DEFAULT_CHAT_MODEL,
  )
  @IsString()
  model: string = DEFAULT_CHAT_MODEL;

  @ApiPropertyOptional({
    description: 'Optional system prompt to steer assistant behavior.',
    example: 'You are a concise assistant.',
  })
  @Transform(({ value }) => (typeof value === 'string' ? value : undefined))
  @IsOptional()
  @IsString()
  system_prompt?: string;
}

export class ChatResponseDto {
  @ApiProperty({ description: "Assistant's answer" })
  answer!: string;
}

export class ChatErrorResponseDto {
  @ApiProperty({ example: 'Empty response from OpenAI.' })
  error!: string;
}
