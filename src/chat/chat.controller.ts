import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Post,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiInternalServerErrorResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { ChatService } from './chat.service';
import {
  ChatErrorResponseDto,
  ChatRequestDto,
  ChatResponseDto,
} from './dto/chat.dto';

@ApiTags('chat')
@Controller('chat')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    operationId: 'chat_create',
    summary: 'Ask chatbot a question',
    description:
      'Accepts a user question, forwards it to OpenAI, and returns the generated answer. No data is persisted.',
  })
  @ApiBody({ type: ChatRequestDto })
  @ApiOkResponse({
    description: 'Answer retrieved successfully.',
    type: ChatResponseDto,
  })
  @ApiBadRequestResponse({
    description: 'Bad Request',
    type: ChatErrorResponseDto,
  })
  @ApiInternalServerErrorResponse({
    description: 'Server error contacting OpenAI',
    type: ChatErrorResponseDto,
  })
  async chat(@Body() body: unknown): Promise<ChatResponseDto> {
    // Body is validated by the service so failures keep the { error } shape
    const result = await this.chatService.handleChat(body);
    if (!result.ok) {
      throw new HttpException(result.body, result.statusCode);
    }
    return result.body;
  }
}
