import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { LlmClientFactory } from './llm-client';
import { OpenAIClientFactory } from './openai-client.factory';

@Module({
  imports: [
    // No timeout: calls run until axios settles them
    HttpModule.register({
      maxRedirects: 5,
    }),
  ],
  providers: [{ provide: LlmClientFactory, useClass: OpenAIClientFactory }],
  exports: [LlmClientFactory],
})
export class LlmModule {}
