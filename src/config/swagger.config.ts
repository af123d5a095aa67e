// swagger configuration file
import { DocumentBuilder } from '@nestjs/swagger';
export const swaggerConfig = new DocumentBuilder()
  .setTitle('Chatbot Backend API')
  .setDescription(
    'Lightweight REST API to proxy questions to OpenAI and return answers.',
  )
  .setVersion('1.0')
  .build();
