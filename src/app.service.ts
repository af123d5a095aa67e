import { Injectable } from '@nestjs/common';

export interface HealthStatus {
  message: string;
}

@Injectable()
export class AppService {
  getHealth(): HealthStatus {
    return { message: 'Server is up!' };
  }
}
