import { Controller, Get } from '@nestjs/common';

interface HealthResponse {
  status: string;
  timestamp: string;
  uptime: number;
  service: string;
}

@Controller('health')
export class HealthController {
  @Get()
  check(): HealthResponse {
    // Liveness only; does not touch MongoDB or the AI backend
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: process.env.APP_NAME || 'resume-tailor',
    };
  }
}
