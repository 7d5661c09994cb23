import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CORS_TEST_MESSAGE, ConnectionCheckResult, HealthService } from './health.service';

@ApiTags('health')
@Controller()
export class HealthController {
  constructor(private readonly health: HealthService) {}

  @Get('check-connection')
  checkConnection(): Promise<ConnectionCheckResult> {
    return this.health.checkConnection();
  }

  // served outside the /api prefix, see setupApp
  @Get('test-cors')
  testCors(): { message: string } {
    return { message: CORS_TEST_MESSAGE };
  }
}
