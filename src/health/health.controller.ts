import { Controller, Get } from '@nestjs/common';

import { RedisService } from '../redis/redis.service';

@Controller('health')
export class HealthController {
  constructor(private readonly redisService: RedisService) {}

  @Get()
  getHealth(): { status: string } {
    return { status: 'ok' };
  }

  @Get('store')
  async getStoreHealth(): Promise<{ status: string; message?: string }> {
    const result = await this.redisService.checkHealth();
    return { status: result.status, message: result.message };
  }
}
