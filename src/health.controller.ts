import { Controller, Get } from '@nestjs/common';
import { RedisHealthIndicator } from './redis';

@Controller('health')
export class HealthController {
  constructor(private readonly redisHealth: RedisHealthIndicator) {}

  @Get()
  async check() {
    const { redis } = await this.redisHealth.check();
    return {
      status: redis.status === 'up' ? 'ok' : 'degraded',
      redis,
    };
  }
}
