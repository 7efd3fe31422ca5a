import { Injectable } from '@nestjs/common';
import { RedisService } from './redis.service';

@Injectable()
export class RedisHealthIndicator {
  constructor(private readonly redis: RedisService) {}

  async check(): Promise<{
    redis: { status: 'up' | 'down'; mode: string; fallbackKeys: number };
  }> {
    const isHealthy = await this.redis.isHealthy();
    const { mode, fallbackKeys } = this.redis.getStatus();

    return {
      redis: {
        status: isHealthy ? 'up' : 'down',
        mode,
        fallbackKeys,
      },
    };
  }
}
