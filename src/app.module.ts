import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { validateEnv } from './config/env.validation';
import { HealthController } from './health.controller';
import { CommonModule } from './common/common.module';
import { RedisModule } from './redis';
import { BotModule } from './bot/bot.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    RedisModule,
    CommonModule,
    BotModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
