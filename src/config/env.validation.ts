import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Defaults shared by the validated config and by services that read
 * ConfigService directly.
 */
export const ENV_DEFAULTS = {
  GEMINI_MODEL: 'gemini-1.5-flash',
  GEMINI_FALLBACK_MODELS: 'gemini-1.5-pro',
  GEMINI_BASE_URL: 'https://generativelanguage.googleapis.com',
  SUMMARY_TIMEOUT_MS: 30_000,
  SUMMARY_MAX_ATTEMPTS: 2,
  SUMMARY_RETRY_DELAY_MS: 500,
  MAX_SUMMARY_COUNT: 10_000,
  MAX_WINDOW_HOURS: 24 * 365,
  MAX_PROMPT_CHARS: 200_000,
  MESSAGE_RETENTION_MAX_PER_CHAT: 10_000,
  MESSAGE_RETENTION_HOURS: 0,
  PORT: 3000,
} as const;

export type MessageStoreKind = 'memory' | 'redis';

export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

/** `.env` files often carry `KEY=` for unused optional settings. */
const EmptyAsUndefined = () =>
  Transform(({ value }) => (value === '' ? undefined : value));

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  TELEGRAM_BOT_TOKEN!: string;

  @IsString()
  @IsNotEmpty()
  GOOGLE_API_KEY!: string;

  @EmptyAsUndefined()
  @IsOptional()
  @IsString()
  TELEGRAM_WEBHOOK_SECRET?: string;

  @EmptyAsUndefined()
  @IsOptional()
  @IsUrl({ protocols: ['https'], require_tld: false })
  TELEGRAM_WEBHOOK_URL?: string;

  @EmptyAsUndefined()
  @IsOptional()
  @IsString()
  TELEGRAM_BOT_USERNAME?: string;

  @IsString()
  @IsNotEmpty()
  GEMINI_MODEL: string = ENV_DEFAULTS.GEMINI_MODEL;

  @IsString()
  GEMINI_FALLBACK_MODELS: string = ENV_DEFAULTS.GEMINI_FALLBACK_MODELS;

  @IsUrl({ require_tld: false })
  GEMINI_BASE_URL: string = ENV_DEFAULTS.GEMINI_BASE_URL;

  @IsInt()
  @Min(1000)
  SUMMARY_TIMEOUT_MS: number = ENV_DEFAULTS.SUMMARY_TIMEOUT_MS;

  @IsInt()
  @Min(1)
  @Max(3)
  SUMMARY_MAX_ATTEMPTS: number = ENV_DEFAULTS.SUMMARY_MAX_ATTEMPTS;

  @IsInt()
  @Min(0)
  SUMMARY_RETRY_DELAY_MS: number = ENV_DEFAULTS.SUMMARY_RETRY_DELAY_MS;

  @IsInt()
  @Min(1)
  MAX_SUMMARY_COUNT: number = ENV_DEFAULTS.MAX_SUMMARY_COUNT;

  @IsInt()
  @Min(1)
  MAX_WINDOW_HOURS: number = ENV_DEFAULTS.MAX_WINDOW_HOURS;

  @IsInt()
  @Min(1000)
  MAX_PROMPT_CHARS: number = ENV_DEFAULTS.MAX_PROMPT_CHARS;

  @EmptyAsUndefined()
  @IsOptional()
  @IsIn(['memory', 'redis'])
  MESSAGE_STORE?: MessageStoreKind;

  @IsInt()
  @Min(0)
  MESSAGE_RETENTION_MAX_PER_CHAT: number =
    ENV_DEFAULTS.MESSAGE_RETENTION_MAX_PER_CHAT;

  @IsInt()
  @Min(0)
  MESSAGE_RETENTION_HOURS: number = ENV_DEFAULTS.MESSAGE_RETENTION_HOURS;

  @EmptyAsUndefined()
  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @EmptyAsUndefined()
  @IsOptional()
  @IsBooleanString()
  MULTI_INSTANCE?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = ENV_DEFAULTS.PORT;
}

/**
 * ConfigModule `validate` hook. Runs once while the application is created,
 * so a missing secret stops the process before it serves anything.
 */
export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new ConfigurationError(
      errors.map(
        (e) =>
          `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`,
      ),
    );
  }

  return validated;
}
