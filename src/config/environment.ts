import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidationError,
  validateSync,
} from 'class-validator';

export const BACKOFF_STRATEGIES = ['fixed', 'exponential'] as const;
export type BackoffStrategy = (typeof BACKOFF_STRATEGIES)[number];

const HTTP_URL_OPTIONS = {
  protocols: ['http', 'https'],
  require_protocol: true,
  require_tld: false,
};

/**
 * Settings the worker reads once at startup.
 *
 * @remarks
 * Values are parsed from `process.env` (and `.env` when present) by
 * {@link validateEnvironment}. Services read them through the typed
 * `ConfigService<EnvironmentVariables, true>`.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  REDIS_HOST = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  REDIS_PORT = 6379;

  @IsInt()
  @Min(0)
  REDIS_DB = 0;

  @IsOptional()
  @IsString()
  REDIS_PASSWORD?: string;

  @IsString()
  @IsNotEmpty()
  QUEUE_NAME = 'processing_queue';

  /** Seconds a single BLPOP may block before the loop wakes up. */
  @IsInt()
  @Min(1)
  QUEUE_POP_TIMEOUT = 30;

  @IsUrl(HTTP_URL_OPTIONS)
  DETAIL_VIEW_API = 'http://localhost:8000/api/detail';

  /** Seconds; the detail API can take around 40s on its side. */
  @IsInt()
  @Min(1)
  API_TIMEOUT = 45;

  @IsString()
  @IsNotEmpty()
  S3_ACCESS_KEY = '';

  @IsString()
  @IsNotEmpty()
  S3_SECRET_KEY = '';

  @IsNotEmpty()
  @IsUrl(HTTP_URL_OPTIONS)
  S3_ENDPOINT_URL = '';

  @IsString()
  @IsNotEmpty()
  S3_BUCKET_NAME = '';

  @IsString()
  @IsNotEmpty()
  S3_REGION = 'us-east-1';

  // MinIO and LocalStack need path-style addressing
  @IsBoolean()
  S3_FORCE_PATH_STYLE = true;

  @IsInt()
  @Min(0)
  RECONNECT_BACKOFF_MS = 5000;

  @IsIn(BACKOFF_STRATEGIES)
  RECONNECT_BACKOFF_STRATEGY: BackoffStrategy = 'fixed';

  @IsInt()
  @Min(0)
  RECONNECT_MAX_BACKOFF_MS = 60000;

  @IsInt()
  @Min(0)
  ERROR_DELAY_MS = 1000;
}

export const REQUIRED_VARIABLES = [
  'S3_ACCESS_KEY',
  'S3_SECRET_KEY',
  'S3_ENDPOINT_URL',
  'S3_BUCKET_NAME',
] as const;

const readString = (
  config: Record<string, unknown>,
  name: string,
): string | undefined => {
  const raw = config[name];
  if (raw == null) return undefined;
  const value = String(raw).trim();
  return value === '' ? undefined : value;
};

// Unparseable input is kept as NaN so @IsInt reports it with the variable name.
const readInteger = (
  config: Record<string, unknown>,
  name: string,
): number | undefined => {
  const raw = readString(config, name);
  return raw === undefined ? undefined : Number(raw);
};

const readBoolean = (
  config: Record<string, unknown>,
  name: string,
  problems: string[],
): boolean | undefined => {
  const raw = readString(config, name);
  if (raw === undefined) return undefined;

  const normalized = raw.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  problems.push(`${name} (must be one of true, false, 1, 0)`);
  return undefined;
};

const isBackoffStrategy = (value: string): value is BackoffStrategy =>
  BACKOFF_STRATEGIES.some((strategy) => strategy === value);

const readBackoffStrategy = (
  config: Record<string, unknown>,
  name: string,
  problems: string[],
): BackoffStrategy | undefined => {
  const raw = readString(config, name);
  if (raw === undefined) return undefined;
  if (isBackoffStrategy(raw)) return raw;
  problems.push(`${name} (must be one of ${BACKOFF_STRATEGIES.join(', ')})`);
  return undefined;
};

const isRequiredVariable = (property: string): boolean =>
  REQUIRED_VARIABLES.some((name) => name === property);

const describeError = (error: ValidationError): string => {
  const constraints = Object.values(error.constraints ?? {});
  return `${error.property} (${constraints.join('; ')})`;
};

/**
 * `validate` hook for `ConfigModule.forRoot`.
 *
 * @throws Error listing every missing required S3 setting, or every invalid one
 */
export const validateEnvironment = (
  config: Record<string, unknown>,
): EnvironmentVariables => {
  const env = new EnvironmentVariables();
  const problems: string[] = [];

  env.REDIS_HOST = readString(config, 'REDIS_HOST') ?? env.REDIS_HOST;
  env.REDIS_PORT = readInteger(config, 'REDIS_PORT') ?? env.REDIS_PORT;
  env.REDIS_DB = readInteger(config, 'REDIS_DB') ?? env.REDIS_DB;
  const password = readString(config, 'REDIS_PASSWORD');
  if (password !== undefined) env.REDIS_PASSWORD = password;

  env.QUEUE_NAME = readString(config, 'QUEUE_NAME') ?? env.QUEUE_NAME;
  env.QUEUE_POP_TIMEOUT =
    readInteger(config, 'QUEUE_POP_TIMEOUT') ?? env.QUEUE_POP_TIMEOUT;
  env.DETAIL_VIEW_API =
    readString(config, 'DETAIL_VIEW_API') ?? env.DETAIL_VIEW_API;
  env.API_TIMEOUT = readInteger(config, 'API_TIMEOUT') ?? env.API_TIMEOUT;

  env.S3_ACCESS_KEY = readString(config, 'S3_ACCESS_KEY') ?? '';
  env.S3_SECRET_KEY = readString(config, 'S3_SECRET_KEY') ?? '';
  env.S3_ENDPOINT_URL = readString(config, 'S3_ENDPOINT_URL') ?? '';
  env.S3_BUCKET_NAME = readString(config, 'S3_BUCKET_NAME') ?? '';
  env.S3_REGION = readString(config, 'S3_REGION') ?? env.S3_REGION;
  env.S3_FORCE_PATH_STYLE =
    readBoolean(config, 'S3_FORCE_PATH_STYLE', problems) ??
    env.S3_FORCE_PATH_STYLE;

  env.RECONNECT_BACKOFF_MS =
    readInteger(config, 'RECONNECT_BACKOFF_MS') ?? env.RECONNECT_BACKOFF_MS;
  env.RECONNECT_BACKOFF_STRATEGY =
    readBackoffStrategy(config, 'RECONNECT_BACKOFF_STRATEGY', problems) ??
    env.RECONNECT_BACKOFF_STRATEGY;
  env.RECONNECT_MAX_BACKOFF_MS =
    readInteger(config, 'RECONNECT_MAX_BACKOFF_MS') ??
    env.RECONNECT_MAX_BACKOFF_MS;
  env.ERROR_DELAY_MS =
    readInteger(config, 'ERROR_DELAY_MS') ?? env.ERROR_DELAY_MS;

  const errors = validateSync(env);

  const missing = REQUIRED_VARIABLES.filter((name) =>
    errors.some(
      (error) =>
        error.property === name && error.constraints?.isNotEmpty !== undefined,
    ),
  );
  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}`,
    );
  }

  const invalid = errors.filter(
    (error) =>
      !isRequiredVariable(error.property) ||
      error.constraints?.isNotEmpty === undefined,
  );
  problems.push(...invalid.map(describeError));
  if (problems.length > 0) {
    throw new Error(`Invalid environment variables: ${problems.join(', ')}`);
  }

  return Object.freeze(env);
};
