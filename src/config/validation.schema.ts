import { tmpdir } from 'os';
import { z } from 'zod';
import { ConfigError } from '../domain/errors';

const required = () => z.string().trim().min(1, 'Required');
const optional = () => z.string().trim().optional();

export const ASSET_STORE_PROVIDERS = ['cloudinary', 's3'] as const;
export type AssetStoreProvider = (typeof ASSET_STORE_PROVIDERS)[number];

type ProviderSetting =
  | 'CLOUDINARY_CLOUD_NAME'
  | 'CLOUDINARY_API_KEY'
  | 'CLOUDINARY_API_SECRET'
  | 'S3_BUCKET_NAME';

// Settings only the selected asset store needs
const PROVIDER_SETTINGS: Record<AssetStoreProvider, readonly ProviderSetting[]> = {
  cloudinary: ['CLOUDINARY_CLOUD_NAME', 'CLOUDINARY_API_KEY', 'CLOUDINARY_API_SECRET'],
  s3: ['S3_BUCKET_NAME'],
};

const envObjectSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Workfront REST API
  WORKFRONT_BASE_URL: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  WORKFRONT_API_KEY: required(),
  WORKFRONT_API_VERSION: z.string().default('v19.0'),

  // Workfront OAuth (JWT exchange)
  WORKFRONT_BASE: required(),
  WORKFRONT_CLIENT_ID: required(),
  WORKFRONT_CLIENT_SECRET: required(),
  WORKFRONT_CUSTOMER_ID: required(),
  WORKFRONT_USER_ID: required(),
  // Keys pasted into a .env file usually carry literal "\n" sequences
  WORKFRONT_PRIVATE_KEY: required().transform((key) => key.replace(/\\n/g, '\n')),
  WORKFRONT_JWT_TTL_SECONDS: z.coerce.number().int().min(1).max(3600).default(180),
  WORKFRONT_AUTH_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // Asset store
  ASSET_STORE: z.enum(ASSET_STORE_PROVIDERS).default('cloudinary'),
  ASSET_FOLDER: optional(),

  // Cloudinary
  CLOUDINARY_CLOUD_NAME: optional(),
  CLOUDINARY_API_KEY: optional(),
  CLOUDINARY_API_SECRET: optional(),
  CLOUDINARY_ASSET_FOLDER: optional(),

  // S3
  S3_BUCKET_NAME: optional(),
  ASSET_PUBLIC_BASE_URL: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .optional(),

  // Task status codes
  TASK_STATUS_UPLOAD: required().default('UPL'),
  TASK_COMPLETE: required().default('CPL'),
  TASK_ERROR: required().default('ERR'),

  // Run
  MAX_TASKS_PER_RUN: z.coerce.number().int().min(1).default(100),
  TEMP_DIR: z.string().min(1).default(tmpdir()),
});

export const envSchema = envObjectSchema.superRefine((env, ctx) => {
  for (const key of PROVIDER_SETTINGS[env.ASSET_STORE]) {
    if (!env[key]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `Required when ASSET_STORE is ${env.ASSET_STORE}`,
      });
    }
  }

  if (env.TASK_COMPLETE === env.TASK_ERROR) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TASK_ERROR'],
      message: 'TASK_COMPLETE and TASK_ERROR must differ',
    });
  }
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(
      `Environment validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      issues,
    );
  }

  return result.data;
}
