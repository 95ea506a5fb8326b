/**
 * Application Configuration
 *
 * Loads the environment once at startup, validates it with the Zod schema in
 * `validation.schema.ts` and shapes it into the typed {@link AppConfig} that
 * every component reads through `ConfigService<AppConfig, true>`.
 *
 * ```typescript
 * constructor(private readonly configService: ConfigService<AppConfig, true>) {}
 *
 * const { statusCodes } = this.configService.get('workflow', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig, AssetStoreProvider } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  workfront: {
    baseUrl: string;
    apiKey: string;
    apiVersion: string;
  };
  /**
   * Identity used to obtain the session credential that authorizes document
   * downloads. The customer id signs as issuer and the user id as subject of
   * the JWT assertion.
   */
  auth: {
    instance: string;
    clientId: string;
    clientSecret: string;
    issuer: string;
    subject: string;
    privateKey: string;
    tokenTtlSeconds: number;
    timeoutMs: number;
  };
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  /**
   * Only the selected provider's settings are guaranteed; the other block
   * holds empty strings.
   */
  assets: {
    provider: AssetStoreProvider;
    folder: string;
    cloudinary: {
      cloudName: string;
      apiKey: string;
      apiSecret: string;
    };
    s3: {
      bucketName: string;
      publicBaseUrl?: string;
    };
  };
  workflow: {
    statusCodes: {
      ready: string;
      complete: string;
      error: string;
    };
    maxTasksPerRun: number;
    tempDir: string;
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    workfront: {
      baseUrl: env.WORKFRONT_BASE_URL,
      apiKey: env.WORKFRONT_API_KEY,
      apiVersion: env.WORKFRONT_API_VERSION,
    },
    auth: {
      instance: env.WORKFRONT_BASE,
      clientId: env.WORKFRONT_CLIENT_ID,
      clientSecret: env.WORKFRONT_CLIENT_SECRET,
      issuer: env.WORKFRONT_CUSTOMER_ID,
      subject: env.WORKFRONT_USER_ID,
      privateKey: env.WORKFRONT_PRIVATE_KEY,
      tokenTtlSeconds: env.WORKFRONT_JWT_TTL_SECONDS,
      timeoutMs: env.WORKFRONT_AUTH_TIMEOUT_MS,
    },
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    assets: {
      provider: env.ASSET_STORE,
      folder: env.ASSET_FOLDER ?? env.CLOUDINARY_ASSET_FOLDER ?? 'workfront',
      cloudinary: {
        cloudName: env.CLOUDINARY_CLOUD_NAME ?? '',
        apiKey: env.CLOUDINARY_API_KEY ?? '',
        apiSecret: env.CLOUDINARY_API_SECRET ?? '',
      },
      s3: {
        bucketName: env.S3_BUCKET_NAME ?? '',
        publicBaseUrl: env.ASSET_PUBLIC_BASE_URL,
      },
    },
    workflow: {
      statusCodes: {
        ready: env.TASK_STATUS_UPLOAD,
        complete: env.TASK_COMPLETE,
        error: env.TASK_ERROR,
      },
      maxTasksPerRun: env.MAX_TASKS_PER_RUN,
      tempDir: env.TEMP_DIR,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
