import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    env: 'development' | 'production' | 'test';
  };
  cors: {
    allowedOrigins: string[];
  };
  generation: {
    host: string;
    secure: boolean;
    workflowTemplatePath: string;
    loadImageNodeId: string;
    saveImageNodeId: string;
    outputPrefix: string;
    completionTimeoutMs: number;
  };
  storage: {
    mergedImagesDir: string;
    finalImagesDir: string;
  };
  upload: {
    maxFileSizeBytes: number;
  };
  apis: {
    stability?: string;
    stabilityBase: string;
  };
  ftp: {
    host?: string;
    port: number;
    user?: string;
    password?: string;
    targetDir?: string;
    secure: boolean;
    timeoutMs: number;
  };
  publicBaseUrl?: string;
  logging: {
    level: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      env: env.NODE_ENV,
    },
    cors: {
      allowedOrigins: env.CORS_ALLOWED_ORIGINS,
    },
    generation: {
      host: env.COMFYUI_HOST,
      secure: env.COMFYUI_SECURE,
      workflowTemplatePath: env.WORKFLOW_TEMPLATE_PATH,
      loadImageNodeId: env.WORKFLOW_LOAD_IMAGE_NODE_ID,
      saveImageNodeId: env.WORKFLOW_SAVE_IMAGE_NODE_ID,
      outputPrefix: env.OUTPUT_PREFIX,
      completionTimeoutMs: env.COMPLETION_TIMEOUT_MS,
    },
    storage: {
      mergedImagesDir: env.MERGED_IMAGES_DIR,
      finalImagesDir: env.FINAL_IMAGES_DIR,
    },
    upload: {
      maxFileSizeBytes: env.UPLOAD_MAX_FILE_SIZE_BYTES,
    },
    apis: {
      stability: env.STABILITY_API_KEY,
      stabilityBase: env.STABILITY_API_BASE,
    },
    ftp: {
      host: env.FTP_HOST,
      port: env.FTP_PORT,
      user: env.FTP_USER,
      password: env.FTP_PASS,
      targetDir: env.FTP_TARGET_DIR,
      secure: env.FTP_SECURE,
      timeoutMs: env.FTP_TIMEOUT_MS,
    },
    publicBaseUrl: env.BASE_PUBLIC_URL,
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
