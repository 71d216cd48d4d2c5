import { z } from 'zod';

/**
 * Treat empty strings (e.g. `FTP_HOST=` in a .env file) as unset
 */
const optionalString = z.preprocess(
  (val) => (typeof val === 'string' && val.trim() === '' ? undefined : val),
  z.string().optional()
);

/**
 * Boolean flag that only accepts "true" / "false"
 */
const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  HOST: z.string().default('0.0.0.0'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // CORS (empty list allows every origin)
  CORS_ALLOWED_ORIGINS: z
    .string()
    .default('')
    .transform((val) => val.split(',').map((o) => o.trim()).filter(Boolean)),

  // Generation service
  COMFYUI_HOST: z.string().min(1).default('127.0.0.1:8188'),
  COMFYUI_SECURE: booleanFlag,
  WORKFLOW_TEMPLATE_PATH: z.string().min(1).default('workflows/merge-workflow.json'),
  WORKFLOW_LOAD_IMAGE_NODE_ID: z.string().min(1).default('16'),
  WORKFLOW_SAVE_IMAGE_NODE_ID: z.string().min(1).default('35'),
  OUTPUT_PREFIX: z.string().min(1).default('merged_output'),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(300000), // 5 minutes

  // Local storage
  MERGED_IMAGES_DIR: z.string().min(1).default('merged_images'),
  FINAL_IMAGES_DIR: z.string().min(1).default('final_images'),
  UPLOAD_MAX_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),

  // Background removal
  STABILITY_API_KEY: optionalString,
  STABILITY_API_BASE: z.string().url().default('https://api.stability.ai'),

  // Publishing
  FTP_HOST: optionalString,
  FTP_PORT: z.coerce.number().int().positive().default(21),
  FTP_USER: optionalString,
  FTP_PASS: optionalString,
  FTP_TARGET_DIR: optionalString,
  FTP_SECURE: booleanFlag,
  FTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  BASE_PUBLIC_URL: optionalString,
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (parses on first use)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
