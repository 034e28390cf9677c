import { z } from 'zod';
import { config } from 'dotenv';
import fs from 'fs';
import { CredentialMissingError } from '@/shared/errors.js';

// Load environment variables based on NODE_ENV
const nodeEnv = process.env.NODE_ENV || 'development';

if (nodeEnv === 'production') {
  if (fs.existsSync('.env.production')) {
    config({ path: '.env.production' });
  }
} else if (nodeEnv === 'development') {
  if (fs.existsSync('.env.local')) {
    config({ path: '.env.local' });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
} else {
  if (fs.existsSync(`.env.${nodeEnv}`)) {
    config({ path: `.env.${nodeEnv}` });
  }
  if (fs.existsSync('.env')) {
    config({ path: '.env' });
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).optional().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional().default('info'),

  // Credentials are optional here; resolveCredentials() decides what a run needs
  GEMINI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,

  GEMINI_TEXT_MODEL: z.string().optional().default('gemini-2.5-pro'),

  IMAGE_PROVIDER: z.enum(['openai', 'none']).optional().default('openai'),
  OPENAI_IMAGE_MODEL: z.string().optional().default('gpt-image-1'),
  OPENAI_IMAGE_QUALITY: optionalString,
  OPENAI_IMAGE_STYLE: optionalString,
  OPENAI_IMAGE_OUTPUT_FORMAT: z
    .enum(['png', 'jpeg', 'webp'])
    .optional(),
  OPENAI_IMAGE_OUTPUT_COMPRESSION: z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return undefined;
      const n = Number(v);
      if (!Number.isInteger(n) || n < 0 || n > 100) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'OPENAI_IMAGE_OUTPUT_COMPRESSION must be an integer between 0 and 100',
        });
        return z.NEVER;
      }
      return n;
    }),
  IMAGE_SIZE: z.string().optional().default('1536x1024'),

  STORY_CONFIG_PATH: z.string().optional().default('story_config.json'),
  OUTPUT_DIR: z.string().optional().default('./output'),
});

export type Environment = z.infer<typeof envSchema>;

export interface Credentials {
  geminiApiKey: string;
  openaiApiKey?: string;
}

let cachedEnv: Environment | null = null;

export function parseEnvironment(source: Record<string, string | undefined>): Environment {
  return envSchema.parse(source);
}

export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = parseEnvironment(process.env);
    return cachedEnv;
  } catch (error) {
    console.error('Environment validation failed:', error);
    throw error;
  }
}

/**
 * Collects the API keys a run needs. The Gemini key is always required,
 * the OpenAI key only when images are generated through OpenAI.
 */
export function resolveCredentials(env: Environment): Credentials {
  const missing: string[] = [];
  if (!env.GEMINI_API_KEY) missing.push('GEMINI_API_KEY');
  if (env.IMAGE_PROVIDER === 'openai' && !env.OPENAI_API_KEY) missing.push('OPENAI_API_KEY');

  if (missing.length > 0 || !env.GEMINI_API_KEY) {
    throw new CredentialMissingError(missing);
  }

  return {
    geminiApiKey: env.GEMINI_API_KEY,
    ...(env.OPENAI_API_KEY && { openaiApiKey: env.OPENAI_API_KEY }),
  };
}
