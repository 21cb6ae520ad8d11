import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

// Load .env file
dotenvConfig();

const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database
  DATABASE_URL: z.string().min(1),

  // Text generation (Groq)
  GROQ_API_KEY: z.string().min(1),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),

  // Embeddings (OpenAI)
  OPENAI_API_KEY: z.string().min(1),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),

  // Mailbox (Microsoft Graph)
  OUTLOOK_TENANT_ID: z.string().optional().default(''),
  OUTLOOK_CLIENT_ID: z.string().optional().default(''),
  OUTLOOK_CLIENT_SECRET: z.string().optional().default(''),
  OUTLOOK_USER_ID: z.string().default('me'),

  // Knowledge base
  KNOWLEDGE_BASE_PATH: z.string().default('knowledge_base'),
  KNOWLEDGE_SEED_DIR: z.string().optional(),

  // Pipeline policy file (defaults to ./config/pipeline-policy.yaml)
  PIPELINE_POLICY_PATH: z.string().optional(),

  // IANA zone for cron triggers; the process zone when unset
  SCHEDULER_TIMEZONE: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Application
  APP_VERSION: z.string().default('1.0.0'),
  SERVICE_NAME: z.string().default('mailpilot'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment variables');
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

// Partial env for tooling that only needs the database (migrations, drizzle-kit)
const partialEnvSchema = envSchema.partial().required({
  NODE_ENV: true,
  DATABASE_URL: true,
});

export type PartialEnv = z.infer<typeof partialEnvSchema>;

export function getPartialEnv(): PartialEnv {
  const parsed = partialEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment variables');
  }

  return parsed.data;
}

export function clearEnvCache(): void {
  cachedEnv = undefined;
}
