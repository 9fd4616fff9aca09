import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

// Load .env when running locally; deployments supply env vars directly
loadEnv()

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().default(8080),

  // Document store: SQLite file path (or :memory:) plus the collection holding accounts
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH is required'),
  ACCOUNTS_COLLECTION: z
    .string({ required_error: 'ACCOUNTS_COLLECTION is required' })
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'ACCOUNTS_COLLECTION must be a plain identifier'),
  SQLITE_MIGRATIONS_DIR: z.string().optional(),

  SESSION_TTL_DAYS: z.coerce.number().positive().int().default(30),
  COOKIE_DOMAIN: z.string().optional(),
  CORS_ALLOWED_ORIGINS: z.string().optional(),

  // Hosted inference provider (OpenAI-compatible chat completions)
  INFERENCE_API_TOKEN: z.string({ required_error: 'INFERENCE_API_TOKEN is required' }).min(1, 'INFERENCE_API_TOKEN is required'),
  INFERENCE_BASE_URL: z.string().url().default('https://router.huggingface.co'),
  INFERENCE_MODEL: z.string().min(1).default('meta-llama/Meta-Llama-3-8B-Instruct'),
})

export type Env = z.infer<typeof EnvSchema>

export const env: Env = EnvSchema.parse(process.env)
