import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config({ path: process.env.ENV_FILE_PATH || '.env' });

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((val) => val === 'true');

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('5000')
    .transform((val) => parseInt(val, 10)),

  // Frontend (for CORS)
  FRONTEND_URL: z.string().url().optional(),
  // Additional frontend URLs (comma-separated)
  FRONTEND_URLS: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Yahoo Fantasy Sports OAuth app + tokens.
  // Optional at boot: requests fail with YAHOO_AUTH_REQUIRED until configured.
  YAHOO_CLIENT_ID: z.string().optional(),
  YAHOO_CLIENT_SECRET: z.string().optional(),
  YAHOO_ACCESS_TOKEN: z.string().optional(),
  YAHOO_REFRESH_TOKEN: z.string().optional(),
  YAHOO_GUID: z.string().optional(),
  // File that refreshed tokens are written back to
  ENV_FILE_PATH: z.string().default('.env'),

  // Sleeper enrichment feeds (projections, trending, matchups)
  SLEEPER_ENRICHMENT: booleanFlag('true'),
  SLEEPER_SCORING_FORMAT: z.enum(['ppr', 'half_ppr', 'std']).default('half_ppr'),

  // Optimizer output tuning
  RECOMMENDATION_MARGIN: z
    .string()
    .default('2')
    .transform((val) => parseFloat(val))
    .pipe(z.number().nonnegative()),
  BENCH_DISPLAY_LIMIT: z
    .string()
    .default('5')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(0)),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
