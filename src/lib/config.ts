// src/lib/config.ts
import { z } from 'zod';

const EnvSchema = z.object({
  NEXT_PUBLIC_SUPABASE_URL: z.string().trim().url('NEXT_PUBLIC_SUPABASE_URL must be a URL'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().trim().optional(),
  NEXT_PUBLIC_SUPABASE_ANON_KEY: z.string().trim().optional(),
  ALIAS_LISTING_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
  ALIAS_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
});

export type AppConfig = {
  supabaseUrl: string;
  supabaseKey: string;
  listingTtlMs: number;
  pageSize: number;
};

/**
 * Read Supabase credentials and alias-admin tuning from the environment.
 * Service role key wins over the anon key, same as the API routes expect.
 * Throws when the URL or both keys are missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  const supabaseKey = e.SUPABASE_SERVICE_ROLE_KEY || e.NEXT_PUBLIC_SUPABASE_ANON_KEY || '';
  if (!supabaseKey) {
    throw new Error(
      'Supabase env missing: set NEXT_PUBLIC_SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY',
    );
  }

  return {
    supabaseUrl: e.NEXT_PUBLIC_SUPABASE_URL,
    supabaseKey,
    listingTtlMs: e.ALIAS_LISTING_TTL_MS,
    pageSize: e.ALIAS_PAGE_SIZE,
  };
}
