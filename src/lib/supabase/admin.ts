import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { AppError } from '@/src/lib/errors/app-error';

/**
 * Supabase admin client (service role) for the ingest CLI.
 * Bypasses row level security; never hand it to untrusted callers.
 */
export function createAdminClient(
  env: Record<string, string | undefined> = process.env,
): SupabaseClient {
  const url = env.NEXT_PUBLIC_SUPABASE_URL?.trim();
  const key = env.SUPABASE_SERVICE_ROLE_KEY?.trim();

  if (!url || !key) {
    throw new AppError(
      'CONFIG_INVALID',
      'SUPABASE_SERVICE_ROLE_KEY (and NEXT_PUBLIC_SUPABASE_URL) must be set for admin client',
    );
  }

  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
