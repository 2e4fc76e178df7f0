// app/config/supabase-config.ts
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigurationError } from "@/lib/education/errors";

function getEnv() {
  const url = process.env.SUPABASE_URL;
  const serviceKey = process.env.SUPABASE_SERVICE_ROLE_KEY;
  return { url, serviceKey };
}

/**
 * We DO NOT throw at module import time.
 * Next may import this during prerender/build.
 *
 * The client is created lazily and we throw only if someone actually
 * tries to use it without env vars configured.
 */
let _client: SupabaseClient | null = null;

function createSupabaseClient(): SupabaseClient {
  const { url, serviceKey } = getEnv();

  if (!url || !serviceKey) {
    throw new ConfigurationError(
      "Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY. " +
        "The warehouse RPC runs server-side only and needs the service role key."
    );
  }

  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export function getSupabase(): SupabaseClient {
  if (!_client) _client = createSupabaseClient();
  return _client;
}
