import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { requireEnv } from "../config/env";

let client: SupabaseClient | null = null;

export function getSupabaseClient(): SupabaseClient {
  if (client) return client;
  const url = requireEnv("SUPABASE_URL");
  const key = requireEnv("SUPABASE_SERVICE_ROLE_KEY");
  client = createClient(url, key, {
    auth: { persistSession: false },
  });
  return client;
}
