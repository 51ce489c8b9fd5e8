/**
 * Supabase Client - database client factory
 *
 * Uses SUPABASE_SERVICE_ROLE_KEY for full database access.
 * Returns null when Supabase is not configured; callers fall back to the
 * in-memory store.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { SupabaseConfig } from '../config/botConfig';
import logger from '../utils/logger';

// Validate URL format
const isValidUrl = (url: string): boolean => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

export function createSupabaseClient(config: SupabaseConfig | null): SupabaseClient | null {
    if (!config) {
        return null;
    }
    if (!isValidUrl(config.url)) {
        logger.error(`[SUPABASE] Invalid SUPABASE_URL "${config.url}"`);
        return null;
    }
    return createClient(config.url, config.serviceRoleKey, {
        auth: { persistSession: false },
    });
}
