import { SupabaseClient } from '@supabase/supabase-js';
import { SqliteTradeStore } from '../integrations/persistence/sqliteTradeStore';
import { SupabaseTradeStore } from '../integrations/persistence/supabaseTradeStore';
import { Clock, systemClock } from '../utils/clock';
import logger from '../utils/logger';
import { MemoryTradeStore } from './memoryTradeStore';
import { TradeStore } from './tradeStore';

export const IN_MEMORY_DB_PATH = ':memory:';

/**
 * Supabase when a client is available, otherwise the SQLite file at dbPath.
 * DB_PATH=:memory: selects a store whose contents die with the process.
 *
 * @throws StoreError when the SQLite file cannot be opened
 */
export function createTradeStore(
    client: SupabaseClient | null,
    dbPath: string,
    clock: Clock = systemClock
): TradeStore {
    if (client) {
        return new SupabaseTradeStore(client, clock);
    }
    if (dbPath === IN_MEMORY_DB_PATH) {
        logger.warn('[DB] DB_PATH=:memory: - records will not survive restart');
        return new MemoryTradeStore(clock);
    }
    return new SqliteTradeStore(dbPath, clock);
}
