/**
 * ID Generation
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every persisted record gets a fresh UUID at creation time.
 *
 * RULES:
 * 1. NEVER reuse IDs across records
 * 2. NEVER derive IDs from symbols, strikes or other static values
 * 3. Each call MUST return a brand new ID
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

/** Fresh UUID for a trade, order, fill or session row. */
export function generateRecordId(): string {
    return uuidv4();
}

