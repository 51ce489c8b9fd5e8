/**
 * ID Generation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Validates that record IDs are always fresh UUIDs and never reused.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { generateRecordId } from '../src/utils/id';

describe('ID Generation', () => {
    describe('generateRecordId', () => {
        test('always returns unique values', () => {
            const a = generateRecordId();
            const b = generateRecordId();
            expect(a).not.toBe(b);
        });

        test('returns a v4 UUID', () => {
            expect(generateRecordId()).toMatch(
                /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i
            );
        });

        test('generates unique values across many calls', () => {
            const ids = new Set<string>();
            const count = 1000;

            for (let i = 0; i < count; i++) {
                ids.add(generateRecordId());
            }

            expect(ids.size).toBe(count);
        });
    });
});
