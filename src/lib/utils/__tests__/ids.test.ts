import { describe, it, expect } from 'vitest';
import { generateId, isValidUUIDv7 } from '../ids';

describe('generateId', () => {
    it('should produce distinct UUIDv7 values', () => {
        const first = generateId();
        const second = generateId();

        expect(isValidUUIDv7(first)).toBe(true);
        expect(first).not.toBe(second);
    });
});

describe('isValidUUIDv7', () => {
    it('should reject other UUID versions and malformed ids', () => {
        expect(isValidUUIDv7('123e4567-e89b-42d3-a456-426614174000')).toBe(false);
        expect(isValidUUIDv7('not-a-uuid')).toBe(false);
    });
});
