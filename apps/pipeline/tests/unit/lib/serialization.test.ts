import { toJSON } from '../../../src/lib/serialization';

describe('serialization', () => {
    describe('toJSON', () => {
        it('should convert BigInt to string', () => {
            expect(toJSON({ value: 1234567890123456789n })).toEqual({
                value: '1234567890123456789',
            });
        });

        it('should handle nested rows with dates and arrays', () => {
            const input = {
                username: 'alice',
                listenedAt: new Date('2024-03-01T12:00:00Z'),
                windows: [{ days: 14, listenCount: 3 }],
                paths: ['direct', 'indirect'],
            };
            expect(toJSON(input)).toEqual({
                username: 'alice',
                listenedAt: '2024-03-01T12:00:00.000Z',
                windows: [{ days: 14, listenCount: 3 }],
                paths: ['direct', 'indirect'],
            });
        });

        it('should map null and undefined to null and drop undefined keys', () => {
            expect(toJSON(null)).toBeNull();
            expect(toJSON(undefined)).toBeNull();
            expect(toJSON({ a: null, b: undefined })).toEqual({ a: null });
        });

        it('should turn non-finite numbers into null', () => {
            expect(toJSON([1.5, Number.NaN, Number.POSITIVE_INFINITY])).toEqual([1.5, null, null]);
        });

        it('should serialize sets as arrays', () => {
            expect(toJSON(new Set(['b', 'a']))).toEqual(['b', 'a']);
        });

        it('should pass through primitives', () => {
            expect(toJSON('hello')).toBe('hello');
            expect(toJSON(42)).toBe(42);
            expect(toJSON(true)).toBe(true);
        });

        it('should reject class instances it cannot represent', () => {
            expect(() => toJSON(new Map([['a', 1]]))).toThrow('Cannot serialize value of type object');
        });
    });
});
