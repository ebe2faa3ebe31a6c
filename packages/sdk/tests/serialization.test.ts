import { serialize, deserialize, parseJsonObject, SerializationError } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should keep dates and maps through serialize/deserialize', () => {
        const startedAt = new Date('2026-03-01T10:00:00.000Z');
        const input = { startedAt, seen: new Map([['core-sw-01', 1]]) };
        const output = deserialize<typeof input>(serialize(input));

        expect(output?.startedAt).toBeInstanceOf(Date);
        expect(output?.startedAt.toISOString()).toBe('2026-03-01T10:00:00.000Z');
        expect(output?.seen.get('core-sw-01')).toBe(1);
    });

    test('should enforce 1MB size limit', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1);
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/Payload size exceeds maximum limit/);
    });

    test('should handle undefined', () => {
        expect(serialize(undefined)).toBe('');
        expect(deserialize('')).toBeUndefined();
    });
});

describe('parseJsonObject', () => {
    test('parses a JSON object from bytes', () => {
        expect(parseJsonObject(Buffer.from('{"vlan_id": 120, "ports": ["Gi1/0/1"]}'))).toEqual({
            vlan_id: 120,
            ports: ['Gi1/0/1'],
        });
    });

    test('treats empty input as an empty mapping', () => {
        expect(parseJsonObject(Buffer.from(''))).toEqual({});
        expect(parseJsonObject(undefined)).toEqual({});
    });

    test('rejects non-object payloads', () => {
        expect(() => parseJsonObject('[1, 2]')).toThrow('Payload must be a JSON object');
        expect(() => parseJsonObject('{nope')).toThrow(SerializationError);
    });
});
