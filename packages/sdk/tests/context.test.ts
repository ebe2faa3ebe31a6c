import { getPath, setPath, mergeLayers } from '../src/context';
import { JsonObject } from '../src/types';

describe('getPath', () => {
    const tree: JsonObject = {
        inputs: { vlan_id: 120, ports: ['Gi1/0/1', 'Gi1/0/2'] },
        enabled: false,
        note: null,
    };

    it('reads nested keys and array indexes', () => {
        expect(getPath(tree, 'inputs.vlan_id')).toBe(120);
        expect(getPath(tree, 'inputs.ports.1')).toBe('Gi1/0/2');
    });

    it('distinguishes falsy values from missing ones', () => {
        expect(getPath(tree, 'enabled')).toBe(false);
        expect(getPath(tree, 'note')).toBeNull();
        expect(getPath(tree, 'inputs.missing')).toBeUndefined();
        expect(getPath(tree, 'enabled.deeper')).toBeUndefined();
    });

    it('rejects empty segments', () => {
        expect(() => getPath(tree, 'inputs..vlan_id')).toThrow('Invalid context path');
        expect(() => getPath(tree, '')).toThrow('Invalid context path');
    });
});

describe('setPath', () => {
    it('creates intermediate mappings without touching the original tree', () => {
        const original: JsonObject = { inputs: { vlan_id: 120 } };
        const updated = setPath(original, 'results.vlan.created', true);

        expect(updated).toEqual({ inputs: { vlan_id: 120 }, results: { vlan: { created: true } } });
        expect(original).toEqual({ inputs: { vlan_id: 120 } });
    });

    it('keeps sibling keys when writing into an existing mapping', () => {
        const updated = setPath({ results: { a: 1 } }, 'results.b', 2);
        expect(updated).toEqual({ results: { a: 1, b: 2 } });
    });

    it('replaces a scalar intermediate with a mapping', () => {
        expect(setPath({ results: 'pending' }, 'results.done', true)).toEqual({ results: { done: true } });
    });
});

describe('mergeLayers', () => {
    it('overwrites keys shallowly, later layers winning', () => {
        const merged = mergeLayers(
            { ntp: { servers: ['10.0.0.1'] }, name: 'edge-01' },
            { ntp: { prefer: '10.0.0.2' } },
        );
        expect(merged).toEqual({ ntp: { prefer: '10.0.0.2' }, name: 'edge-01' });
    });

    it('does not share nested structures with its inputs', () => {
        const layer: JsonObject = { ntp: { servers: ['10.0.0.1'] } };
        const merged = mergeLayers(layer);
        expect(merged.ntp).toEqual(layer.ntp);
        expect(merged.ntp).not.toBe(layer.ntp);
    });
});
