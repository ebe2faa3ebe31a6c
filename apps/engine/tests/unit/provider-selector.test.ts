import { DISQUALIFIED, ProviderSelector, rankCandidates, scoreCandidate } from '../../src/services/provider-selector';
import { targetFacts } from '../../src/services/intent-resolver';
import { candidate, device } from '../helpers/fixtures';
import { MemoryProviderRepository } from '../helpers/memory';

const facts = targetFacts(device({ location: 'dc1', tenant: 'blue', tags: ['prod', 'edge'], platform: 'acmeos' }));

describe('scoreCandidate', () => {
    it('adds up every matching scope', () => {
        const fit = candidate(
            { scope_locations: ['dc1'], scope_tenants: ['blue'], scope_tags: ['edge'] },
            { supported_platforms: ['acmeos'] },
        );
        expect(scoreCandidate(fit, facts)).toBe(65);
    });

    it('scores an unscoped instance as zero', () => {
        expect(scoreCandidate(candidate(), facts)).toBe(0);
    });

    it('disqualifies on any non-matching scope', () => {
        expect(scoreCandidate(candidate({ scope_locations: ['dc2'] }), facts)).toBe(DISQUALIFIED);
        expect(scoreCandidate(candidate({ scope_tenants: ['red'] }), facts)).toBe(DISQUALIFIED);
        expect(scoreCandidate(candidate({ scope_tags: ['lab'] }), facts)).toBe(DISQUALIFIED);
    });

    it('disqualifies a scoped instance when the target has no value', () => {
        const nowhere = targetFacts(device({ location: null }));
        expect(scoreCandidate(candidate({ scope_locations: ['dc1'] }), nowhere)).toBe(DISQUALIFIED);
    });

    it('never disqualifies for an unsupported platform', () => {
        expect(scoreCandidate(candidate({}, { supported_platforms: ['otheros'] }), facts)).toBe(0);
    });
});

describe('rankCandidates', () => {
    it('orders by score, then instance name, definition name and id', () => {
        const ranked = rankCandidates([
            candidate({ id: 'i1', name: 'beta' }),
            candidate({ id: 'i2', name: 'alpha' }, { id: 'd2', name: 'zulu' }),
            candidate({ id: 'i3', name: 'alpha' }, { id: 'd3', name: 'yankee' }),
            candidate({ id: 'i4', name: 'gamma', scope_locations: ['dc1'] }),
        ], facts);

        expect(ranked.map(c => c.instance.id)).toEqual(['i4', 'i3', 'i2', 'i1']);
    });

    it('drops disabled instances and disabled definitions', () => {
        const ranked = rankCandidates([
            candidate({ id: 'off', enabled: false }),
            candidate({ id: 'def-off' }, { enabled: false }),
            candidate({ id: 'on' }),
        ], facts);
        expect(ranked.map(c => c.instance.id)).toEqual(['on']);
    });

    it('honours pinned instances and restricted definitions', () => {
        const all = [
            candidate({ id: 'best', scope_locations: ['dc1'] }, { id: 'd1' }),
            candidate({ id: 'pinned' }, { id: 'd2' }),
        ];

        expect(rankCandidates(all, facts, { provider_definition_id: null, provider_instance_id: 'pinned' })
            .map(c => c.instance.id)).toEqual(['pinned']);
        expect(rankCandidates(all, facts, { provider_definition_id: 'd2', provider_instance_id: null })
            .map(c => c.instance.id)).toEqual(['pinned']);
    });
});

describe('ProviderSelector', () => {
    it('returns the best candidate with its score', async () => {
        const providers = new MemoryProviderRepository();
        providers.candidates.push(candidate({ id: 'far' }), candidate({ id: 'near', scope_locations: ['dc1'] }));

        const selected = await new ProviderSelector(providers).select(facts, {
            name: 'acme-vlan',
            provider_definition_id: null,
            provider_instance_id: null,
        });

        expect(selected.instance.id).toBe('near');
        expect(selected.score).toBe(30);
    });

    it('prefers a location-scoped instance with the platform bonus over an unscoped one', async () => {
        const providers = new MemoryProviderRepository();
        providers.candidates.push(
            candidate({ id: 'b', name: 'alpha' }),
            candidate({ id: 'a', name: 'zeta', scope_locations: ['dc1'] }, { id: 'pdef-a', supported_platforms: ['acmeos'] }),
        );

        const selected = await new ProviderSelector(providers).select(facts, {
            name: 'acme-vlan',
            provider_definition_id: null,
            provider_instance_id: null,
        });

        expect(selected.instance.id).toBe('a');
        expect(selected.score).toBe(35);
        expect(rankCandidates(providers.candidates, facts).map(c => [c.instance.id, c.score])).toEqual([['a', 35], ['b', 0]]);
    });

    it('fails with NoProviderMatched when every candidate is out of scope', async () => {
        const providers = new MemoryProviderRepository();
        providers.candidates.push(candidate({ scope_tenants: ['red'] }));

        await expect(new ProviderSelector(providers).select(facts, {
            name: 'acme-vlan',
            provider_definition_id: null,
            provider_instance_id: null,
        })).rejects.toMatchObject({ kind: 'NoProviderMatched' });
    });
});
