import { ProviderCandidate } from '../db/provider.entity';
import { TaskImplementationEntity } from '../db/task.entity';
import { StepError } from '../errors/step.error';
import { ProviderRepository } from '../repositories/provider.repository';
import { TargetFacts } from './intent-resolver';

export const DISQUALIFIED = -1;

const LOCATION_SCORE = 30;
const TENANT_SCORE = 20;
const TAG_SCORE = 10;
const PLATFORM_BONUS = 5;

/**
 * Scores how well a provider instance fits a target. Each non-empty scope
 * must contain the target's value or the instance is disqualified; a match
 * adds to the score. A supported platform only adds a bonus.
 */
export function scoreCandidate({ instance, definition }: ProviderCandidate, facts: TargetFacts): number {
    let score = 0;

    if (instance.scope_locations.length > 0) {
        if (!facts.location || !instance.scope_locations.includes(facts.location)) return DISQUALIFIED;
        score += LOCATION_SCORE;
    }

    if (instance.scope_tenants.length > 0) {
        if (!facts.tenant || !instance.scope_tenants.includes(facts.tenant)) return DISQUALIFIED;
        score += TENANT_SCORE;
    }

    if (instance.scope_tags.length > 0) {
        if (!facts.tags.some(tag => instance.scope_tags.includes(tag))) return DISQUALIFIED;
        score += TAG_SCORE;
    }

    if (facts.platform && definition.supported_platforms.includes(facts.platform)) {
        score += PLATFORM_BONUS;
    }

    return score;
}

export interface ProviderNeeds {
    provider_definition_id: string | null;
    provider_instance_id: string | null;
}

export interface ScoredCandidate extends ProviderCandidate {
    score: number;
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

// Highest score first; equal scores fall back to instance name, then
// definition name, then instance id.
function rank(a: ScoredCandidate, b: ScoredCandidate): number {
    return b.score - a.score
        || compareText(a.instance.name, b.instance.name)
        || compareText(a.definition.name, b.definition.name)
        || compareText(a.instance.id, b.instance.id);
}

export function rankCandidates(
    candidates: ProviderCandidate[],
    facts: TargetFacts,
    needs: ProviderNeeds = { provider_definition_id: null, provider_instance_id: null },
): ScoredCandidate[] {
    return candidates
        .filter(c => c.instance.enabled && c.definition.enabled)
        .filter(c => !needs.provider_instance_id || c.instance.id === needs.provider_instance_id)
        .filter(c => !needs.provider_definition_id || c.definition.id === needs.provider_definition_id)
        .map(c => ({ ...c, score: scoreCandidate(c, facts) }))
        .filter(c => c.score !== DISQUALIFIED)
        .sort(rank);
}

export class ProviderSelector {
    constructor(private readonly providers: ProviderRepository) { }

    async select(facts: TargetFacts, implementation: Pick<TaskImplementationEntity, 'name'> & ProviderNeeds): Promise<ScoredCandidate> {
        const ranked = rankCandidates(await this.providers.listCandidates(), facts, implementation);
        const best = ranked[0];
        if (!best) {
            throw new StepError(
                'NoProviderMatched',
                `No enabled provider instance in scope for implementation "${implementation.name}" ` +
                `(location=${facts.location ?? '-'} tenant=${facts.tenant ?? '-'})`,
            );
        }
        return best;
    }
}
