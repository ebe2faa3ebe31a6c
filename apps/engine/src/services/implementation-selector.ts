import { TaskImplementationEntity } from '../db/task.entity';
import { StepError } from '../errors/step.error';
import { TaskRepository } from '../repositories/task.repository';
import { TargetFacts } from './intent-resolver';

export function implementationMatches(impl: TaskImplementationEntity, facts: TargetFacts): boolean {
    if (!impl.enabled) return false;
    if (!facts.manufacturer || impl.manufacturer !== facts.manufacturer) return false;
    if (impl.platform !== null && impl.platform !== facts.platform) return false;
    if (impl.software_versions.length > 0) {
        if (!facts.software_version || !impl.software_versions.includes(facts.software_version)) return false;
    }
    return true;
}

function byPriorityThenName(a: TaskImplementationEntity, b: TaskImplementationEntity): number {
    if (a.priority !== b.priority) return b.priority - a.priority;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Picks the implementation of a task for one target: every filter must pass,
 * then the highest priority wins and ties go to the lowest name.
 */
export function pickImplementation(
    candidates: TaskImplementationEntity[],
    taskId: string,
    facts: TargetFacts,
): TaskImplementationEntity | null {
    const matching = candidates
        .filter(impl => impl.task_id === taskId && implementationMatches(impl, facts))
        .sort(byPriorityThenName);
    return matching[0] ?? null;
}

export class ImplementationSelector {
    constructor(private readonly tasks: TaskRepository) { }

    async select(taskId: string, facts: TargetFacts): Promise<TaskImplementationEntity> {
        const candidates = await this.tasks.listImplementations(taskId);
        const selected = pickImplementation(candidates, taskId, facts);
        if (!selected) {
            throw new StepError(
                'NoImplementationMatched',
                `No enabled implementation of task ${taskId} matches manufacturer=${facts.manufacturer ?? '-'} ` +
                `platform=${facts.platform ?? '-'} version=${facts.software_version ?? '-'}`,
            );
        }
        return selected;
    }
}
