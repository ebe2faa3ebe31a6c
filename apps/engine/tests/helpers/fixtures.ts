import { DeviceRecord, GenericRecord, InterfaceRecord } from '@fabricflow/sdk';
import { ExecutionEntity, executionStatus } from '../../src/db/execution.entity';
import { ProviderCandidate, ProviderDefinitionEntity, ProviderInstanceEntity } from '../../src/db/provider.entity';
import { TaskDefinitionEntity, TaskImplementationEntity, implementationType } from '../../src/db/task.entity';
import {
    WorkflowStepEntity,
    WorkflowWithSteps,
    failurePolicy,
    stepType,
} from '../../src/db/workflow.entity';

export const FIXED_NOW = new Date('2026-03-02T10:00:00.000Z');

export function device(overrides: Partial<DeviceRecord> = {}): DeviceRecord {
    return {
        kind: 'device',
        id: 'dev-1',
        name: 'leaf-01',
        manufacturer: 'acme',
        platform: 'acmeos',
        software_version: '4.2',
        location: 'dc1',
        tenant: 'blue',
        tags: ['prod'],
        primary_ip: '10.0.0.1/24',
        config_context: {},
        local_context: {},
        ...overrides,
    };
}

export function iface(overrides: Partial<InterfaceRecord> = {}): InterfaceRecord {
    return {
        kind: 'interface',
        id: 'if-1',
        name: 'eth1',
        description: 'uplink',
        enabled: true,
        mode: 'access',
        untagged_vlan: 10,
        tagged_vlans: [],
        device: device(),
        ...overrides,
    };
}

export function genericObject(overrides: Partial<GenericRecord> = {}): GenericRecord {
    return {
        kind: 'object',
        id: 'obj-1',
        object_type: 'circuit',
        attributes: { name: 'circuit-a' },
        ...overrides,
    };
}

export function taskDefinition(overrides: Partial<TaskDefinitionEntity> = {}): TaskDefinitionEntity {
    return {
        id: 'task-1',
        name: 'configure-vlan',
        category: 'switching',
        description: '',
        input_schema: null,
        output_schema: null,
        created_at: FIXED_NOW,
        ...overrides,
    };
}

export function implementation(overrides: Partial<TaskImplementationEntity> = {}): TaskImplementationEntity {
    return {
        id: 'impl-1',
        task_id: 'task-1',
        name: 'acme-vlan',
        manufacturer: 'acme',
        platform: null,
        software_versions: [],
        implementation_type: implementationType.TEMPLATE_CONFIG,
        template_content: 'vlan {{ intent.vlan }}',
        action_config: {},
        provider_definition_id: null,
        provider_instance_id: null,
        priority: 0,
        enabled: true,
        ...overrides,
    };
}

export function providerDefinition(overrides: Partial<ProviderDefinitionEntity> = {}): ProviderDefinitionEntity {
    return {
        id: 'pdef-1',
        name: 'lab',
        driver: 'lab.recorder',
        description: '',
        capabilities: ['render', 'diff', 'apply'],
        supported_platforms: [],
        enabled: true,
        ...overrides,
    };
}

export function providerInstance(overrides: Partial<ProviderInstanceEntity> = {}): ProviderInstanceEntity {
    return {
        id: 'pinst-1',
        provider_id: 'pdef-1',
        name: 'lab-1',
        settings: {},
        credential_ref: null,
        scope_locations: [],
        scope_tenants: [],
        scope_tags: [],
        enabled: true,
        ...overrides,
    };
}

export function candidate(
    instance: Partial<ProviderInstanceEntity> = {},
    definition: Partial<ProviderDefinitionEntity> = {},
): ProviderCandidate {
    return { instance: providerInstance(instance), definition: providerDefinition(definition) };
}

type StepFields = Pick<WorkflowStepEntity, 'step_order' | 'name' | 'step_type'> & Partial<WorkflowStepEntity>;

export function workflowStep(fields: StepFields): WorkflowStepEntity {
    return {
        id: `wfs-${fields.step_order}`,
        workflow_id: 'wf-1',
        task_id: fields.step_type === stepType.TASK || fields.step_type === stepType.VALIDATION ? 'task-1' : null,
        input_mapping: {},
        output_mapping: {},
        condition: null,
        on_failure: failurePolicy.STOP,
        config: {},
        ...fields,
    };
}

export function workflow(steps: StepFields[], overrides: Partial<WorkflowWithSteps> = {}): WorkflowWithSteps {
    return {
        id: 'wf-1',
        name: 'vlan-rollout',
        description: '',
        enabled: true,
        approval_required: false,
        schedule_allowed: false,
        input_schema: null,
        default_inputs: {},
        created_at: FIXED_NOW,
        updated_at: FIXED_NOW,
        steps: steps.map(workflowStep),
        ...overrides,
    };
}

export function execution(overrides: Partial<ExecutionEntity> = {}): ExecutionEntity {
    return {
        id: 'exec-1',
        workflow_id: 'wf-1',
        status: executionStatus.RUNNING,
        inputs: {},
        context: {},
        targets: [{ kind: 'device', id: 'dev-1' }],
        requested_operation: 'render',
        requested_by: 'alice',
        approved_by: null,
        scheduled_for: null,
        started_at: FIXED_NOW,
        completed_at: null,
        wake_at: null,
        skip_remaining_after: null,
        failure_reason: null,
        worker_id: null,
        heartbeat_at: null,
        recovery_count: 0,
        created_at: FIXED_NOW,
        updated_at: FIXED_NOW,
        ...overrides,
    };
}
