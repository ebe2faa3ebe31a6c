import { JsonObject } from '@fabricflow/sdk';

/** A reusable, vendor-neutral unit of work. */
export interface TaskDefinitionEntity {
    id: string;
    name: string;
    category: string;
    description: string;
    input_schema: JsonObject | null;
    output_schema: JsonObject | null;
    created_at: Date;
}

export enum implementationType {
    TEMPLATE_CONFIG = 'template-config',
    TEMPLATE_PAYLOAD = 'template-payload',
    API_CALL = 'api-call',
    QUERY = 'query',
    HOOK = 'hook'
}

/**
 * A vendor/platform/version-specific way of carrying out a task.
 * An empty `software_versions` list matches every version; a null platform
 * matches every platform of the manufacturer.
 */
export interface TaskImplementationEntity {
    id: string;
    task_id: string;
    name: string;
    manufacturer: string;
    platform: string | null;
    software_versions: string[];
    implementation_type: implementationType;
    template_content: string;
    action_config: JsonObject;
    provider_definition_id: string | null;
    provider_instance_id: string | null;
    priority: number;
    enabled: boolean;
}
