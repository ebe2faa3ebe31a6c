import { JsonObject, ProviderCapability } from '@fabricflow/sdk';

/** A driver family, e.g. a CLI session driver or a controller API driver. */
export interface ProviderDefinitionEntity {
    id: string;
    name: string;
    driver: string;                         // driver registry key
    description: string;
    capabilities: ProviderCapability[];
    supported_platforms: string[];
    enabled: boolean;
}

/** A configured endpoint of a provider definition with its applicability scope. */
export interface ProviderInstanceEntity {
    id: string;
    provider_id: string;
    name: string;
    settings: JsonObject;
    credential_ref: string | null;
    scope_locations: string[];
    scope_tenants: string[];
    scope_tags: string[];
    enabled: boolean;
}

export interface ProviderCandidate {
    instance: ProviderInstanceEntity;
    definition: ProviderDefinitionEntity;
}
