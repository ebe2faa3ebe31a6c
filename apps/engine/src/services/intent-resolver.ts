import {
    DeviceRecord,
    GenericRecord,
    InterfaceRecord,
    JsonObject,
    TargetRecord,
    cloneJson,
    isJsonObject,
    mergeLayers,
} from '@fabricflow/sdk';

/**
 * Effective configuration for a target, merged from four layers where later
 * layers overwrite earlier keys:
 *
 *   1. attributes of the target itself
 *   2. the device's config context (its assigned configuration data)
 *   3. the device's local context (per-device overrides)
 *   4. the request inputs
 *
 * Interfaces take layers 2-3 from their device's resolved `interfaces[<name>]`
 * entry. Generic objects have no context layers.
 *
 * Pure: the same arguments always give an equal mapping, and the result
 * shares no mutable structure with them.
 */
export function resolveIntent(target: TargetRecord, inputs: JsonObject = {}): JsonObject {
    switch (target.kind) {
        case 'device':
            return resolveDeviceIntent(target, inputs);
        case 'interface':
            return resolveInterfaceIntent(target, inputs);
        case 'object':
            return resolveGenericIntent(target, inputs);
    }
}

function resolveDeviceIntent(device: DeviceRecord, inputs: JsonObject): JsonObject {
    const base: JsonObject = {
        name: device.name,
        platform: device.platform,
        location: device.location,
    };
    return mergeLayers(base, device.config_context, device.local_context, inputs);
}

function resolveInterfaceIntent(iface: InterfaceRecord, inputs: JsonObject): JsonObject {
    const base: JsonObject = {
        name: iface.name,
        description: iface.description,
        enabled: iface.enabled,
        mode: iface.mode,
        untagged_vlan: iface.untagged_vlan,
        tagged_vlans: iface.mode === 'tagged' ? [...iface.tagged_vlans] : [],
    };

    const deviceIntent = resolveDeviceIntent(iface.device, {});
    const interfaces = deviceIntent.interfaces;
    const fromDevice = isJsonObject(interfaces) ? interfaces[iface.name] : undefined;

    return mergeLayers(base, isJsonObject(fromDevice) ? fromDevice : {}, inputs);
}

function resolveGenericIntent(object: GenericRecord, inputs: JsonObject): JsonObject {
    const base: JsonObject = {};
    for (const [key, value] of Object.entries(object.attributes)) {
        if (value === null || typeof value !== 'object') {
            base[key] = cloneJson(value);
        }
    }
    return mergeLayers(base, inputs);
}

/** Display name of a target, used as its key in step outputs. */
export function targetName(target: TargetRecord): string {
    switch (target.kind) {
        case 'device':
            return target.name;
        case 'interface':
            return `${target.device.name}:${target.name}`;
        case 'object': {
            const name = target.attributes.name;
            return typeof name === 'string' ? name : `${target.object_type}:${target.id}`;
        }
    }
}

/** Scope-relevant attributes of a target. Interfaces answer with their device's. */
export interface TargetFacts {
    manufacturer: string | null;
    platform: string | null;
    software_version: string | null;
    location: string | null;
    tenant: string | null;
    tags: string[];
}

export function targetFacts(target: TargetRecord): TargetFacts {
    const device = target.kind === 'interface' ? target.device : target;
    if (device.kind === 'device') {
        return {
            manufacturer: device.manufacturer,
            platform: device.platform,
            software_version: device.software_version,
            location: device.location,
            tenant: device.tenant,
            tags: [...device.tags],
        };
    }

    const attr = (key: string): string | null => {
        const value = device.attributes[key];
        return typeof value === 'string' ? value : null;
    };
    const tags = device.attributes.tags;
    return {
        manufacturer: attr('manufacturer'),
        platform: attr('platform'),
        software_version: attr('software_version'),
        location: attr('location'),
        tenant: attr('tenant'),
        tags: Array.isArray(tags) ? tags.filter((t): t is string => typeof t === 'string') : [],
    };
}
