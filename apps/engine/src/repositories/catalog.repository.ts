import { z } from 'zod';
import { DeviceRecord, JsonObject, JsonValue, TargetRecord, TargetRef } from '@fabricflow/sdk';
import { Queryable } from '../db/transaction.manager';

/** Read-only view of the host inventory. */
export interface CatalogRepository {
    findTarget(ref: TargetRef): Promise<TargetRecord | null>;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);
const jsonObjectSchema = z.record(jsonValueSchema);

const deviceAttributesSchema = z.object({
    manufacturer: z.string().nullable().default(null),
    platform: z.string().nullable().default(null),
    software_version: z.string().nullable().default(null),
    location: z.string().nullable().default(null),
    tenant: z.string().nullable().default(null),
    tags: z.array(z.string()).default([]),
    primary_ip: z.string().nullable().default(null),
    config_context: jsonObjectSchema.default({}),
    local_context: jsonObjectSchema.default({}),
});

const interfaceAttributesSchema = z.object({
    description: z.string().default(''),
    enabled: z.boolean().default(true),
    mode: z.enum(['access', 'tagged', 'tagged-all']).nullable().default(null),
    untagged_vlan: z.number().int().nullable().default(null),
    tagged_vlans: z.array(z.number().int()).default([]),
});

interface CatalogRow {
    id: string;
    kind: string;
    object_type: string;
    name: string;
    parent_id: string | null;
    attributes: JsonObject;
}

export function toDeviceRecord(row: Pick<CatalogRow, 'id' | 'name' | 'attributes'>): DeviceRecord {
    return { kind: 'device', id: row.id, name: row.name, ...deviceAttributesSchema.parse(row.attributes) };
}

export class PgCatalogRepository implements CatalogRepository {
    constructor(private readonly pool: Queryable) { }

    async findTarget(ref: TargetRef): Promise<TargetRecord | null> {
        const row = await this.findRow(ref.id);
        if (!row || row.kind !== ref.kind) return null;

        switch (row.kind) {
            case 'device':
                return toDeviceRecord(row);
            case 'interface': {
                const parent = row.parent_id ? await this.findRow(row.parent_id) : null;
                if (!parent || parent.kind !== 'device') return null;
                return {
                    kind: 'interface',
                    id: row.id,
                    name: row.name,
                    ...interfaceAttributesSchema.parse(row.attributes),
                    device: toDeviceRecord(parent),
                };
            }
            default:
                return {
                    kind: 'object',
                    id: row.id,
                    object_type: row.object_type,
                    attributes: jsonObjectSchema.parse(row.attributes),
                };
        }
    }

    private async findRow(id: string): Promise<CatalogRow | null> {
        const res = await this.pool.query<CatalogRow>('SELECT * FROM catalog_objects WHERE id = $1', [id]);
        return res.rows[0] || null;
    }
}
