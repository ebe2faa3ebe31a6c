import { ProviderCandidate, ProviderDefinitionEntity, ProviderInstanceEntity } from '../db/provider.entity';
import { Queryable } from '../db/transaction.manager';

export interface ProviderRepository {
    /** Every instance joined with its definition, enabled or not. */
    listCandidates(): Promise<ProviderCandidate[]>;
}

export type NewProviderDefinition = Pick<ProviderDefinitionEntity, 'name' | 'driver'> &
    Partial<Omit<ProviderDefinitionEntity, 'id' | 'name' | 'driver'>>;

export type NewProviderInstance = Pick<ProviderInstanceEntity, 'provider_id' | 'name'> &
    Partial<Omit<ProviderInstanceEntity, 'id' | 'provider_id' | 'name'>>;

export class PgProviderRepository implements ProviderRepository {
    constructor(private readonly pool: Queryable) { }

    async createDefinition(input: NewProviderDefinition): Promise<ProviderDefinitionEntity> {
        const res = await this.pool.query<ProviderDefinitionEntity>(
            `INSERT INTO provider_definitions (name, driver, description, capabilities, supported_platforms, enabled)
             VALUES ($1, $2, $3, $4, $5, $6)
             RETURNING *`,
            [
                input.name,
                input.driver,
                input.description ?? '',
                input.capabilities ?? [],
                input.supported_platforms ?? [],
                input.enabled ?? true,
            ],
        );
        return res.rows[0];
    }

    async createInstance(input: NewProviderInstance): Promise<ProviderInstanceEntity> {
        const res = await this.pool.query<ProviderInstanceEntity>(
            `INSERT INTO provider_instances
                (provider_id, name, settings, credential_ref, scope_locations, scope_tenants, scope_tags, enabled)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             RETURNING *`,
            [
                input.provider_id,
                input.name,
                JSON.stringify(input.settings ?? {}),
                input.credential_ref ?? null,
                input.scope_locations ?? [],
                input.scope_tenants ?? [],
                input.scope_tags ?? [],
                input.enabled ?? true,
            ],
        );
        return res.rows[0];
    }

    async listCandidates(): Promise<ProviderCandidate[]> {
        const res = await this.pool.query<ProviderCandidate>(
            `SELECT row_to_json(i) AS instance, row_to_json(d) AS definition
             FROM provider_instances i
             JOIN provider_definitions d ON d.id = i.provider_id`,
        );
        return res.rows;
    }
}
