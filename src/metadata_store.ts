/**
 * Metadata registry access
 *
 * Read-only view of the dataset / table / domain-definition registry that the
 * bootstrap script populates. Rows come back in registration order
 * (`registry_seq`), which is what "first table of a dataset" means.
 */

import { Pool } from "pg"
import type { Dataset, DomainDefinition, TableDescriptor } from "./schema_types.js"

export interface MetadataStore {
	listDatasets(): Promise<Dataset[]>
	getDataset(datasetId: string): Promise<Dataset | null>
	/** All tables, or only those of one dataset */
	listTables(datasetId?: string): Promise<TableDescriptor[]>
	/** All definitions, or only those of one dataset */
	listDefinitions(datasetId?: string): Promise<DomainDefinition[]>
}

export class PgMetadataStore implements MetadataStore {
	private pool: Pool
	private schema: string

	constructor(pool: Pool, schema: string = "public") {
		this.pool = pool
		this.schema = schema
	}

	private table(name: string): string {
		return `"${this.schema}".${name}`
	}

	async listDatasets(): Promise<Dataset[]> {
		const client = await this.pool.connect()
		try {
			const result = await client.query<Dataset>(`
				SELECT dataset_id, dataset_name, domain, description, grain,
					freshness_sla, owner_team, pii_level
				FROM ${this.table("nlq_dataset_registry")}
				ORDER BY registry_seq
			`)
			return result.rows
		} finally {
			client.release()
		}
	}

	async getDataset(datasetId: string): Promise<Dataset | null> {
		const client = await this.pool.connect()
		try {
			const result = await client.query<Dataset>(
				`
				SELECT dataset_id, dataset_name, domain, description, grain,
					freshness_sla, owner_team, pii_level
				FROM ${this.table("nlq_dataset_registry")}
				WHERE dataset_id = $1
			`,
				[datasetId],
			)
			return result.rows[0] ?? null
		} finally {
			client.release()
		}
	}

	async listTables(datasetId?: string): Promise<TableDescriptor[]> {
		const client = await this.pool.connect()
		try {
			const result = await client.query<TableDescriptor>(
				`
				SELECT dataset_id, schema_name, table_name, table_desc, primary_keys,
					partition_cols, join_hints, important_cols, example_filters
				FROM ${this.table("nlq_table_registry")}
				WHERE ($1::text IS NULL OR dataset_id = $1)
				ORDER BY registry_seq
			`,
				[datasetId ?? null],
			)
			return result.rows
		} finally {
			client.release()
		}
	}

	async listDefinitions(datasetId?: string): Promise<DomainDefinition[]> {
		const client = await this.pool.connect()
		try {
			const result = await client.query<DomainDefinition>(
				`
				SELECT dataset_id, term, definition, formula_sql, notes
				FROM ${this.table("nlq_domain_definitions")}
				WHERE ($1::text IS NULL OR dataset_id = $1)
				ORDER BY registry_seq
			`,
				[datasetId ?? null],
			)
			return result.rows
		} finally {
			client.release()
		}
	}
}
