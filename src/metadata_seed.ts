/**
 * Registry seed: the datasets, tables and domain definitions the bootstrap
 * script writes into the metadata registry.
 */

import * as fs from "fs"
import { Pool } from "pg"
import { z } from "zod"
import type { Dataset, DomainDefinition, TableDescriptor } from "./schema_types.js"

const datasetSchema = z.object({
	dataset_id: z.string().min(1),
	dataset_name: z.string().min(1),
	domain: z.string().min(1),
	description: z.string(),
	grain: z.string().nullable(),
	freshness_sla: z.string().nullable(),
	owner_team: z.string().nullable(),
	pii_level: z.string().nullable(),
})

const tableSchema = z.object({
	dataset_id: z.string().min(1),
	schema_name: z.string().min(1),
	table_name: z.string().min(1),
	table_desc: z.string(),
	primary_keys: z.string().nullable(),
	partition_cols: z.string().nullable(),
	join_hints: z.string().nullable(),
	important_cols: z.string().nullable(),
	example_filters: z.string().nullable(),
})

const definitionSchema = z.object({
	dataset_id: z.string().min(1),
	term: z.string().min(1),
	definition: z.string(),
	formula_sql: z.string().nullable(),
	notes: z.string().nullable(),
})

export const metadataSeedSchema = z
	.object({
		datasets: z.array(datasetSchema),
		tables: z.array(tableSchema),
		definitions: z.array(definitionSchema),
	})
	.superRefine((seed, ctx) => {
		const ids = new Set(seed.datasets.map((d) => d.dataset_id))
		for (const t of seed.tables) {
			if (!ids.has(t.dataset_id)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Table ${t.table_name} references unknown dataset ${t.dataset_id}` })
			}
		}
		for (const d of seed.definitions) {
			if (!ids.has(d.dataset_id)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Definition ${d.term} references unknown dataset ${d.dataset_id}` })
			}
		}
	})

export interface MetadataSeed {
	datasets: Dataset[]
	tables: TableDescriptor[]
	definitions: DomainDefinition[]
}

export const DEFAULT_SEED_PATH = new URL("../data/metadata_seed.json", import.meta.url)

export function loadMetadataSeed(source: string | URL = DEFAULT_SEED_PATH): MetadataSeed {
	const raw: unknown = JSON.parse(fs.readFileSync(source, "utf-8"))
	return metadataSeedSchema.parse(raw)
}

/**
 * Upsert the seed in one transaction. Rows are written in seed order, which
 * becomes their registry order.
 */
export async function writeMetadataSeed(pool: Pool, schema: string, seed: MetadataSeed): Promise<void> {
	const q = (table: string) => `"${schema}".${table}`
	const client = await pool.connect()
	try {
		await client.query("BEGIN")
		for (const d of seed.datasets) {
			await client.query(
				`
				INSERT INTO ${q("nlq_dataset_registry")}
					(dataset_id, dataset_name, domain, description, grain, freshness_sla, owner_team, pii_level)
				VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
				ON CONFLICT (dataset_id) DO UPDATE SET
					dataset_name = EXCLUDED.dataset_name,
					domain = EXCLUDED.domain,
					description = EXCLUDED.description,
					grain = EXCLUDED.grain,
					freshness_sla = EXCLUDED.freshness_sla,
					owner_team = EXCLUDED.owner_team,
					pii_level = EXCLUDED.pii_level,
					updated_at = now()
			`,
				[d.dataset_id, d.dataset_name, d.domain, d.description, d.grain, d.freshness_sla, d.owner_team, d.pii_level],
			)
		}
		for (const t of seed.tables) {
			await client.query(
				`
				INSERT INTO ${q("nlq_table_registry")}
					(dataset_id, schema_name, table_name, table_desc, primary_keys, partition_cols,
					 join_hints, important_cols, example_filters)
				VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
				ON CONFLICT (dataset_id, schema_name, table_name) DO UPDATE SET
					table_desc = EXCLUDED.table_desc,
					primary_keys = EXCLUDED.primary_keys,
					partition_cols = EXCLUDED.partition_cols,
					join_hints = EXCLUDED.join_hints,
					important_cols = EXCLUDED.important_cols,
					example_filters = EXCLUDED.example_filters,
					updated_at = now()
			`,
				[
					t.dataset_id,
					t.schema_name,
					t.table_name,
					t.table_desc,
					t.primary_keys,
					t.partition_cols,
					t.join_hints,
					t.important_cols,
					t.example_filters,
				],
			)
		}
		for (const d of seed.definitions) {
			await client.query(
				`
				INSERT INTO ${q("nlq_domain_definitions")} (dataset_id, term, definition, formula_sql, notes)
				VALUES ($1, $2, $3, $4, $5)
				ON CONFLICT (dataset_id, term) DO UPDATE SET
					definition = EXCLUDED.definition,
					formula_sql = EXCLUDED.formula_sql,
					notes = EXCLUDED.notes
			`,
				[d.dataset_id, d.term, d.definition, d.formula_sql, d.notes],
			)
		}
		await client.query("COMMIT")
	} catch (error) {
		await client.query("ROLLBACK")
		throw error
	} finally {
		client.release()
	}
}
