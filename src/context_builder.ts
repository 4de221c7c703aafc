/**
 * Grounding context for SQL generation
 *
 * The rendered block is the only schema information the model sees, so it
 * lists every registered table of the active dataset and nothing outside it.
 */

import { NLQError } from "./config.js"
import type { MetadataStore } from "./metadata_store.js"
import type { GroundingPayload } from "./schema_types.js"

export async function loadGroundingPayload(store: MetadataStore, datasetId: string): Promise<GroundingPayload> {
	const [dataset, tables, definitions] = await Promise.all([
		store.getDataset(datasetId),
		store.listTables(datasetId),
		store.listDefinitions(datasetId),
	])

	if (!dataset) {
		throw new NLQError("retrieval", `Dataset not found in registry: ${datasetId}`, false, { dataset_id: datasetId })
	}

	return { dataset, tables, definitions }
}

export function qualifiedTableName(schema: string | null | undefined, table: string): string {
	return schema ? `${schema}.${table}` : table
}

/**
 * Render the payload as the natural-language context block.
 * Order: dataset header, tables, definitions (each in store order).
 */
export function renderGroundingContext(payload: GroundingPayload): string {
	const { dataset, tables, definitions } = payload
	const lines: string[] = [
		`Dataset: ${dataset.dataset_name} (${dataset.domain})`,
		`Description: ${dataset.description}`,
		`Grain: ${dataset.grain || "N/A"}`,
	]

	for (const t of tables) {
		lines.push("")
		lines.push(`Table: ${qualifiedTableName(t.schema_name, t.table_name)}`)
		lines.push(`  Description: ${t.table_desc}`)
		lines.push(`  Columns: ${t.important_cols ?? ""}`)
		if (t.primary_keys) lines.push(`  Primary key: ${t.primary_keys}`)
		if (t.join_hints) lines.push(`  Join hints: ${t.join_hints}`)
		if (t.example_filters) lines.push(`  Example filters: ${t.example_filters}`)
	}

	for (const d of definitions) {
		lines.push("")
		lines.push(`Definition - ${d.term}: ${d.definition}`)
		if (d.formula_sql) lines.push(`  Formula: ${d.formula_sql}`)
	}

	return lines.join("\n")
}

/** Bare table names the payload exposes to the generator. */
export function tablesInPayload(payload: GroundingPayload): string[] {
	return payload.tables.map((t) => t.table_name)
}
