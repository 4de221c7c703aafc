/**
 * Vector index over registry metadata
 *
 * Stores one embedding per dataset description, table description and domain
 * definition, tagged with the owning dataset. Backed by pgvector with cosine
 * distance (`<=>`), so distance is in [0, 2] and 1 - distance is the cosine
 * similarity.
 */

import { Pool } from "pg"
import { z } from "zod"
import type { IndexEntry, IndexEntryMetadata, IndexHit } from "./schema_types.js"

export interface VectorIndex {
	count(): Promise<number>
	upsert(entries: IndexEntry[]): Promise<void>
	/** Nearest neighbours, closest first */
	query(embedding: number[], k: number): Promise<IndexHit[]>
}

export const indexEntryMetadataSchema: z.ZodType<IndexEntryMetadata> = z.discriminatedUnion("type", [
	z.object({ type: z.literal("dataset"), dataset_id: z.string() }),
	z.object({ type: z.literal("table"), dataset_id: z.string(), schema: z.string(), table: z.string() }),
	z.object({ type: z.literal("definition"), dataset_id: z.string(), term: z.string() }),
])

/** Format embedding as PostgreSQL vector literal */
export function toVectorLiteral(embedding: number[]): string {
	return `[${embedding.join(",")}]`
}

export class PgVectorIndex implements VectorIndex {
	private pool: Pool
	private tableName: string

	constructor(pool: Pool, schema: string = "public") {
		this.pool = pool
		this.tableName = `"${schema}".nlq_metadata_embeddings`
	}

	async count(): Promise<number> {
		const client = await this.pool.connect()
		try {
			const result = await client.query<{ n: string }>(`SELECT COUNT(*) AS n FROM ${this.tableName}`)
			return parseInt(result.rows[0]?.n ?? "0", 10)
		} finally {
			client.release()
		}
	}

	/** Remove every entry; returns how many were deleted. */
	async clear(): Promise<number> {
		const client = await this.pool.connect()
		try {
			const result = await client.query(`DELETE FROM ${this.tableName}`)
			return result.rowCount ?? 0
		} finally {
			client.release()
		}
	}

	async upsert(entries: IndexEntry[]): Promise<void> {
		if (entries.length === 0) return

		const client = await this.pool.connect()
		try {
			await client.query("BEGIN")
			for (const entry of entries) {
				await client.query(
					`
					INSERT INTO ${this.tableName} (id, content, metadata, embedding)
					VALUES ($1, $2, $3::jsonb, $4::vector)
					ON CONFLICT (id) DO UPDATE
						SET content = EXCLUDED.content,
							metadata = EXCLUDED.metadata,
							embedding = EXCLUDED.embedding
				`,
					[entry.id, entry.text, JSON.stringify(entry.metadata), toVectorLiteral(entry.embedding)],
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

	async query(embedding: number[], k: number): Promise<IndexHit[]> {
		const client = await this.pool.connect()
		try {
			const result = await client.query<{ metadata: unknown; distance: string | number }>(
				`
				SELECT metadata, embedding <=> $1::vector AS distance
				FROM ${this.tableName}
				ORDER BY embedding <=> $1::vector
				LIMIT $2
			`,
				[toVectorLiteral(embedding), k],
			)

			const hits: IndexHit[] = []
			for (const row of result.rows) {
				const metadata = indexEntryMetadataSchema.safeParse(row.metadata)
				if (!metadata.success) continue
				hits.push({ metadata: metadata.data, distance: Number(row.distance) })
			}
			return hits
		} finally {
			client.release()
		}
	}
}
