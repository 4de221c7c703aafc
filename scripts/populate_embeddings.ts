#!/usr/bin/env npx tsx
/**
 * Populate Metadata Embeddings Script
 *
 * Embeds every registered dataset, table and domain definition into
 * nlq_metadata_embeddings so the vector retriever does not build the index on
 * its first question.
 *
 * Usage:
 *   npx tsx scripts/populate_embeddings.ts [--rebuild]
 *
 * Environment variables:
 *   DATABASE_URL - PostgreSQL connection string (default: DB_* / config.yaml)
 *   EMBEDDING_MODEL, OLLAMA_BASE_URL - see config/config.yaml
 *
 * Options:
 *   --rebuild    Delete existing entries first
 */

import { Pool } from "pg"
import { loadConfig } from "../src/config/loadConfig.js"
import { VectorDatasetRetriever } from "../src/dataset_retriever.js"
import { createLogger } from "../src/logger.js"
import { PgMetadataStore } from "../src/metadata_store.js"
import { OllamaClient } from "../src/model_client.js"
import { poolConfigFrom } from "../src/pipeline_deps.js"
import { PgVectorIndex } from "../src/vector_index.js"

async function main(): Promise<void> {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)
	const rebuild = process.argv.slice(2).includes("--rebuild")

	if (!config.model.embedding) {
		logger.error("No embedding model configured (model.embedding / EMBEDDING_MODEL)")
		process.exit(1)
	}

	const pool = new Pool(poolConfigFrom(config, process.env.DATABASE_URL))
	const schema = config.database.metadata_schema

	try {
		const index = new PgVectorIndex(pool, schema)
		if (rebuild) {
			const removed = await index.clear()
			logger.info("Existing embeddings removed", { removed })
		}

		const embedder = new OllamaClient({
			baseUrl: config.model.ollama_url,
			llmModel: config.model.llm,
			embeddingModel: config.model.embedding,
			timeoutMs: config.model.timeout_ms,
		})
		const retriever = new VectorDatasetRetriever(new PgMetadataStore(pool, schema), index, embedder, { logger })

		logger.info("Populating embeddings", { schema, model: config.model.embedding, rebuild })
		await retriever.ensureIndex()
		logger.info("Embedding population complete", { entries: await index.count() })
	} catch (error) {
		logger.error("Population failed", { error: error instanceof Error ? error.message : String(error) })
		process.exitCode = 1
	} finally {
		await pool.end()
	}
}

main().catch((error: unknown) => {
	console.error("Unhandled error:", error)
	process.exit(1)
})
