/**
 * Pipeline wiring
 *
 * Builds every collaborator once, at process start, and picks the retrieval
 * and generation strategies from configuration. Components only ever see the
 * interfaces; lifecycle (the pg Pool) belongs to the entry point.
 */

import { Pool, type PoolConfig } from "pg"
import { buildSqlSystemPrompt, DEFAULTS } from "./config.js"
import type { NLQConfig } from "./config/loadConfig.js"
import { createDatasetRetriever } from "./dataset_retriever.js"
import type { Logger } from "./logger.js"
import { PgMetadataStore } from "./metadata_store.js"
import { OllamaClient } from "./model_client.js"
import type { NLQueryToolContext, QuerySettings } from "./nl_query_tool.js"
import { PgQueryExecutor } from "./query_executor.js"
import { createSqlGenerator } from "./sql_generator.js"
import { PgVectorIndex } from "./vector_index.js"

export function poolConfigFrom(config: NLQConfig, connectionString?: string): PoolConfig {
	if (connectionString) {
		return { connectionString, max: 10 }
	}
	const db = config.database
	return {
		host: db.host,
		port: db.port,
		database: db.name,
		user: db.user,
		password: db.password,
		max: 10,
	}
}

export function querySettingsFrom(config: NLQConfig): QuerySettings {
	return {
		disambiguationThreshold: config.retrieval.disambiguation_threshold,
		maxChoices: DEFAULTS.maxChoices,
		allowedTables: config.guardrails.allowed_tables,
		defaultLimit: config.guardrails.default_limit,
		timeoutSeconds: config.execution.timeout_seconds,
	}
}

export interface PipelineDeps {
	pool: Pool
	logger: Logger
}

export function createPipelineContext(config: NLQConfig, deps: PipelineDeps): NLQueryToolContext {
	const { pool, logger } = deps
	const schema = config.database.metadata_schema
	const store = new PgMetadataStore(pool, schema)

	const ollama =
		config.model.provider === "ollama"
			? new OllamaClient({
					baseUrl: config.model.ollama_url,
					llmModel: config.model.llm,
					embeddingModel: config.model.embedding,
					timeoutMs: config.model.timeout_ms,
					temperature: config.model.temperature,
			  })
			: undefined

	const embedder = ollama?.canEmbed ? ollama : undefined
	const retriever = createDatasetRetriever(
		{
			strategy: config.retrieval.strategy,
			topK: config.retrieval.top_k,
			maxHits: config.retrieval.vector_hits,
		},
		{
			store,
			embedder,
			index: embedder ? new PgVectorIndex(pool, schema) : undefined,
			logger,
		},
	)

	const systemPrompt = config.model.sql_system_prompt || buildSqlSystemPrompt(config.guardrails.default_limit)
	const generator = createSqlGenerator(ollama?.canComplete ? ollama : undefined, systemPrompt)

	logger.info("Pipeline configured", {
		retrieval_strategy: retriever.strategy,
		generator: generator.kind,
		metadata_schema: schema,
		allowed_tables: config.guardrails.allowed_tables.length,
	})

	return {
		retriever,
		store,
		generator,
		executor: new PgQueryExecutor(pool, { schema }),
		settings: querySettingsFrom(config),
		logger,
	}
}
