/**
 * NL Query Tool - Natural Language to SQL
 *
 * Main orchestration layer that:
 * 1. Ranks datasets against the question
 * 2. Auto-selects a dataset or asks the caller to pick one
 * 3. Builds the grounding context for the selected dataset
 * 4. Generates SQL (model, or template fallback) and parses it
 * 5. Validates the SQL against the guardrails and injects a LIMIT
 * 6. Executes on Postgres and returns rows with explanation metadata
 *
 * There is no repair loop: every failure ends the request with an error
 * response that carries the dataset and SQL reached so far, so the caller can
 * rephrase or retry with an explicit dataset.
 */

import { v4 as uuidv4 } from "uuid"
import {
	type AuditLogEntry,
	DEFAULT_ALLOWED_TABLES,
	DEFAULTS,
	NLQError,
	type NLQueryToolInput,
	parsePostgresError,
	withTimeout,
} from "./config.js"
import { loadGroundingPayload, renderGroundingContext, tablesInPayload } from "./context_builder.js"
import type { DatasetRetriever } from "./dataset_retriever.js"
import { decideDataset } from "./disambiguation.js"
import type { Logger } from "./logger.js"
import type { MetadataStore } from "./metadata_store.js"
import type { ExecutionResult, QueryExecutor } from "./query_executor.js"
import type { QueryErrorType, QueryResponse, RetrievalCandidate } from "./schema_types.js"
import type { SqlGenerator } from "./sql_generator.js"
import { extractReferencedTables, injectLimit, validateSQL } from "./sql_guardrails.js"

export interface QuerySettings {
	disambiguationThreshold: number
	maxChoices: number
	allowedTables: string[]
	defaultLimit: number
	timeoutSeconds: number
}

export const DEFAULT_QUERY_SETTINGS: QuerySettings = {
	disambiguationThreshold: DEFAULTS.disambiguationThreshold,
	maxChoices: DEFAULTS.maxChoices,
	allowedTables: DEFAULT_ALLOWED_TABLES,
	defaultLimit: DEFAULTS.defaultLimit,
	timeoutSeconds: DEFAULTS.timeoutSeconds,
}

export interface NLQueryToolContext {
	retriever: DatasetRetriever
	store: MetadataStore
	generator: SqlGenerator
	executor: QueryExecutor
	settings: QuerySettings
	logger: Logger
}

export const SELECTION_MESSAGE = "Which data source should I use?"
export const NO_CANDIDATES_MESSAGE = "No matching datasets found. Try rephrasing your question."

/**
 * Execute natural language query
 *
 * Never rejects: every failure is turned into an `error` response.
 */
export async function executeNLQuery(
	input: NLQueryToolInput,
	context: NLQueryToolContext,
): Promise<QueryResponse> {
	const startTime = Date.now()
	const queryId = uuidv4()
	const { retriever, store, generator, executor, settings, logger } = context

	const question = (input.question ?? "").trim()
	const timeoutSeconds = input.timeout_seconds ?? settings.timeoutSeconds
	const timeoutMs = Math.round(timeoutSeconds * 1000)

	// State reached so far, carried into error responses
	let datasetId: string | undefined
	let currentSQL: string | undefined
	let candidates: RetrievalCandidate[] = []

	const respond = (response: QueryResponse, extra: Partial<AuditLogEntry> = {}): QueryResponse => {
		logAudit(
			{
				query_id: queryId,
				timestamp: new Date(),
				question,
				status: response.status,
				dataset_id: datasetId,
				sql: currentSQL,
				candidates: candidates.map((c) => ({ dataset_id: c.dataset_id, score: c.score })),
				error: response.status === "error" ? response.message : undefined,
				total_latency_ms: Date.now() - startTime,
				...extra,
			},
			logger,
		)
		return response
	}

	const fail = (errorType: QueryErrorType, message: string): QueryResponse =>
		respond(buildErrorResponse({ queryId, errorType, message, sql: currentSQL, datasetId }))

	logger.info("NL Query received", {
		query_id: queryId,
		question,
		dataset_override: input.dataset_id,
		retrieval_strategy: retriever.strategy,
		generator: generator.kind,
	})

	if (!question) {
		return fail("validation", "Question must not be empty")
	}

	try {
		// === RETRIEVE ===
		const retrievalStart = Date.now()
		candidates = await withTimeout(retriever.retrieve(question), timeoutMs, "Dataset retrieval")

		logger.info("Datasets ranked", {
			query_id: queryId,
			candidates: candidates.map((c) => `${c.dataset_id}=${c.score}`),
			retrieval_latency_ms: Date.now() - retrievalStart,
		})

		// === DISAMBIGUATE ===
		const decision = decideDataset(candidates, {
			overrideId: input.dataset_id,
			threshold: settings.disambiguationThreshold,
			maxChoices: settings.maxChoices,
		})

		if (decision.kind === "no_candidates") {
			return fail("retrieval", NO_CANDIDATES_MESSAGE)
		}

		if (decision.kind === "needs_selection") {
			logger.info("Dataset selection is ambiguous", {
				query_id: queryId,
				choices: decision.choices.map((c) => c.dataset_id),
			})
			return respond({
				status: "needs_selection",
				query_id: queryId,
				choices: decision.choices,
				message: SELECTION_MESSAGE,
			})
		}

		if (input.dataset_id && decision.reason !== "override") {
			logger.warn("Requested dataset is not among the candidates, override ignored", {
				query_id: queryId,
				dataset_override: input.dataset_id,
			})
		}

		datasetId = decision.candidate.dataset_id
		logger.info("Dataset selected", { query_id: queryId, dataset_id: datasetId, reason: decision.reason })

		// === CONTEXT ===
		const payload = await loadGroundingPayload(store, datasetId)
		const groundingContext = renderGroundingContext(payload)
		logger.debug("Grounding context built", {
			query_id: queryId,
			tables: tablesInPayload(payload),
			definitions: payload.definitions.length,
		})

		// === GENERATE + PARSE ===
		const generationStart = Date.now()
		const generated = await withTimeout(
			generator.generate({ question, payload, context: groundingContext }),
			timeoutMs,
			"SQL generation",
		)
		logger.info("Generation finished", {
			query_id: queryId,
			generator: generator.kind,
			outcome: generated.kind,
			strategy: generated.kind === "sql" ? generated.strategy : undefined,
			generation_latency_ms: Date.now() - generationStart,
		})

		if (generated.kind === "clarification") {
			return respond({
				status: "needs_clarification",
				query_id: queryId,
				dataset_id: datasetId,
				clarifying_question: generated.question,
			})
		}

		if (generated.kind === "failure") {
			return fail("generation", generated.reason)
		}

		currentSQL = generated.sql

		// === VALIDATE ===
		const verdict = validateSQL(currentSQL, settings.allowedTables)
		if (!verdict.valid) {
			logger.warn("SQL rejected by guardrails", {
				query_id: queryId,
				code: verdict.code,
				offending: verdict.offending,
				sql: currentSQL,
			})
			return fail("validation", verdict.reason)
		}

		// === EXECUTE ===
		currentSQL = injectLimit(currentSQL, settings.defaultLimit)
		const executeStart = Date.now()
		let execution: ExecutionResult
		try {
			execution = await executor.execute(currentSQL, { timeoutSeconds })
		} catch (executeError) {
			const pgError = parsePostgresError(executeError)
			logger.error("Query execution failed", {
				query_id: queryId,
				sql: currentSQL,
				sqlstate: pgError.sqlstate,
				message: pgError.message,
			})
			return fail("execution", `SQL execution failed: ${pgError.message}`)
		}

		logger.info("Query executed successfully", {
			query_id: queryId,
			rows_returned: execution.rows.length,
			execution_time_ms: Date.now() - executeStart,
		})

		const metadata = generated.metadata
		return respond(
			{
				status: "ok",
				query_id: queryId,
				dataset_id: datasetId,
				sql: currentSQL,
				results: { columns: execution.columns, rows: execution.rows },
				explanation: {
					tables: metadata.tables_used ?? extractReferencedTables(currentSQL),
					assumptions: metadata.assumptions ?? [],
					notes: metadata.explanation ?? "",
				},
				generator: generator.kind,
			},
			{ generator: generator.kind, rows_returned: execution.rows.length },
		)
	} catch (error) {
		if (error instanceof NLQError) {
			logger.error("NLQ error", {
				query_id: queryId,
				error_type: error.type,
				error_message: error.message,
				recoverable: error.recoverable,
				context: error.context,
			})
			return fail(error.type, error.message)
		}

		logger.error("Unknown error in nl_query", {
			query_id: queryId,
			error: String(error),
		})
		return fail("execution", `Unexpected error: ${error instanceof Error ? error.message : String(error)}`)
	}
}

interface ErrorResponseParams {
	queryId: string
	errorType: QueryErrorType
	message: string
	sql?: string
	datasetId?: string
}

type ErrorResponse = Extract<QueryResponse, { status: "error" }>

function buildErrorResponse(params: ErrorResponseParams): ErrorResponse {
	const response: ErrorResponse = {
		status: "error",
		query_id: params.queryId,
		error_type: params.errorType,
		message: params.message,
	}
	if (params.sql !== undefined) response.sql = params.sql
	if (params.datasetId !== undefined) response.dataset_id = params.datasetId
	return response
}

/**
 * Log audit entry (structured, one per terminal response)
 */
function logAudit(entry: AuditLogEntry, logger: Logger): void {
	logger.info("AUDIT_LOG", { ...entry })
}
