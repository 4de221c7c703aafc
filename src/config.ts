/**
 * Shared constants, error types and request/response contracts for the
 * credit NLQ server.
 *
 * Includes:
 * - Query defaults (limits, timeouts, disambiguation margin)
 * - The SQL system prompt sent to the generative backend
 * - NLQError and timeout helpers
 * - Tool input/output interfaces
 */

import type { QueryErrorType, QueryResponse, RetrievalCandidate } from "./schema_types.js"

/**
 * Default configuration values
 */
export const DEFAULTS = {
	topK: 3,
	disambiguationThreshold: 0.15,
	maxChoices: 3,
	vectorHits: 15,
	defaultLimit: 1000,
	timeoutSeconds: 30,
}

/**
 * Analytical tables a generated statement may reference.
 *
 * Overridable through `guardrails.allowed_tables` / ALLOWED_TABLES.
 */
export const DEFAULT_ALLOWED_TABLES = [
	"cpfb_state_delinquency_30_89",
	"cpfb_state_delinquency_90_plus",
	"cpfb_metro_delinquency_30_89",
	"cpfb_metro_delinquency_90_plus",
	"fred_mortgage_rates",
	"fhfa_hpi_state",
]

/**
 * Build the system prompt for SQL generation.
 *
 * The two JSON shapes at the end are what parseGenerationResponse() expects.
 */
export function buildSqlSystemPrompt(defaultLimit: number = DEFAULTS.defaultLimit): string {
	return `You are a SQL expert for mortgage and credit analytics. Generate ONLY read-only SELECT queries.

RULES:
- Use ONLY the tables, columns, and schema provided in the context.
- Do NOT invent columns or tables.
- Output valid PostgreSQL-compatible SQL.
- Always include a LIMIT (default ${defaultLimit}) unless the user specifies otherwise.
- For time-series data, filter by date/period when the question implies a time range (e.g. "last year", "2024", "Q3").
- Return your response in this exact JSON format:
{"sql": "SELECT ...", "assumptions": ["list of assumptions"], "tables_used": ["table1", "table2"], "explanation": "brief explanation"}

If the question cannot be answered with the provided schema, return:
{"sql": null, "needs_clarification": true, "clarifying_question": "Your question here"}
`
}

/**
 * Input accepted by the nl_query / nl_disambiguate tools
 */
export interface NLQueryToolInput {
	/** Natural language question */
	question: string

	/** Dataset explicitly chosen by the caller (wins over ranking) */
	dataset_id?: string

	/** Bound for retrieval, generation and statement execution */
	timeout_seconds?: number
}

/**
 * Error types for structured error handling
 */
export class NLQError extends Error {
	constructor(
		public type: QueryErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "NLQError"
	}
}

/**
 * Race a promise against a timer.
 *
 * The timer is always cleared so nothing keeps the event loop alive.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
	let timeoutId: NodeJS.Timeout | undefined
	const timer = new Promise<never>((_, reject) => {
		timeoutId = setTimeout(() => {
			reject(new NLQError("timeout", `${label} timed out after ${timeoutMs}ms`, true, { timeout_ms: timeoutMs }))
		}, timeoutMs)
	})

	try {
		return await Promise.race([promise, timer])
	} finally {
		clearTimeout(timeoutId)
	}
}

/**
 * PostgreSQL error fields kept in error context
 */
export interface PostgresErrorContext {
	sqlstate: string
	message: string
	hint?: string
	detail?: string
	position?: number
}

/**
 * Parse PostgreSQL error into structured format
 */
export function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error instanceof Error) {
		const fields: Record<string, unknown> = { ...error }
		const position = typeof fields.position === "string" ? parseInt(fields.position, 10) : undefined
		return {
			sqlstate: typeof fields.code === "string" ? fields.code : "UNKNOWN",
			message: error.message,
			hint: typeof fields.hint === "string" ? fields.hint : undefined,
			detail: typeof fields.detail === "string" ? fields.detail : undefined,
			position: position !== undefined && !isNaN(position) ? position : undefined,
		}
	}

	return {
		sqlstate: "UNKNOWN",
		message: String(error),
	}
}

/**
 * Audit log entry, written once per terminal response
 */
export interface AuditLogEntry {
	query_id: string
	timestamp: Date
	question: string
	status: QueryResponse["status"]
	dataset_id?: string
	sql?: string
	generator?: "llm" | "template"
	rows_returned?: number
	candidates?: Array<Pick<RetrievalCandidate, "dataset_id" | "score">>
	error?: string
	total_latency_ms: number
}
