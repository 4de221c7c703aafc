/**
 * SQL generation strategies
 *
 * - LlmSqlGenerator: system prompt + grounding context to the model, output
 *   run through parseGenerationResponse().
 * - TemplateSqlGenerator: keyword-to-template mapping used when no model is
 *   configured. Crude on purpose; it keeps the server answerable with no
 *   model at all.
 *
 * Both return a ParsedGenerationResult, and both results go through the
 * guardrails before execution.
 */

import { buildSqlSystemPrompt } from "./config.js"
import { qualifiedTableName } from "./context_builder.js"
import type { TextCompletionClient } from "./model_client.js"
import { parseGenerationResponse } from "./response_parser.js"
import type { GroundingPayload, ParsedGenerationResult } from "./schema_types.js"

export interface GenerationInput {
	question: string
	payload: GroundingPayload
	/** Rendered grounding context */
	context: string
}

export interface SqlGenerator {
	readonly kind: "llm" | "template"
	generate(input: GenerationInput): Promise<ParsedGenerationResult>
}

export function buildUserPrompt(context: string, question: string): string {
	return `Context:
${context}

User question: ${question}

Generate a SQL query. Respond with JSON only.`
}

// ============================================================================
// LLM
// ============================================================================

export class LlmSqlGenerator implements SqlGenerator {
	readonly kind = "llm" as const

	private systemPrompt: string

	constructor(
		private client: TextCompletionClient,
		systemPrompt?: string,
	) {
		this.systemPrompt = systemPrompt || buildSqlSystemPrompt()
	}

	async generate(input: GenerationInput): Promise<ParsedGenerationResult> {
		const text = await this.client.complete(this.systemPrompt, buildUserPrompt(input.context, input.question))
		return parseGenerationResponse(text)
	}
}

// ============================================================================
// Template fallback
// ============================================================================

export const FALLBACK_NOTE = "Fallback template SQL (LLM not configured)"

interface TemplateRoute {
	table: string
	sql: string
}

/**
 * Map a question onto a fixed query.
 *
 * `firstTable` is the dataset's first registered table (schema-qualified);
 * it is only used when no vocabulary matches.
 */
export function routeTemplate(question: string, firstTable: string): TemplateRoute {
	const q = question.toLowerCase()

	if (q.includes("delinquen") || q.includes("30-89") || q.includes("90")) {
		// State-level series are small enough to return in full; metro is not
		if (q.includes("state")) {
			return {
				table: "cpfb_state_delinquency_30_89",
				sql: "SELECT * FROM cpfb_state_delinquency_30_89 WHERE date >= '2023-01-01' ORDER BY date DESC",
			}
		}
		return {
			table: "cpfb_metro_delinquency_30_89",
			sql: "SELECT * FROM cpfb_metro_delinquency_30_89 WHERE date >= '2023-01-01' ORDER BY date DESC LIMIT 100",
		}
	}

	if (q.includes("rate") || q.includes("mortgage")) {
		return {
			table: "fred_mortgage_rates",
			sql: "SELECT * FROM fred_mortgage_rates WHERE date >= '2023-01-01' ORDER BY date DESC LIMIT 100",
		}
	}

	if (q.includes("hpi") || q.includes("house price") || q.includes("index")) {
		return {
			table: "fhfa_hpi_state",
			sql: "SELECT * FROM fhfa_hpi_state WHERE period >= '2023Q1' ORDER BY period DESC LIMIT 100",
		}
	}

	return { table: firstTable, sql: `SELECT * FROM ${firstTable} LIMIT 100` }
}

export class TemplateSqlGenerator implements SqlGenerator {
	readonly kind = "template" as const

	async generate(input: GenerationInput): Promise<ParsedGenerationResult> {
		const first = input.payload.tables[0]
		if (!first) {
			return { kind: "failure", reason: "No tables for dataset" }
		}

		const route = routeTemplate(input.question, qualifiedTableName(first.schema_name, first.table_name))
		return {
			kind: "sql",
			sql: route.sql,
			metadata: { tables_used: [route.table], explanation: FALLBACK_NOTE },
			strategy: "template",
		}
	}
}

// ============================================================================
// Factory
// ============================================================================

/**
 * LLM generation when a completion client is available, template otherwise.
 */
export function createSqlGenerator(client: TextCompletionClient | undefined, systemPrompt?: string): SqlGenerator {
	return client ? new LlmSqlGenerator(client, systemPrompt) : new TemplateSqlGenerator()
}
