/**
 * Generation Response Parser
 *
 * Pulls SQL (or a clarification request) out of free-form model output.
 * Strategies, first match wins:
 * 1. JSON object containing a "sql" key
 * 2. Fenced code block
 * 3. Raw scan from the first SELECT to the first ';'
 *
 * Never throws. Whatever is extracted still goes through validateSQL().
 */

import { z } from "zod"
import type { GenerationMetadata, ParsedGenerationResult } from "./schema_types.js"

export const UNPARSEABLE_REASON = "could not extract SQL from response"

// Innermost {...} span with no nested braces that mentions "sql"
const STRUCTURED_BLOCK_PATTERN = /\{[^{}]*"sql"[^{}]*\}/
const FENCED_BLOCK_PATTERN = /```(?:sql)?\s*([\s\S]*?)```/i

const structuredResponseSchema = z.object({
	sql: z.string().nullish(),
	needs_clarification: z.boolean().nullish(),
	clarifying_question: z.string().nullish(),
	assumptions: z.array(z.string()).optional().catch(undefined),
	tables_used: z.array(z.string()).optional().catch(undefined),
	explanation: z.string().optional().catch(undefined),
})

function parseStructuredBlock(text: string): ParsedGenerationResult | null {
	const match = STRUCTURED_BLOCK_PATTERN.exec(text)
	if (!match) return null

	let decoded: unknown
	try {
		decoded = JSON.parse(match[0])
	} catch {
		// Malformed JSON: let the fenced/raw strategies have a go
		return null
	}

	const parsed = structuredResponseSchema.safeParse(decoded)
	if (!parsed.success) return null
	const obj = parsed.data

	if (obj.needs_clarification) {
		const question = obj.clarifying_question?.trim()
		if (question) {
			return { kind: "clarification", question }
		}
		return { kind: "failure", reason: "clarification requested without a question" }
	}

	const metadata: GenerationMetadata = {}
	if (obj.assumptions !== undefined) metadata.assumptions = obj.assumptions
	if (obj.tables_used !== undefined) metadata.tables_used = obj.tables_used
	if (obj.explanation !== undefined) metadata.explanation = obj.explanation

	const sql = obj.sql?.trim()
	if (!sql) {
		return { kind: "failure", reason: metadata.explanation || "model returned no SQL" }
	}

	return { kind: "sql", sql, metadata, strategy: "structured" }
}

function parseFencedBlock(text: string): ParsedGenerationResult | null {
	const match = FENCED_BLOCK_PATTERN.exec(text)
	if (!match) return null
	const sql = match[1].trim()
	if (!sql) return null
	return { kind: "sql", sql, metadata: {}, strategy: "fenced" }
}

function parseRawSelect(text: string): ParsedGenerationResult | null {
	const start = text.search(/select/i)
	if (start < 0) return null
	const sql = text.slice(start).split(";")[0].trim()
	if (!sql) return null
	return { kind: "sql", sql: `${sql};`, metadata: {}, strategy: "raw" }
}

export function parseGenerationResponse(raw: string): ParsedGenerationResult {
	const text = (raw ?? "").trim()
	if (!text) {
		return { kind: "failure", reason: UNPARSEABLE_REASON }
	}

	return (
		parseStructuredBlock(text) ??
		parseFencedBlock(text) ??
		parseRawSelect(text) ?? { kind: "failure", reason: UNPARSEABLE_REASON }
	)
}
