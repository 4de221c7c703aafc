import { describe, it, expect, vi } from "vitest"
import type { DatasetRetriever } from "./dataset_retriever.js"
import type { Logger } from "./logger.js"
import { loadMetadataSeed } from "./metadata_seed.js"
import {
	DEFAULT_QUERY_SETTINGS,
	executeNLQuery,
	NO_CANDIDATES_MESSAGE,
	SELECTION_MESSAGE,
	type NLQueryToolContext,
} from "./nl_query_tool.js"
import type { ExecutionResult } from "./query_executor.js"
import { UNPARSEABLE_REASON } from "./response_parser.js"
import type { RetrievalCandidate } from "./schema_types.js"
import { FALLBACK_NOTE, LlmSqlGenerator, TemplateSqlGenerator, type SqlGenerator } from "./sql_generator.js"
import { InMemoryMetadataStore, RecordingExecutor, ScriptedCompletionClient } from "./testing/fakes.js"

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

const seed = loadMetadataSeed()

const RATE_ROWS: ExecutionResult = {
	columns: ["date", "mort_30yr"],
	rows: [
		{ date: "2024-01-04", mort_30yr: 6.62 },
		{ date: "2023-12-28", mort_30yr: 6.61 },
	],
}

function candidate(dataset_id: string, score: number): RetrievalCandidate {
	const ds = seed.datasets.find((d) => d.dataset_id === dataset_id)
	return { dataset_id, label: ds?.dataset_name ?? dataset_id, why: ds?.description ?? "", score }
}

function fixedRetriever(result: RetrievalCandidate[] | Error): DatasetRetriever {
	return {
		strategy: "keyword",
		retrieve: async () => {
			if (result instanceof Error) throw result
			return result
		},
	}
}

function recordingLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function llm(...responses: string[]): SqlGenerator {
	return new LlmSqlGenerator(new ScriptedCompletionClient(responses))
}

function buildContext(overrides: Partial<NLQueryToolContext> = {}): NLQueryToolContext {
	return {
		retriever: fixedRetriever([candidate("fred_rates", 0.9)]),
		store: new InMemoryMetadataStore(seed),
		generator: new TemplateSqlGenerator(),
		executor: new RecordingExecutor(RATE_ROWS),
		settings: DEFAULT_QUERY_SETTINGS,
		logger: recordingLogger(),
		...overrides,
	}
}

describe("executeNLQuery", () => {
	describe("answered questions", () => {
		it("runs template SQL and returns rows with the fallback note", async () => {
			const executor = new RecordingExecutor(RATE_ROWS)
			const response = await executeNLQuery({ question: "current mortgage rates" }, buildContext({ executor }))

			const sql = "SELECT * FROM fred_mortgage_rates WHERE date >= '2023-01-01' ORDER BY date DESC LIMIT 100"
			expect(response).toEqual({
				status: "ok",
				query_id: expect.stringMatching(UUID_PATTERN),
				dataset_id: "fred_rates",
				sql,
				results: RATE_ROWS,
				explanation: { tables: ["fred_mortgage_rates"], assumptions: [], notes: FALLBACK_NOTE },
				generator: "template",
			})
			expect(executor.calls).toEqual([{ sql, options: { timeoutSeconds: 30 } }])
		})

		it("injects the default limit into model SQL and derives tables from it", async () => {
			const executor = new RecordingExecutor(RATE_ROWS)
			const generator = llm(
				'{"sql": "SELECT date, mort_30yr FROM fred_mortgage_rates ORDER BY date DESC", "assumptions": ["latest first"]}',
			)
			const response = await executeNLQuery({ question: "30 year rate history" }, buildContext({ executor, generator }))

			expect(response).toMatchObject({
				status: "ok",
				sql: "SELECT date, mort_30yr FROM fred_mortgage_rates ORDER BY date DESC LIMIT 1000",
				explanation: { tables: ["fred_mortgage_rates"], assumptions: ["latest first"], notes: "" },
				generator: "llm",
			})
			expect(executor.calls[0].sql).toBe("SELECT date, mort_30yr FROM fred_mortgage_rates ORDER BY date DESC LIMIT 1000")
		})

		it("accepts fenced model output", async () => {
			const generator = llm("Here you go:\n```sql\nSELECT * FROM fred_mortgage_rates\n```")
			const response = await executeNLQuery({ question: "mortgage rates" }, buildContext({ generator }))
			expect(response).toMatchObject({ status: "ok", sql: "SELECT * FROM fred_mortgage_rates LIMIT 1000" })
		})

		it("drops the trailing semicolon of raw output before limiting", async () => {
			const generator = llm("You could run SELECT * FROM fhfa_hpi_state; for that.")
			const response = await executeNLQuery(
				{ question: "house prices" },
				buildContext({ generator, retriever: fixedRetriever([candidate("fhfa_hpi", 0.7)]) }),
			)
			expect(response).toMatchObject({ status: "ok", dataset_id: "fhfa_hpi", sql: "SELECT * FROM fhfa_hpi_state LIMIT 1000" })
		})

		it("honours a per-request timeout for execution", async () => {
			const executor = new RecordingExecutor(RATE_ROWS)
			await executeNLQuery({ question: "mortgage rates", timeout_seconds: 5 }, buildContext({ executor }))
			expect(executor.calls[0].options).toEqual({ timeoutSeconds: 5 })
		})
	})

	describe("dataset selection", () => {
		const close = [candidate("cpfb_delinquency", 0.81), candidate("fred_rates", 0.75)]

		it("asks the caller to choose when the top two are close", async () => {
			const executor = new RecordingExecutor()
			const response = await executeNLQuery(
				{ question: "mortgage trends" },
				buildContext({ retriever: fixedRetriever(close), executor }),
			)

			expect(response).toEqual({
				status: "needs_selection",
				query_id: expect.stringMatching(UUID_PATTERN),
				choices: close.map((c) => ({ dataset_id: c.dataset_id, label: c.label, why: c.why, score: c.score })),
				message: SELECTION_MESSAGE,
			})
			expect(executor.calls).toHaveLength(0)
		})

		it("auto-selects a clear winner", async () => {
			const response = await executeNLQuery(
				{ question: "delinquency by state" },
				buildContext({ retriever: fixedRetriever([candidate("cpfb_delinquency", 0.81), candidate("fred_rates", 0.62)]) }),
			)
			expect(response).toMatchObject({
				status: "ok",
				dataset_id: "cpfb_delinquency",
				sql: "SELECT * FROM cpfb_state_delinquency_30_89 WHERE date >= '2023-01-01' ORDER BY date DESC LIMIT 1000",
			})
		})

		it("uses the caller's choice when it is among the candidates", async () => {
			const response = await executeNLQuery(
				{ question: "mortgage trends", dataset_id: "fred_rates" },
				buildContext({ retriever: fixedRetriever(close) }),
			)
			expect(response).toMatchObject({ status: "ok", dataset_id: "fred_rates" })
		})

		it("ignores and logs a choice that is not among the candidates", async () => {
			const logger = recordingLogger()
			const response = await executeNLQuery(
				{ question: "mortgage trends", dataset_id: "unknown_dataset" },
				buildContext({ retriever: fixedRetriever(close), logger }),
			)
			expect(response.status).toBe("needs_selection")
			expect(logger.warn).not.toHaveBeenCalled()

			const single = await executeNLQuery(
				{ question: "mortgage rates", dataset_id: "unknown_dataset" },
				buildContext({ logger }),
			)
			expect(single).toMatchObject({ status: "ok", dataset_id: "fred_rates" })
			expect(logger.warn).toHaveBeenCalledWith(
				"Requested dataset is not among the candidates, override ignored",
				expect.objectContaining({ dataset_override: "unknown_dataset" }),
			)
		})

		it("reports a retrieval error when nothing matches", async () => {
			const response = await executeNLQuery({ question: "weather tomorrow" }, buildContext({ retriever: fixedRetriever([]) }))
			expect(response).toEqual({
				status: "error",
				query_id: expect.stringMatching(UUID_PATTERN),
				error_type: "retrieval",
				message: NO_CANDIDATES_MESSAGE,
			})
		})

		it("reports a retrieval error for a dataset missing from the registry", async () => {
			const response = await executeNLQuery(
				{ question: "anything" },
				buildContext({ retriever: fixedRetriever([candidate("ghost", 1)]) }),
			)
			expect(response).toMatchObject({
				status: "error",
				error_type: "retrieval",
				message: "Dataset not found in registry: ghost",
				dataset_id: "ghost",
			})
		})
	})

	describe("generation outcomes", () => {
		it("relays a clarifying question", async () => {
			const generator = llm('{"sql": null, "needs_clarification": true, "clarifying_question": "Which metro area?"}')
			const response = await executeNLQuery({ question: "delinquency near me" }, buildContext({ generator }))
			expect(response).toEqual({
				status: "needs_clarification",
				query_id: expect.stringMatching(UUID_PATTERN),
				dataset_id: "fred_rates",
				clarifying_question: "Which metro area?",
			})
		})

		it("reports a generation error when no SQL can be extracted", async () => {
			const executor = new RecordingExecutor()
			const response = await executeNLQuery(
				{ question: "mortgage rates" },
				buildContext({ generator: llm("I am not sure."), executor }),
			)
			expect(response).toEqual({
				status: "error",
				query_id: expect.stringMatching(UUID_PATTERN),
				error_type: "generation",
				message: UNPARSEABLE_REASON,
				dataset_id: "fred_rates",
			})
			expect(executor.calls).toHaveLength(0)
		})

		it("reports a timeout when generation takes too long", async () => {
			const stalled: SqlGenerator = { kind: "llm", generate: () => new Promise(() => {}) }
			const response = await executeNLQuery(
				{ question: "mortgage rates", timeout_seconds: 0.05 },
				buildContext({ generator: stalled }),
			)
			expect(response).toMatchObject({
				status: "error",
				error_type: "timeout",
				message: "SQL generation timed out after 50ms",
				dataset_id: "fred_rates",
			})
		})
	})

	describe("guardrails", () => {
		it("rejects destructive SQL without executing it", async () => {
			const executor = new RecordingExecutor()
			const response = await executeNLQuery(
				{ question: "mortgage rates" },
				buildContext({ generator: llm('{"sql": "DROP TABLE fred_mortgage_rates"}'), executor }),
			)
			expect(response).toEqual({
				status: "error",
				query_id: expect.stringMatching(UUID_PATTERN),
				error_type: "validation",
				message: "Blocked keyword: drop",
				sql: "DROP TABLE fred_mortgage_rates",
				dataset_id: "fred_rates",
			})
			expect(executor.calls).toHaveLength(0)
		})

		it("never executes stacked statements", async () => {
			const executor = new RecordingExecutor()
			const stacked = "SELECT 1 FROM fred_mortgage_rates; COMMIT; SELECT * INTO stolen FROM fred_mortgage_rates"
			const response = await executeNLQuery(
				{ question: "mortgage rates" },
				buildContext({ generator: llm(JSON.stringify({ sql: stacked })), executor }),
			)
			expect(response).toMatchObject({
				status: "error",
				error_type: "validation",
				message: "Multiple statements are not allowed",
				sql: stacked,
			})
			expect(executor.calls).toHaveLength(0)
		})

		it("rejects tables outside the allow-list", async () => {
			const response = await executeNLQuery(
				{ question: "mortgage rates" },
				buildContext({ generator: llm('{"sql": "SELECT * FROM unknown_table"}') }),
			)
			expect(response).toMatchObject({
				status: "error",
				error_type: "validation",
				message: "Table not allowed: unknown_table",
				sql: "SELECT * FROM unknown_table",
			})
		})

		it("reports an empty question as a validation error", async () => {
			const response = await executeNLQuery({ question: "   " }, buildContext())
			expect(response).toMatchObject({ status: "error", error_type: "validation", message: "Question must not be empty" })
		})
	})

	describe("execution failures", () => {
		it("reports the database error with the executed SQL", async () => {
			const dbError = Object.assign(new Error('column "mort_40yr" does not exist'), { code: "42703" })
			const response = await executeNLQuery(
				{ question: "mortgage rates" },
				buildContext({
					generator: llm('{"sql": "SELECT mort_40yr FROM fred_mortgage_rates"}'),
					executor: new RecordingExecutor(undefined, dbError),
				}),
			)
			expect(response).toEqual({
				status: "error",
				query_id: expect.stringMatching(UUID_PATTERN),
				error_type: "execution",
				message: 'SQL execution failed: column "mort_40yr" does not exist',
				sql: "SELECT mort_40yr FROM fred_mortgage_rates LIMIT 1000",
				dataset_id: "fred_rates",
			})
		})

		it("turns unexpected failures into an error response", async () => {
			const response = await executeNLQuery(
				{ question: "mortgage rates" },
				buildContext({ retriever: fixedRetriever(new Error("index offline")) }),
			)
			expect(response).toMatchObject({
				status: "error",
				error_type: "execution",
				message: "Unexpected error: index offline",
			})
		})
	})

	it("writes one audit entry per response", async () => {
		const logger = recordingLogger()
		const response = await executeNLQuery({ question: "current mortgage rates" }, buildContext({ logger }))

		const audits = vi.mocked(logger.info).mock.calls.filter(([message]) => message === "AUDIT_LOG")
		expect(audits).toHaveLength(1)
		expect(audits[0][1]).toMatchObject({
			query_id: response.query_id,
			question: "current mortgage rates",
			status: "ok",
			dataset_id: "fred_rates",
			generator: "template",
			rows_returned: 2,
			candidates: [{ dataset_id: "fred_rates", score: 0.9 }],
		})
	})
})
