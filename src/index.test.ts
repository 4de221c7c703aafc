import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { Client } from "@modelcontextprotocol/sdk/client/index.js"
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js"
import { z } from "zod"
import { nlqConfigSchema } from "./config/loadConfig.js"
import createServer, { SERVICE_NAME, type NLQServer } from "./index.js"
import { silentLogger } from "./logger.js"
import { loadMetadataSeed } from "./metadata_seed.js"
import { DEFAULT_QUERY_SETTINGS } from "./nl_query_tool.js"
import { TemplateSqlGenerator } from "./sql_generator.js"
import { KeywordDatasetRetriever } from "./dataset_retriever.js"
import { InMemoryMetadataStore, RecordingExecutor } from "./testing/fakes.js"

const toolResultSchema = z.object({
	content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
	isError: z.boolean().optional(),
})

function parseToolResult(result: unknown): { payload: unknown; isError: boolean } {
	const parsed = toolResultSchema.parse(result)
	return { payload: JSON.parse(parsed.content[0].text), isError: parsed.isError ?? false }
}

let nlq: NLQServer
let client: Client
let executor: RecordingExecutor

beforeEach(async () => {
	const store = new InMemoryMetadataStore(loadMetadataSeed())
	executor = new RecordingExecutor({ columns: ["date", "mort_30yr"], rows: [{ date: "2024-01-04", mort_30yr: 6.62 }] })
	nlq = createServer({
		config: {},
		logger: silentLogger,
		settings: nlqConfigSchema.parse({}),
		context: {
			retriever: new KeywordDatasetRetriever(store, 3),
			store,
			generator: new TemplateSqlGenerator(),
			executor,
			settings: DEFAULT_QUERY_SETTINGS,
			logger: silentLogger,
		},
	})

	const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
	await nlq.server.connect(serverTransport)
	client = new Client({ name: "test-client", version: "1.0.0" })
	await client.connect(clientTransport)
})

afterEach(async () => {
	await client.close()
	await nlq.close()
})

describe("MCP server", () => {
	it("registers the query tools", async () => {
		const { tools } = await client.listTools()
		expect(tools.map((t) => t.name).sort()).toEqual(["health", "list_datasets", "nl_disambiguate", "nl_query"])
	})

	it("answers health checks", async () => {
		const { payload, isError } = parseToolResult(await client.callTool({ name: "health", arguments: {} }))
		expect(isError).toBe(false)
		expect(payload).toEqual({ status: "ok", service: SERVICE_NAME })
	})

	it("lists the registered datasets", async () => {
		const { payload } = parseToolResult(await client.callTool({ name: "list_datasets", arguments: {} }))
		expect(payload).toMatchObject({
			datasets: [
				{ id: "cpfb_delinquency", name: "CPFB Mortgage Delinquency", domain: "delinquency" },
				{ id: "fred_rates", name: "FRED Mortgage Rates", domain: "rates" },
				{ id: "fhfa_hpi", name: "FHFA House Price Index", domain: "housing" },
			],
		})
	})

	it("answers a question end to end", async () => {
		// keyword scores: fred_rates 1.0, cpfb_delinquency 0.5, fhfa_hpi 0
		const { payload, isError } = parseToolResult(
			await client.callTool({ name: "nl_query", arguments: { question: "mortgage rates" } }),
		)
		expect(isError).toBe(false)
		expect(payload).toMatchObject({
			status: "ok",
			dataset_id: "fred_rates",
			sql: "SELECT * FROM fred_mortgage_rates WHERE date >= '2023-01-01' ORDER BY date DESC LIMIT 100",
			results: { columns: ["date", "mort_30yr"], rows: [{ date: "2024-01-04", mort_30yr: 6.62 }] },
			generator: "template",
		})
	})

	it("offers a choice and continues with the picked dataset", async () => {
		// "mortgage" and "data" appear in the cpfb and fred descriptions alike
		const first = parseToolResult(await client.callTool({ name: "nl_query", arguments: { question: "mortgage data" } }))
		expect(first.payload).toMatchObject({
			status: "needs_selection",
			choices: [{ dataset_id: "cpfb_delinquency" }, { dataset_id: "fred_rates" }],
		})

		const second = parseToolResult(
			await client.callTool({ name: "nl_disambiguate", arguments: { question: "mortgage data", dataset_id: "fred_rates" } }),
		)
		expect(second.payload).toMatchObject({ status: "ok", dataset_id: "fred_rates" })
		expect(executor.calls).toHaveLength(1)
	})

	it("flags error responses", async () => {
		const { payload, isError } = parseToolResult(
			await client.callTool({ name: "nl_query", arguments: { question: "weather forecast tomorrow" } }),
		)
		expect(isError).toBe(true)
		expect(payload).toMatchObject({ status: "error", error_type: "retrieval" })
	})
})
