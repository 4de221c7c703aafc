/**
 * Credit NLQ MCP Server
 *
 * Exposes the query-resolution pipeline as MCP tools:
 * - nl_query: answer a question, auto-selecting the dataset when it can
 * - nl_disambiguate: continue after the caller picked a dataset
 * - list_datasets: registered datasets
 * - health: liveness
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { Pool } from "pg"
import { z } from "zod"
import { getConfig, type NLQConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"
import { executeNLQuery, type NLQueryToolContext } from "./nl_query_tool.js"
import { createPipelineContext, poolConfigFrom } from "./pipeline_deps.js"
import type { QueryResponse } from "./schema_types.js"

export const SERVICE_NAME = "credit-nlq"
export const SERVICE_VERSION = "1.0.0"

export const configSchema = z.object({
	postgresConnectionString: z.string().min(1).optional(),
	logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
})

export type ServerConfig = z.infer<typeof configSchema>

export interface CreateServerOptions {
	config: ServerConfig
	logger: Logger
	/** Loaded settings; defaults to getConfig() */
	settings?: NLQConfig
	/** Pre-built pipeline (tests); when absent a pg Pool is opened */
	context?: NLQueryToolContext
}

export interface NLQServer {
	server: McpServer
	context: NLQueryToolContext
	close(): Promise<void>
}

type ToolResult = {
	content: Array<{ type: "text"; text: string }>
	isError?: boolean
}

function jsonResult(payload: unknown, isError: boolean = false): ToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
		...(isError ? { isError: true } : {}),
	}
}

function queryResult(response: QueryResponse): ToolResult {
	return jsonResult(response, response.status === "error")
}

export default function createServer(options: CreateServerOptions): NLQServer {
	const { config, logger } = options
	const settings = options.settings ?? getConfig()

	let pool: Pool | null = null
	let context = options.context
	if (!context) {
		pool = new Pool(poolConfigFrom(settings, config.postgresConnectionString))
		pool.on("error", (err) => logger.error("Idle Postgres client error", { error: err.message }))
		context = createPipelineContext(settings, { pool, logger })
	}
	const ctx = context

	const server = new McpServer({
		name: SERVICE_NAME,
		version: SERVICE_VERSION,
	})

	server.registerTool(
		"nl_query",
		{
			description:
				"Answer a natural-language question about mortgage/credit data (delinquency, mortgage rates, house prices). " +
				"Returns rows, or asks which dataset to use, or asks a clarifying question.",
			inputSchema: {
				question: z.string().min(1).describe("Natural language question"),
				preferred_dataset: z.string().optional().describe("Dataset ID to use instead of the top-ranked one"),
				timeout_seconds: z.number().positive().max(300).optional().describe("Bound for generation and execution"),
			},
		},
		async ({ question, preferred_dataset, timeout_seconds }) => {
			const response = await executeNLQuery({ question, dataset_id: preferred_dataset, timeout_seconds }, ctx)
			return queryResult(response)
		},
	)

	server.registerTool(
		"nl_disambiguate",
		{
			description: "Continue a question after choosing one of the datasets offered by a needs_selection response.",
			inputSchema: {
				question: z.string().min(1).describe("The original question"),
				dataset_id: z.string().min(1).describe("Dataset chosen from the offered choices"),
			},
		},
		async ({ question, dataset_id }) => {
			const response = await executeNLQuery({ question, dataset_id }, ctx)
			return queryResult(response)
		},
	)

	server.registerTool(
		"list_datasets",
		{
			description: "List the datasets questions can be answered from.",
		},
		async () => {
			try {
				const datasets = await ctx.store.listDatasets()
				return jsonResult({
					datasets: datasets.map((d) => ({
						id: d.dataset_id,
						name: d.dataset_name,
						domain: d.domain,
						description: d.description,
					})),
				})
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error)
				logger.error("list_datasets failed", { error: message })
				return jsonResult({ error: message }, true)
			}
		},
	)

	server.registerTool(
		"health",
		{
			description: "Health check.",
		},
		async () => jsonResult({ status: "ok", service: SERVICE_NAME }),
	)

	return {
		server,
		context: ctx,
		async close() {
			await server.close()
			if (pool) {
				await pool.end()
			}
		},
	}
}
