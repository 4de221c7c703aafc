#!/usr/bin/env node
/**
 * Stdio entry point for the Credit NLQ MCP Server
 *
 * Config priority:
 *   1. .mcp.json file in the project root (highest priority)
 *   2. CLI argument
 *   3. POSTGRES_CONNECTION_STRING, else the DB_* settings from config.yaml
 *
 * Usage:
 *   node stdio.js '{"postgresConnectionString":"postgresql://..."}'
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { existsSync, readFileSync } from "fs"
import { dirname, join } from "path"
import { fileURLToPath } from "url"
import { getConfig } from "./config/loadConfig.js"
import createServer, { configSchema, type ServerConfig } from "./index.js"
import { createLogger, parseLogLevel } from "./logger.js"

const settings = getConfig()
// stdout is reserved for the MCP protocol; the logger writes to stderr
let logger = createLogger(settings.logging.level)

function loadConfigFromFile(): ServerConfig | null {
	const configPath = join(dirname(fileURLToPath(import.meta.url)), "..", ".mcp.json")
	if (!existsSync(configPath)) return null

	try {
		const validated = configSchema.parse(JSON.parse(readFileSync(configPath, "utf-8")))
		logger.info("Config loaded", { source: configPath })
		return validated
	} catch (e) {
		logger.warn("Failed to load config from .mcp.json", { error: e instanceof Error ? e.message : String(e) })
		return null
	}
}

function resolveServerConfig(): ServerConfig {
	const fileConfig = loadConfigFromFile()
	if (fileConfig) return fileConfig

	const configArg = process.argv[2]
	if (configArg) {
		const validated = configSchema.parse(JSON.parse(configArg))
		logger.info("Config loaded", { source: "cli" })
		return validated
	}

	if (process.env.POSTGRES_CONNECTION_STRING) {
		logger.info("Config loaded", { source: "env" })
		return configSchema.parse({ postgresConnectionString: process.env.POSTGRES_CONNECTION_STRING })
	}

	logger.info("Config loaded", { source: "config.yaml" })
	return {}
}

async function main(): Promise<void> {
	const config = resolveServerConfig()
	if (config.logLevel) {
		logger = createLogger(parseLogLevel(config.logLevel))
	}

	const target = config.postgresConnectionString
		? config.postgresConnectionString.replace(/:[^:@]+@/, ":***@")
		: `${settings.database.host}:${settings.database.port}/${settings.database.name}`
	logger.info("Starting Credit NLQ MCP Server with stdio transport", { database: target })

	const nlq = createServer({ config, logger, settings })
	await nlq.server.connect(new StdioServerTransport())

	logger.info("Credit NLQ MCP Server running via stdio")

	const shutdown = (signal: string): void => {
		logger.info("Shutting down...", { signal })
		nlq
			.close()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) })
				process.exit(1)
			})
	}

	process.on("SIGINT", () => shutdown("SIGINT"))
	process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error: unknown) => {
	logger.error("Fatal error", { error: error instanceof Error ? error.message : String(error) })
	process.exit(1)
})
