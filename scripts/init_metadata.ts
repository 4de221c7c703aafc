#!/usr/bin/env npx tsx
/**
 * Initialize the metadata registry
 *
 * Applies config/schema.sql (registry, analytical and embedding tables) in the
 * configured metadata schema, then upserts the registry seed.
 *
 * Usage:
 *   npx tsx scripts/init_metadata.ts [--seed=path/to/seed.json] [--schema-only]
 *
 * Environment variables:
 *   DATABASE_URL - PostgreSQL connection string (default: DB_* / config.yaml)
 */

import * as fs from "fs"
import { Pool } from "pg"
import { loadConfig } from "../src/config/loadConfig.js"
import { createLogger } from "../src/logger.js"
import { DEFAULT_SEED_PATH, loadMetadataSeed, writeMetadataSeed } from "../src/metadata_seed.js"
import { poolConfigFrom } from "../src/pipeline_deps.js"

const SCHEMA_SQL_PATH = new URL("../config/schema.sql", import.meta.url)

interface Options {
	seedPath: string | URL
	schemaOnly: boolean
}

function parseArgs(): Options {
	const options: Options = { seedPath: DEFAULT_SEED_PATH, schemaOnly: false }
	for (const arg of process.argv.slice(2)) {
		if (arg.startsWith("--seed=")) {
			options.seedPath = arg.slice("--seed=".length)
		} else if (arg === "--schema-only") {
			options.schemaOnly = true
		}
	}
	return options
}

async function main(): Promise<void> {
	const options = parseArgs()
	const config = loadConfig()
	const logger = createLogger(config.logging.level)
	const schema = config.database.metadata_schema

	// Validate the seed before touching the database
	const seed = options.schemaOnly ? null : loadMetadataSeed(options.seedPath)

	const pool = new Pool(poolConfigFrom(config, process.env.DATABASE_URL))
	try {
		const client = await pool.connect()
		try {
			await client.query(`CREATE SCHEMA IF NOT EXISTS "${schema}"`)
			await client.query(`SET search_path TO "${schema}", public`)
			await client.query(fs.readFileSync(SCHEMA_SQL_PATH, "utf-8"))
		} finally {
			client.release()
		}
		logger.info("Schema applied", { schema })

		if (seed) {
			await writeMetadataSeed(pool, schema, seed)
			logger.info("Registry seeded", {
				datasets: seed.datasets.length,
				tables: seed.tables.length,
				definitions: seed.definitions.length,
			})
		}
	} catch (error) {
		logger.error("Initialization failed", { error: error instanceof Error ? error.message : String(error) })
		process.exitCode = 1
	} finally {
		await pool.end()
	}
}

main().catch((error: unknown) => {
	console.error("Unhandled error:", error)
	process.exit(1)
})
