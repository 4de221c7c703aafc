/**
 * SQL execution against the analytical store
 *
 * Each statement runs on its own pooled connection inside a READ ONLY
 * transaction that is always rolled back, with a per-statement timeout.
 * Statements go over the extended protocol, which accepts exactly one
 * statement per call. Unqualified table names resolve in the configured
 * schema first, then public.
 * Temporal values come back as text: DATE columns as `YYYY-MM-DD`,
 * timestamps as ISO-8601.
 */

import { types, type QueryConfig, type QueryResult } from "pg"

export interface ExecutionResult {
	columns: string[]
	rows: Record<string, unknown>[]
}

export interface ExecuteOptions {
	timeoutSeconds: number
}

export interface QueryExecutor {
	execute(sql: string, options: ExecuteOptions): Promise<ExecutionResult>
}

/** The slice of a pg Pool the executor uses */
export interface ExecutorPool {
	connect(): Promise<ExecutorClient>
}

export interface ExecutorClient {
	query(queryTextOrConfig: string | QueryConfig): Promise<QueryResult<Record<string, unknown>>>
	release(): void
}

export interface PgQueryExecutorOptions {
	/** Schema searched before public for unqualified table names */
	schema?: string
}

// pg reads queryMode at run time; its published types leave it out
interface ExtendedQueryConfig extends QueryConfig {
	queryMode: "extended"
}

// Keep DATE as the server's text form instead of a local-midnight Date
types.setTypeParser(types.builtins.DATE, (value: string) => value)

export function serializeValue(value: unknown): unknown {
	if (value instanceof Date) {
		return isNaN(value.getTime()) ? null : value.toISOString()
	}
	if (Array.isArray(value)) {
		return value.map(serializeValue)
	}
	return value
}

export function serializeRow(row: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {}
	for (const [key, value] of Object.entries(row)) {
		out[key] = serializeValue(value)
	}
	return out
}

export class PgQueryExecutor implements QueryExecutor {
	private pool: ExecutorPool
	private schema?: string

	constructor(pool: ExecutorPool, options: PgQueryExecutorOptions = {}) {
		this.pool = pool
		this.schema = options.schema
	}

	async execute(sql: string, options: ExecuteOptions): Promise<ExecutionResult> {
		const client = await this.pool.connect()
		try {
			await client.query("BEGIN READ ONLY")
			try {
				await client.query(`SET LOCAL statement_timeout = ${Math.round(options.timeoutSeconds * 1000)}`)
				if (this.schema) {
					await client.query(`SET LOCAL search_path TO "${this.schema}", public`)
				}
				const statement: ExtendedQueryConfig = { text: sql, queryMode: "extended" }
				const result = await client.query(statement)
				return {
					columns: result.fields.map((f) => f.name),
					rows: result.rows.map(serializeRow),
				}
			} finally {
				await client.query("ROLLBACK")
			}
		} finally {
			client.release()
		}
	}
}
