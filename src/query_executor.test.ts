import { describe, it, expect } from "vitest"
import type { FieldDef, QueryConfig, QueryResult } from "pg"
import {
	PgQueryExecutor,
	serializeRow,
	serializeValue,
	type ExecutorClient,
	type ExecutorPool,
} from "./query_executor.js"

function field(name: string): FieldDef {
	return { name, tableID: 0, columnID: 0, dataTypeID: 0, dataTypeSize: -1, dataTypeModifier: -1, format: "text" }
}

function emptyResult(command: string): QueryResult<Record<string, unknown>> {
	return { command, rowCount: null, oid: 0, fields: [], rows: [] }
}

/** Records every statement; the one non-string query gets `result` or throws `failWith` */
class RecordingPool implements ExecutorPool {
	statements: (string | QueryConfig)[] = []
	released = 0

	constructor(
		private result: QueryResult<Record<string, unknown>>,
		private failWith?: Error,
	) {}

	async connect(): Promise<ExecutorClient> {
		return {
			query: async (queryTextOrConfig) => {
				this.statements.push(queryTextOrConfig)
				if (typeof queryTextOrConfig === "string") return emptyResult(queryTextOrConfig)
				if (this.failWith) throw this.failWith
				return this.result
			},
			release: () => {
				this.released++
			},
		}
	}
}

const RATE_RESULT: QueryResult<Record<string, unknown>> = {
	command: "SELECT",
	rowCount: 1,
	oid: 0,
	fields: [field("date"), field("loaded_at")],
	rows: [{ date: "2024-01-04", loaded_at: new Date("2024-01-05T08:00:00Z") }],
}

describe("PgQueryExecutor", () => {
	it("runs the statement read-only with a timeout and rolls back", async () => {
		const pool = new RecordingPool(RATE_RESULT)
		const result = await new PgQueryExecutor(pool).execute("SELECT date, loaded_at FROM fred_mortgage_rates", {
			timeoutSeconds: 2.5,
		})

		expect(result).toEqual({
			columns: ["date", "loaded_at"],
			rows: [{ date: "2024-01-04", loaded_at: "2024-01-05T08:00:00.000Z" }],
		})
		expect(pool.statements).toEqual([
			"BEGIN READ ONLY",
			"SET LOCAL statement_timeout = 2500",
			{ text: "SELECT date, loaded_at FROM fred_mortgage_rates", queryMode: "extended" },
			"ROLLBACK",
		])
		expect(pool.released).toBe(1)
	})

	it("sends the statement over the single-statement extended protocol", async () => {
		const pool = new RecordingPool(RATE_RESULT)
		await new PgQueryExecutor(pool).execute("SELECT 1 FROM fred_mortgage_rates; COMMIT", { timeoutSeconds: 1 })
		expect(pool.statements[2]).toEqual({ text: "SELECT 1 FROM fred_mortgage_rates; COMMIT", queryMode: "extended" })
	})

	it("searches the configured schema before public", async () => {
		const pool = new RecordingPool(RATE_RESULT)
		await new PgQueryExecutor(pool, { schema: "nlq_meta" }).execute("SELECT * FROM fred_mortgage_rates", {
			timeoutSeconds: 30,
		})
		expect(pool.statements.slice(0, 3)).toEqual([
			"BEGIN READ ONLY",
			"SET LOCAL statement_timeout = 30000",
			'SET LOCAL search_path TO "nlq_meta", public',
		])
	})

	it("rolls back and releases when the statement fails", async () => {
		const pool = new RecordingPool(RATE_RESULT, new Error('relation "nope" does not exist'))
		await expect(
			new PgQueryExecutor(pool).execute("SELECT * FROM nope", { timeoutSeconds: 1 }),
		).rejects.toThrow('relation "nope" does not exist')
		expect(pool.statements.at(-1)).toBe("ROLLBACK")
		expect(pool.released).toBe(1)
	})
})

describe("serializeValue", () => {
	it("renders timestamps as ISO-8601", () => {
		expect(serializeValue(new Date("2024-03-01T12:30:00Z"))).toBe("2024-03-01T12:30:00.000Z")
	})

	it("turns invalid dates into null", () => {
		expect(serializeValue(new Date("not a date"))).toBeNull()
	})

	it("recurses into arrays and leaves other values alone", () => {
		expect(serializeValue([new Date("2024-01-01T00:00:00Z"), 1])).toEqual(["2024-01-01T00:00:00.000Z", 1])
		expect(serializeValue("2024-01-04")).toBe("2024-01-04")
		expect(serializeValue(6.62)).toBe(6.62)
		expect(serializeValue(null)).toBeNull()
	})
})

describe("serializeRow", () => {
	it("serializes every column", () => {
		expect(serializeRow({ date: "2024-01-04", loaded_at: new Date("2024-01-05T08:00:00Z"), mort_30yr: 6.62 })).toEqual({
			date: "2024-01-04",
			loaded_at: "2024-01-05T08:00:00.000Z",
			mort_30yr: 6.62,
		})
	})
})
