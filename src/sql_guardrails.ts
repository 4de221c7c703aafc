/**
 * SQL Guardrails
 *
 * Deny-list and table allow-list checks applied to every statement before it
 * reaches the database, plus LIMIT injection.
 *
 * The keyword scan runs over the whole statement text, string literals and
 * comments included. A column such as `created_at` trips the `create` token;
 * that false positive is accepted. Table references are found by pattern
 * (`FROM x` / `JOIN x`), not by parsing, so the check is only as good as the
 * regex below. Only one statement is accepted: a `;` may appear solely at
 * the end.
 */

export type GuardrailCode = "EMPTY_SQL" | "BLOCKED_KEYWORD" | "MULTIPLE_STATEMENTS" | "TABLE_NOT_ALLOWED"

export type GuardrailResult =
	| { valid: true }
	| { valid: false; code: GuardrailCode; reason: string; offending?: string }

/**
 * Tokens rejected anywhere in the statement (case-insensitive substring match).
 * Order matters: the first hit is the one reported.
 */
export const BLOCKED_TOKENS = [
	"insert",
	"update",
	"delete",
	"drop",
	"alter",
	"create",
	"truncate",
	"grant",
	"revoke",
	"execute",
	"exec",
	"xp_",
	"sp_",
	";--",
	"/*",
	"*/",
] as const

const TABLE_REF_PATTERN = /\b(?:FROM|JOIN)\s+(?:\w+\.)?([a-zA-Z0-9_]+)/gi

/**
 * Table names referenced after FROM/JOIN, schema prefix dropped,
 * in order of first appearance.
 */
export function extractReferencedTables(sql: string): string[] {
	const seen = new Set<string>()
	const tables: string[] = []
	for (const match of sql.matchAll(TABLE_REF_PATTERN)) {
		const name = match[1]
		const key = name.toLowerCase()
		if (!seen.has(key)) {
			seen.add(key)
			tables.push(name)
		}
	}
	return tables
}

function bareTableName(name: string): string {
	const dot = name.lastIndexOf(".")
	return (dot >= 0 ? name.slice(dot + 1) : name).toLowerCase()
}

/**
 * Validate a candidate statement against the safety policy.
 *
 * Passing means read-only by policy and scoped to known tables. It says
 * nothing about syntax; the database reports that at execution time.
 */
export function validateSQL(sql: string, allowedTables: readonly string[]): GuardrailResult {
	if (!sql || sql.trim().length === 0) {
		return { valid: false, code: "EMPTY_SQL", reason: "Empty SQL" }
	}

	const lowered = sql.toLowerCase()
	for (const token of BLOCKED_TOKENS) {
		if (lowered.includes(token)) {
			return {
				valid: false,
				code: "BLOCKED_KEYWORD",
				reason: `Blocked keyword: ${token}`,
				offending: token,
			}
		}
	}

	const body = sql.trim().replace(/;\s*$/, "")
	if (body.includes(";")) {
		return {
			valid: false,
			code: "MULTIPLE_STATEMENTS",
			reason: "Multiple statements are not allowed",
			offending: ";",
		}
	}

	const allowed = new Set(allowedTables.map(bareTableName))
	for (const table of extractReferencedTables(sql)) {
		if (!allowed.has(table.toLowerCase())) {
			return {
				valid: false,
				code: "TABLE_NOT_ALLOWED",
				reason: `Table not allowed: ${table}`,
				offending: table,
			}
		}
	}

	return { valid: true }
}

/**
 * Append `LIMIT n` when the statement has no LIMIT anywhere.
 *
 * A trailing `;` is dropped first so the clause attaches to the statement.
 * When the last line ends in a `--` comment the clause goes on a new line.
 * Applying this twice gives the same result as applying it once.
 */
export function injectLimit(sql: string, defaultLimit: number): string {
	let s = sql.trim()
	if (/limit/i.test(s)) {
		return s
	}
	if (s.endsWith(";")) {
		s = s.slice(0, -1).trimEnd()
	}
	const lastLine = s.slice(s.lastIndexOf("\n") + 1)
	const separator = lastLine.includes("--") ? "\n" : " "
	return `${s}${separator}LIMIT ${defaultLimit}`
}
