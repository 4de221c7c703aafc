/**
 * Unified config loader for the credit NLQ server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated by a zod schema that also supplies
 * defaults, so a missing file or key falls back to the documented values.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { DEFAULTS, DEFAULT_ALLOWED_TABLES } from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("credit_analytics"),
	user: z.string().default("postgres"),
	password: z.string().default(""),
	metadata_schema: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/).default("public"),
})

const modelSchema = z.object({
	provider: z.enum(["ollama", "none"]).default("none"),
	llm: z.string().default(""),
	embedding: z.string().default(""),
	ollama_url: z.string().default("http://localhost:11434"),
	timeout_ms: z.number().int().positive().default(60000),
	temperature: z.number().min(0).max(2).default(0),
	sql_system_prompt: z.string().default(""),
})

const retrievalSchema = z.object({
	strategy: z.enum(["vector", "keyword"]).default("keyword"),
	top_k: z.number().int().positive().default(DEFAULTS.topK),
	disambiguation_threshold: z.number().min(0).default(DEFAULTS.disambiguationThreshold),
	vector_hits: z.number().int().positive().default(DEFAULTS.vectorHits),
})

const guardrailsSchema = z.object({
	allowed_tables: z.array(z.string().min(1)).default(DEFAULT_ALLOWED_TABLES),
	default_limit: z.number().int().positive().default(DEFAULTS.defaultLimit),
})

const executionSchema = z.object({
	timeout_seconds: z.number().positive().default(DEFAULTS.timeoutSeconds),
})

const loggingSchema = z.object({
	level: z.enum(["debug", "info", "warn", "error"]).default("info"),
})

export const nlqConfigSchema = z.object({
	database: databaseSchema.default({}),
	model: modelSchema.default({}),
	retrieval: retrievalSchema.default({}),
	guardrails: guardrailsSchema.default({}),
	execution: executionSchema.default({}),
	logging: loggingSchema.default({}),
})

export type NLQConfig = z.infer<typeof nlqConfigSchema>

type ConfigRecord = Record<string, unknown>

function isRecord(value: unknown): value is ConfigRecord {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): ConfigRecord {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigRecord, b: ConfigRecord): ConfigRecord {
	const result: ConfigRecord = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(right) && isRecord(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}
function envList(name: string): string[] | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
}

function section(cfg: ConfigRecord, key: string): ConfigRecord {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: ConfigRecord = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: ConfigRecord): void {
	// database
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.metadata_schema = env("DB_METADATA_SCHEMA") ?? db.metadata_schema

	// model
	const m = section(cfg, "model")
	m.provider = env("MODEL_PROVIDER") ?? m.provider
	m.llm = env("OLLAMA_MODEL") ?? m.llm
	m.embedding = env("EMBEDDING_MODEL") ?? m.embedding
	m.ollama_url = env("OLLAMA_BASE_URL") ?? m.ollama_url
	m.timeout_ms = envInt("OLLAMA_TIMEOUT_MS") ?? m.timeout_ms
	m.temperature = envFloat("TEMPERATURE") ?? m.temperature
	m.sql_system_prompt = env("SQL_SYSTEM_PROMPT") ?? m.sql_system_prompt

	// retrieval
	const r = section(cfg, "retrieval")
	r.strategy = env("RETRIEVAL_STRATEGY") ?? r.strategy
	r.top_k = envInt("RETRIEVAL_TOP_K") ?? r.top_k
	r.disambiguation_threshold = envFloat("DISAMBIGUATION_THRESHOLD") ?? r.disambiguation_threshold
	r.vector_hits = envInt("VECTOR_HITS") ?? r.vector_hits

	// guardrails
	const g = section(cfg, "guardrails")
	g.allowed_tables = envList("ALLOWED_TABLES") ?? g.allowed_tables
	g.default_limit = envInt("DEFAULT_QUERY_LIMIT") ?? g.default_limit

	// execution
	const e = section(cfg, "execution")
	e.timeout_seconds = envFloat("QUERY_TIMEOUT_SECONDS") ?? e.timeout_seconds

	// logging
	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL")?.toLowerCase() ?? l.level
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: NLQConfig | null = null

export function loadConfig(): NLQConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigRecord = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = nlqConfigSchema.parse(merged)
	return _config
}

export function getConfig(): NLQConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
