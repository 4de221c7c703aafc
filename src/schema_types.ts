/**
 * Schema Types for dataset retrieval and query resolution
 *
 * Defines types for:
 * - Metadata registry rows (datasets, tables, domain definitions)
 * - GroundingPayload (context handed to the SQL generator)
 * - Retrieval candidates
 * - Parsed generation output
 * - QueryResponse (tool output)
 */

// ============================================================================
// Metadata Registry
// ============================================================================

/**
 * Row of nlq_dataset_registry
 */
export interface Dataset {
	dataset_id: string
	dataset_name: string
	domain: string
	description: string
	grain: string | null
	freshness_sla: string | null
	owner_team: string | null
	pii_level: string | null
}

/**
 * Row of nlq_table_registry. Identity is (dataset_id, schema_name, table_name).
 */
export interface TableDescriptor {
	dataset_id: string
	schema_name: string
	table_name: string
	table_desc: string
	primary_keys: string | null
	partition_cols: string | null
	join_hints: string | null
	important_cols: string | null
	example_filters: string | null
}

/**
 * Row of nlq_domain_definitions. Identity is (dataset_id, term).
 */
export interface DomainDefinition {
	dataset_id: string
	term: string
	definition: string
	formula_sql: string | null
	notes: string | null
}

/**
 * Everything the generator is allowed to know about one dataset.
 * Rebuilt for every request.
 */
export interface GroundingPayload {
	dataset: Dataset
	tables: TableDescriptor[]
	definitions: DomainDefinition[]
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Ranked dataset returned by a DatasetRetriever.
 *
 * Scores from the vector and keyword strategies are on different scales and
 * are only comparable within one retrieve() call.
 */
export interface RetrievalCandidate {
	dataset_id: string
	label: string
	why: string
	score: number
}

/**
 * Tag stored alongside each vector index entry
 */
export type IndexEntryMetadata =
	| { type: "dataset"; dataset_id: string }
	| { type: "table"; dataset_id: string; schema: string; table: string }
	| { type: "definition"; dataset_id: string; term: string }

export interface IndexEntry {
	id: string
	text: string
	embedding: number[]
	metadata: IndexEntryMetadata
}

export interface IndexHit {
	metadata: IndexEntryMetadata
	distance: number
}

// ============================================================================
// Generation
// ============================================================================

export interface GenerationMetadata {
	assumptions?: string[]
	tables_used?: string[]
	explanation?: string
}

export type ParsedGenerationResult =
	| { kind: "sql"; sql: string; metadata: GenerationMetadata; strategy: "structured" | "fenced" | "raw" | "template" }
	| { kind: "clarification"; question: string }
	| { kind: "failure"; reason: string }

// ============================================================================
// Query Response
// ============================================================================

export interface QueryResults {
	columns: string[]
	rows: Record<string, unknown>[]
}

export interface QueryExplanation {
	tables: string[]
	assumptions: string[]
	notes: string
}

export interface DatasetChoice {
	dataset_id: string
	label: string
	why: string
	score: number
}

export type QueryErrorType = "retrieval" | "generation" | "validation" | "execution" | "timeout"

export type QueryResponse =
	| {
			status: "ok"
			query_id: string
			dataset_id: string
			sql: string
			results: QueryResults
			explanation: QueryExplanation
			generator: "llm" | "template"
	  }
	| {
			status: "needs_selection"
			query_id: string
			choices: DatasetChoice[]
			message: string
	  }
	| {
			status: "needs_clarification"
			query_id: string
			dataset_id: string
			clarifying_question: string
	  }
	| {
			status: "error"
			query_id: string
			error_type: QueryErrorType
			message: string
			sql?: string
			dataset_id?: string
	  }
