/**
 * Dataset Retriever
 *
 * Ranks registered datasets against a question. Two strategies share one
 * contract (most relevant first, at most topK, scores rounded to 4 places):
 *
 * - VectorDatasetRetriever: embeds registry metadata into a vector index on
 *   first use, then sums (1 - distance) over every hit owned by a dataset.
 * - KeywordDatasetRetriever: share of question words (> 2 chars) found in
 *   the dataset name + description.
 *
 * The strategy is picked once, at startup, by createDatasetRetriever().
 */

import { DEFAULTS } from "./config.js"
import type { Logger } from "./logger.js"
import type { MetadataStore } from "./metadata_store.js"
import type { Embedder } from "./model_client.js"
import type { Dataset, IndexEntry, IndexEntryMetadata, RetrievalCandidate } from "./schema_types.js"
import type { VectorIndex } from "./vector_index.js"

export interface DatasetRetriever {
	readonly strategy: "vector" | "keyword"
	retrieve(question: string): Promise<RetrievalCandidate[]>
}

export function roundScore(score: number): number {
	return Math.round(score * 10000) / 10000
}

function toCandidate(dataset: Dataset | undefined, datasetId: string, score: number): RetrievalCandidate {
	return {
		dataset_id: datasetId,
		label: dataset?.dataset_name ?? datasetId,
		why: dataset?.description ?? "",
		score: roundScore(score),
	}
}

// ============================================================================
// Keyword strategy
// ============================================================================

export class KeywordDatasetRetriever implements DatasetRetriever {
	readonly strategy = "keyword" as const

	constructor(
		private store: MetadataStore,
		private topK: number = DEFAULTS.topK,
	) {}

	async retrieve(question: string): Promise<RetrievalCandidate[]> {
		const words = question.toLowerCase().split(/\s+/).filter((w) => w.length > 0)
		if (words.length === 0) return []

		const datasets = await this.store.listDatasets()
		const scored: RetrievalCandidate[] = []

		for (const ds of datasets) {
			const text = `${ds.dataset_name} ${ds.description}`.toLowerCase()
			const hits = words.filter((w) => w.length > 2 && text.includes(w)).length
			const score = hits / Math.max(words.length, 1)
			if (score > 0) {
				scored.push(toCandidate(ds, ds.dataset_id, score))
			}
		}

		// Array.prototype.sort is stable: ties keep registry order
		scored.sort((a, b) => b.score - a.score)
		return scored.slice(0, this.topK)
	}
}

// ============================================================================
// Vector strategy
// ============================================================================

export interface VectorRetrieverOptions {
	topK?: number
	/** Nearest neighbours requested per question */
	maxHits?: number
	logger?: Logger
}

export class VectorDatasetRetriever implements DatasetRetriever {
	readonly strategy = "vector" as const

	private topK: number
	private maxHits: number
	private logger?: Logger
	// Shared in-flight build; concurrent first callers all await the same one
	private indexReady: Promise<void> | null = null

	constructor(
		private store: MetadataStore,
		private index: VectorIndex,
		private embedder: Embedder,
		options: VectorRetrieverOptions = {},
	) {
		this.topK = options.topK ?? DEFAULTS.topK
		this.maxHits = options.maxHits ?? DEFAULTS.vectorHits
		this.logger = options.logger
	}

	/**
	 * Build the index once. Skipped when the index already holds entries.
	 * A failed build clears the guard so the next call can retry.
	 */
	ensureIndex(): Promise<void> {
		if (!this.indexReady) {
			this.indexReady = this.buildIndex().catch((error: unknown) => {
				this.indexReady = null
				throw error
			})
		}
		return this.indexReady
	}

	private async buildIndex(): Promise<void> {
		const existing = await this.index.count()
		if (existing > 0) {
			this.logger?.debug("Vector index already populated", { entries: existing })
			return
		}

		const [datasets, tables, definitions] = await Promise.all([
			this.store.listDatasets(),
			this.store.listTables(),
			this.store.listDefinitions(),
		])

		const pending: Array<{ id: string; text: string; metadata: IndexEntryMetadata }> = []
		for (const ds of datasets) {
			pending.push({
				id: `ds_${ds.dataset_id}`,
				text: `Dataset ${ds.dataset_name} (${ds.domain}): ${ds.description}`,
				metadata: { type: "dataset", dataset_id: ds.dataset_id },
			})
		}
		for (const t of tables) {
			pending.push({
				id: `t_${t.dataset_id}_${t.schema_name}_${t.table_name}`,
				text: `Table ${t.schema_name}.${t.table_name}: ${t.table_desc}`,
				metadata: { type: "table", dataset_id: t.dataset_id, schema: t.schema_name, table: t.table_name },
			})
		}
		for (const d of definitions) {
			pending.push({
				id: `def_${d.dataset_id}_${d.term}`,
				text: `Definition ${d.term}: ${d.definition}`,
				metadata: { type: "definition", dataset_id: d.dataset_id, term: d.term },
			})
		}

		if (pending.length === 0) return

		const embeddings = await this.embedder.embedBatch(pending.map((p) => p.text))
		const entries: IndexEntry[] = pending.map((p, i) => ({ ...p, embedding: embeddings[i] }))
		await this.index.upsert(entries)

		this.logger?.info("Vector index built", {
			datasets: datasets.length,
			tables: tables.length,
			definitions: definitions.length,
		})
	}

	async retrieve(question: string): Promise<RetrievalCandidate[]> {
		if (question.trim().length === 0) return []

		await this.ensureIndex()

		const total = await this.index.count()
		if (total === 0) return []

		const embedding = await this.embedder.embedText(question)
		const hits = await this.index.query(embedding, Math.min(this.maxHits, total))

		const datasetScores = new Map<string, number>()
		for (const hit of hits) {
			const id = hit.metadata.dataset_id
			datasetScores.set(id, (datasetScores.get(id) ?? 0) + (1 - hit.distance))
		}

		const ranked = [...datasetScores.entries()].sort((a, b) => b[1] - a[1]).slice(0, this.topK)
		if (ranked.length === 0) return []

		const datasets = new Map((await this.store.listDatasets()).map((ds) => [ds.dataset_id, ds]))
		return ranked.map(([id, score]) => toCandidate(datasets.get(id), id, score))
	}
}

// ============================================================================
// Factory
// ============================================================================

export interface RetrieverDeps {
	store: MetadataStore
	index?: VectorIndex
	embedder?: Embedder
	logger?: Logger
}

export interface RetrieverSettings {
	strategy: "vector" | "keyword"
	topK: number
	maxHits: number
}

/**
 * Vector retrieval when asked for and both collaborators exist; keyword
 * overlap otherwise.
 */
export function createDatasetRetriever(settings: RetrieverSettings, deps: RetrieverDeps): DatasetRetriever {
	if (settings.strategy === "vector" && deps.index && deps.embedder) {
		return new VectorDatasetRetriever(deps.store, deps.index, deps.embedder, {
			topK: settings.topK,
			maxHits: settings.maxHits,
			logger: deps.logger,
		})
	}

	if (settings.strategy === "vector") {
		deps.logger?.warn("Vector retrieval requested but no embedder/index available, using keyword retrieval")
	}
	return new KeywordDatasetRetriever(deps.store, settings.topK)
}
