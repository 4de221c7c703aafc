/**
 * Ollama HTTP Client
 *
 * Handles communication with the model server.
 *
 * Responsibilities:
 * - Chat completion for SQL generation (/api/chat)
 * - Text embeddings for metadata retrieval (/api/embed)
 * - Timeouts, and mapping HTTP/network failures onto NLQError
 */

import { z } from "zod"
import { NLQError } from "./config.js"

/**
 * Generative text service: prompt in, text out
 */
export interface TextCompletionClient {
	complete(systemPrompt: string, userPrompt: string): Promise<string>
}

/**
 * Embedding service used by the vector retrieval strategy
 */
export interface Embedder {
	embedText(text: string): Promise<number[]>
	embedBatch(texts: string[]): Promise<number[][]>
}

export interface OllamaClientOptions {
	baseUrl: string
	/** Chat model; empty disables completion */
	llmModel: string
	/** Embedding model; empty disables embeddings */
	embeddingModel: string
	timeoutMs: number
	temperature?: number
}

const chatResponseSchema = z.object({
	message: z.object({
		content: z.string(),
	}),
})

const embedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
})

export class OllamaClient implements TextCompletionClient, Embedder {
	private baseUrl: string
	private llmModel: string
	private embeddingModel: string
	private timeout: number
	private temperature: number

	constructor(options: OllamaClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.llmModel = options.llmModel
		this.embeddingModel = options.embeddingModel
		this.timeout = options.timeoutMs
		this.temperature = options.temperature ?? 0
	}

	get canComplete(): boolean {
		return this.llmModel.length > 0
	}

	get canEmbed(): boolean {
		return this.embeddingModel.length > 0
	}

	/**
	 * Generate text from a system + user prompt pair
	 */
	async complete(systemPrompt: string, userPrompt: string): Promise<string> {
		const data = await this.post(
			"/api/chat",
			{
				model: this.llmModel,
				stream: false,
				options: { temperature: this.temperature },
				messages: [
					{ role: "system", content: systemPrompt },
					{ role: "user", content: userPrompt },
				],
			},
			"generation",
		)

		const parsed = chatResponseSchema.safeParse(data)
		if (!parsed.success) {
			throw new NLQError("generation", "Model returned an unexpected chat response", false, {
				issues: parsed.error.issues.map((i) => i.message),
			})
		}
		return parsed.data.message.content
	}

	/**
	 * Get embedding for one text
	 */
	async embedText(text: string): Promise<number[]> {
		const [embedding] = await this.embedBatch([text])
		if (!embedding) {
			throw new NLQError("retrieval", "Embedding response was empty", true)
		}
		return embedding
	}

	/**
	 * Get embeddings for multiple texts in one request
	 */
	async embedBatch(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) return []

		const data = await this.post("/api/embed", { model: this.embeddingModel, input: texts }, "retrieval")

		const parsed = embedResponseSchema.safeParse(data)
		if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
			throw new NLQError("retrieval", `Batch embedding returned an unexpected response (${texts.length} texts)`, false)
		}
		return parsed.data.embeddings
	}

	private async post(endpoint: string, body: unknown, errorType: "generation" | "retrieval"): Promise<unknown> {
		const url = `${this.baseUrl}${endpoint}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new NLQError(
					errorType,
					`Model server returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			return await response.json()
		} catch (error) {
			// Handle timeout
			if (error instanceof Error && error.name === "AbortError") {
				throw new NLQError("timeout", `Model server request timed out after ${this.timeout}ms`, true, {
					timeout: this.timeout,
					url,
				})
			}

			if (error instanceof NLQError) {
				throw error
			}

			// fetch raises TypeError when the server is unreachable
			if (error instanceof TypeError) {
				throw new NLQError(errorType, `Cannot connect to model server at ${this.baseUrl}. Is it running?`, true, {
					baseUrl: this.baseUrl,
					originalError: error.message,
				})
			}

			throw new NLQError(errorType, `Unexpected error communicating with model server: ${String(error)}`, false, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
		}
	}
}
