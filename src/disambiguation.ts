/**
 * Dataset disambiguation policy
 *
 * Decides whether a ranked candidate list has a clear winner or whether the
 * caller has to pick. Pure: the same (candidates, override, threshold) always
 * gives the same decision.
 */

import { DEFAULTS } from "./config.js"
import type { DatasetChoice, RetrievalCandidate } from "./schema_types.js"

export interface DisambiguationOptions {
	/** Dataset chosen explicitly by the caller */
	overrideId?: string

	/** Minimum top1 - top2 score gap for an automatic pick */
	threshold?: number

	/** Candidates surfaced when the caller has to choose */
	maxChoices?: number
}

export type DisambiguationDecision =
	| { kind: "selected"; candidate: RetrievalCandidate; reason: "override" | "single_candidate" | "clear_winner" }
	| { kind: "needs_selection"; choices: DatasetChoice[] }
	| { kind: "no_candidates" }

// Scores are rounded to 4 decimals; keep 0.81 - 0.66 from landing just under 0.15
const GAP_EPSILON = 1e-9

export function decideDataset(
	candidates: readonly RetrievalCandidate[],
	options: DisambiguationOptions = {},
): DisambiguationDecision {
	const {
		overrideId,
		threshold = DEFAULTS.disambiguationThreshold,
		maxChoices = DEFAULTS.maxChoices,
	} = options

	if (candidates.length === 0) {
		return { kind: "no_candidates" }
	}

	if (overrideId) {
		const chosen = candidates.find((c) => c.dataset_id === overrideId)
		if (chosen) {
			return { kind: "selected", candidate: chosen, reason: "override" }
		}
	}

	const [top, runnerUp] = candidates
	if (runnerUp === undefined) {
		return { kind: "selected", candidate: top, reason: "single_candidate" }
	}

	if (top.score - runnerUp.score + GAP_EPSILON >= threshold) {
		return { kind: "selected", candidate: top, reason: "clear_winner" }
	}

	return {
		kind: "needs_selection",
		choices: candidates.slice(0, maxChoices).map((c) => ({
			dataset_id: c.dataset_id,
			label: c.label,
			why: c.why,
			score: c.score,
		})),
	}
}
