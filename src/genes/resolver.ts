import { hasFailureKind } from "../entrez/errors";
import type {
  CandidateId,
  GeneQueryClient,
  GeneSymbol,
  ResolutionBasis,
  ResolutionResult,
  UnresolvedCode
} from "./types";

export const SEARCH_MAX_RESULTS = 25;
export const SEARCH_SORT_ORDER = "relevance";

type Decision = { geneId: CandidateId; basis: ResolutionBasis };

/**
 * Resolves one gene symbol to an Entrez Gene id.
 *
 * Exhausted retries and malformed records end as `lookup_failed` for this
 * symbol only. Any other error is rethrown.
 */
export async function resolveGeneSymbol(symbol: GeneSymbol, client: GeneQueryClient): Promise<ResolutionResult> {
  let candidates: CandidateId[] = [];
  const discontinued: CandidateId[] = [];

  try {
    candidates = await client.search(symbol, SEARCH_MAX_RESULTS, SEARCH_SORT_ORDER);

    if (candidates.length === 0) {
      return unresolved(symbol, "no_candidates", "no candidates", candidates, discontinued);
    }

    if (candidates.length === 1) {
      const [soleId] = candidates;
      const record = await client.fetchRecord(soleId);
      if (record.discontinued) {
        discontinued.push(soleId);
        return unresolved(symbol, "sole_candidate_discontinued", "sole candidate discontinued", candidates, discontinued);
      }
      return { status: "resolved", symbol, geneId: soleId, basis: "sole_candidate", candidates, discontinued };
    }

    const decision = await pickAmongCandidates(symbol, candidates, client, discontinued);
    return { status: "resolved", symbol, ...decision, candidates, discontinued };
  } catch (error) {
    if (hasFailureKind(error, "exhausted_retries") || hasFailureKind(error, "malformed_record")) {
      return unresolved(symbol, "lookup_failed", error.message, candidates, discontinued);
    }
    throw error;
  }
}

async function pickAmongCandidates(
  symbol: GeneSymbol,
  candidates: CandidateId[],
  client: GeneQueryClient,
  discontinued: CandidateId[]
): Promise<Decision> {
  const aliasMatches: CandidateId[] = [];

  // Records are fetched one at a time so an exact match stops further fetches.
  for (const id of candidates) {
    const record = await client.fetchRecord(id);
    if (record.discontinued) {
      discontinued.push(id);
      continue;
    }
    if (record.officialSymbol === symbol) {
      return { geneId: id, basis: "official_symbol" };
    }
    if (record.aliases.has(symbol)) {
      aliasMatches.push(id);
    }
  }

  if (aliasMatches.length > 0) {
    return { geneId: aliasMatches[0], basis: "alias" };
  }
  // The top-ranked id is kept even when its record turned out discontinued.
  return { geneId: candidates[0], basis: "top_relevance_fallback" };
}

function unresolved(
  symbol: GeneSymbol,
  code: UnresolvedCode,
  reason: string,
  candidates: CandidateId[],
  discontinued: CandidateId[]
): ResolutionResult {
  return { status: "unresolved", symbol, code, reason, candidates, discontinued };
}
