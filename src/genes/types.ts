export type GeneSymbol = string;
export type CandidateId = string;

export const SORT_ORDERS = ["relevance", "name", "chromosome", "weight"] as const;

export type SortOrder = (typeof SORT_ORDERS)[number];

export interface GeneRecord {
  id: CandidateId;
  officialSymbol?: string;
  aliases: ReadonlySet<string>;
  discontinued: boolean;
}

export interface GeneInfo {
  geneId: CandidateId;
  officialSymbol: string | null;
  description: string | null;
  geneType: string | null;
  summary: string | null;
  aliases: string[];
}

export interface GeneQueryClient {
  search(symbol: GeneSymbol, maxResults: number, sortOrder: SortOrder): Promise<CandidateId[]>;
  fetchRecord(id: CandidateId): Promise<GeneRecord>;
}

export interface GeneInfoClient {
  fetchGeneXml(id: CandidateId): Promise<string>;
}

export type ResolutionBasis = "sole_candidate" | "official_symbol" | "alias" | "top_relevance_fallback";

export type UnresolvedCode = "no_candidates" | "sole_candidate_discontinued" | "lookup_failed";

export interface ResolvedGene {
  status: "resolved";
  symbol: GeneSymbol;
  geneId: CandidateId;
  basis: ResolutionBasis;
  candidates: CandidateId[];
  discontinued: CandidateId[];
}

export interface UnresolvedGene {
  status: "unresolved";
  symbol: GeneSymbol;
  code: UnresolvedCode;
  reason: string;
  candidates: CandidateId[];
  discontinued: CandidateId[];
}

export type ResolutionResult = ResolvedGene | UnresolvedGene;

export interface UnresolvedEntry {
  symbol: GeneSymbol;
  code: UnresolvedCode;
  reason: string;
}

export interface DiscontinuedEntry {
  symbol: GeneSymbol;
  geneId: CandidateId;
}

export interface GeneResolutionReport {
  resolved: Record<GeneSymbol, CandidateId>;
  unresolved: UnresolvedEntry[];
  discontinued: DiscontinuedEntry[];
  counts: {
    total: number;
    resolved: number;
    unresolved: number;
  };
}

export interface GeneInfoFailure {
  symbol: GeneSymbol;
  geneId: CandidateId;
  reason: string;
}

export interface GeneInfoReport {
  genes: Record<CandidateId, GeneInfo>;
  failed: GeneInfoFailure[];
}
