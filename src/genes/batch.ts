import pLimit from "p-limit";
import { hasFailureKind } from "../entrez/errors";
import { parseGeneInfo } from "../entrez/geneXml";
import { resolveGeneSymbol } from "./resolver";
import type {
  CandidateId,
  GeneInfo,
  GeneInfoClient,
  GeneInfoFailure,
  GeneInfoReport,
  GeneQueryClient,
  GeneResolutionReport,
  GeneSymbol,
  ResolutionResult
} from "./types";

export interface BatchOptions {
  concurrency?: number;
}

export interface GeneInfoBatchOptions extends BatchOptions {
  onDocument?: (symbol: GeneSymbol, geneId: CandidateId, xml: string) => Promise<void>;
}

export function normalizeSymbols(symbols: readonly string[]): GeneSymbol[] {
  const seen = new Set<string>();
  const normalized: GeneSymbol[] = [];
  for (const raw of symbols) {
    const symbol = raw.trim();
    if (symbol.length === 0 || seen.has(symbol)) continue;
    seen.add(symbol);
    normalized.push(symbol);
  }
  return normalized;
}

export async function resolveGeneSymbols(
  symbols: readonly string[],
  client: GeneQueryClient,
  { concurrency = 1 }: BatchOptions = {}
): Promise<GeneResolutionReport> {
  const unique = normalizeSymbols(symbols);
  const limit = pLimit(concurrency);

  console.log(`[resolve] resolving ${unique.length} gene symbols`);
  const results = await Promise.all(
    unique.map((symbol) =>
      limit(async () => {
        try {
          const result = await resolveGeneSymbol(symbol, client);
          logResolution(result);
          return result;
        } catch (error) {
          // Only fatal errors get here; queued symbols must not start.
          limit.clearQueue();
          throw error;
        }
      })
    )
  );

  const report = summarizeResolutions(results);
  console.log(
    `[resolve] done: ${report.counts.resolved} resolved, ${report.counts.unresolved} unresolved of ${report.counts.total}`
  );
  return report;
}

export function summarizeResolutions(results: readonly ResolutionResult[]): GeneResolutionReport {
  const resolved = new Map<GeneSymbol, CandidateId>();
  const report: GeneResolutionReport = {
    resolved: {},
    unresolved: [],
    discontinued: [],
    counts: { total: results.length, resolved: 0, unresolved: 0 }
  };

  for (const result of results) {
    for (const geneId of result.discontinued) {
      report.discontinued.push({ symbol: result.symbol, geneId });
    }
    if (result.status === "resolved") {
      resolved.set(result.symbol, result.geneId);
      report.counts.resolved += 1;
    } else {
      report.unresolved.push({ symbol: result.symbol, code: result.code, reason: result.reason });
      report.counts.unresolved += 1;
    }
  }

  // Own keys, "__proto__" included.
  report.resolved = Object.fromEntries(resolved);
  return report;
}

function logResolution(result: ResolutionResult): void {
  if (result.discontinued.length > 0) {
    console.warn(`[resolve] ${result.symbol}: discontinued candidates ${result.discontinued.join(", ")}`);
  }
  if (result.status === "resolved") {
    const pool = result.candidates.length > 1 ? ` of ${result.candidates.length} candidates` : "";
    console.log(`[resolve] ${result.symbol} -> ${result.geneId} (${result.basis}${pool})`);
  } else {
    console.warn(`[resolve] ${result.symbol} unresolved: ${result.reason}`);
  }
}

export async function fetchGeneInfoBatch(
  genes: Record<GeneSymbol, CandidateId>,
  client: GeneInfoClient,
  { concurrency = 1, onDocument }: GeneInfoBatchOptions = {}
): Promise<GeneInfoReport> {
  const limit = pLimit(concurrency);
  const genesById = new Map<CandidateId, GeneInfo>();
  const report: GeneInfoReport = { genes: {}, failed: [] };

  const outcomes = await Promise.all(
    Object.entries(genes).map(([symbol, geneId]) =>
      limit(async (): Promise<{ symbol: GeneSymbol; geneId: CandidateId; info: GeneInfo } | GeneInfoFailure> => {
        try {
          const xml = await client.fetchGeneXml(geneId);
          if (onDocument) {
            await onDocument(symbol, geneId, xml);
          }
          return { symbol, geneId, info: await parseGeneInfo(geneId, xml) };
        } catch (error) {
          if (hasFailureKind(error, "exhausted_retries") || hasFailureKind(error, "malformed_record")) {
            return { symbol, geneId, reason: error.message };
          }
          limit.clearQueue();
          throw error;
        }
      })
    )
  );

  for (const outcome of outcomes) {
    if ("info" in outcome) {
      genesById.set(outcome.geneId, outcome.info);
      console.log(`[info] ${outcome.symbol} (${outcome.geneId}) fetched`);
    } else {
      report.failed.push(outcome);
      console.warn(`[info] ${outcome.symbol} (${outcome.geneId}) failed: ${outcome.reason}`);
    }
  }

  report.genes = Object.fromEntries(genesById);
  return report;
}

export function geneXmlFileName(symbol: GeneSymbol, geneId: CandidateId): string {
  return `${symbol.replace(/[\\/]/g, "_")}__${geneId}.xml`;
}
