import axios from "axios";
import type { AxiosInstance, InternalAxiosRequestConfig } from "axios";
import type { CandidateId, GeneQueryClient, GeneRecord, GeneSymbol, SortOrder } from "../genes/types";

export interface GeneXmlFields {
  id: string;
  symbols?: string[];
  aliases?: string[];
  description?: string;
  geneType?: string;
  summary?: string;
  discontinued?: boolean;
}

export function geneXml({
  id,
  symbols = [],
  aliases = [],
  description,
  geneType,
  summary,
  discontinued = false
}: GeneXmlFields): string {
  const discontinueDate = discontinued
    ? "<Gene-track_discontinue-date><Date><Date_std><Date-std><Date-std_year>2019</Date-std_year></Date-std></Date_std></Date></Gene-track_discontinue-date>"
    : "";
  const loci = symbols.map((symbol) => `<Gene-ref_locus>${symbol}</Gene-ref_locus>`).join("");
  const desc = description ? `<Gene-ref_desc>${description}</Gene-ref_desc>` : "";
  const syn =
    aliases.length > 0
      ? `<Gene-ref_syn>${aliases.map((alias) => `<Gene-ref_syn_E>${alias}</Gene-ref_syn_E>`).join("")}</Gene-ref_syn>`
      : "";
  const type = geneType ? `<Entrezgene_type value="${geneType}">6</Entrezgene_type>` : "";
  const summaryNode = summary ? `<Entrezgene_summary>${summary}</Entrezgene_summary>` : "";

  return `<?xml version="1.0" ?>
<Entrezgene-Set>
  <Entrezgene>
    <Entrezgene_track-info>
      <Gene-track>
        <Gene-track_geneid>${id}</Gene-track_geneid>
        ${discontinueDate}
      </Gene-track>
    </Entrezgene_track-info>
    ${type}
    <Entrezgene_gene>
      <Gene-ref>
        ${loci}
        ${desc}
        ${syn}
      </Gene-ref>
    </Entrezgene_gene>
    ${summaryNode}
  </Entrezgene>
</Entrezgene-Set>
`;
}

export interface FakeReply {
  status: number;
  data: unknown;
}

export type FakeHandler = (config: InternalAxiosRequestConfig, call: number) => FakeReply | Promise<FakeReply>;

/** An axios instance whose requests are answered in process by `handler`. */
export function fakeHttp(handler: FakeHandler): { http: AxiosInstance; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      calls.push(config);
      const { status, data } = await handler(config, calls.length);
      return { data, status, statusText: String(status), headers: {}, config };
    }
  });
  return { http, calls };
}

export type RecordFields = Partial<Omit<GeneRecord, "id" | "aliases">> & { aliases?: string[] };

export function record(id: CandidateId, fields: RecordFields = {}): GeneRecord {
  return {
    id,
    officialSymbol: fields.officialSymbol,
    aliases: new Set(fields.aliases ?? []),
    discontinued: fields.discontinued ?? false
  };
}

export class FakeGeneClient implements GeneQueryClient {
  readonly searchCalls: Array<{ symbol: GeneSymbol; maxResults: number; sortOrder: SortOrder }> = [];

  readonly fetchCalls: CandidateId[] = [];

  constructor(
    private readonly searches: Record<GeneSymbol, CandidateId[] | Error>,
    private readonly records: Record<CandidateId, RecordFields | Error> = {}
  ) {}

  async search(symbol: GeneSymbol, maxResults: number, sortOrder: SortOrder): Promise<CandidateId[]> {
    this.searchCalls.push({ symbol, maxResults, sortOrder });
    const result = this.searches[symbol] ?? [];
    if (result instanceof Error) {
      throw result;
    }
    return [...result];
  }

  async fetchRecord(id: CandidateId): Promise<GeneRecord> {
    this.fetchCalls.push(id);
    const fields = this.records[id];
    if (fields === undefined) {
      throw new Error(`No record stubbed for ${id}`);
    }
    if (fields instanceof Error) {
      throw fields;
    }
    return record(id, fields);
  }
}
