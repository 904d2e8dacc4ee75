import axios from "axios";
import type { AxiosInstance, AxiosResponse, ResponseType } from "axios";
import pLimit from "p-limit";
import { z } from "zod";
import {
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  RetriesExhaustedError,
  type RetryPolicy,
  describeError,
  safeJsonParse,
  withRetry
} from "../utils";
import type {
  CandidateId,
  GeneInfoClient,
  GeneQueryClient,
  GeneRecord,
  GeneSymbol,
  SortOrder
} from "../genes/types";
import {
  EntrezQueryError,
  classifyTransportError,
  isTransientFailure,
  malformedRecordError,
  transientStatusError
} from "./errors";
import { parseGeneRecord } from "./geneXml";

export const DEFAULT_ENTREZ_BASE_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 3;

export interface EntrezClientOptions {
  baseUrl?: string;
  apiKey?: string;
  tool?: string;
  email?: string;
  timeoutMs?: number;
  maxConcurrentRequests?: number;
  retry?: Partial<Omit<RetryPolicy, "shouldRetry">>;
  http?: AxiosInstance;
}

type Endpoint = "esearch.fcgi" | "efetch.fcgi";
type QueryParams = Record<string, string | number>;

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string())
  })
});

export function buildGeneSearchTerm(symbol: GeneSymbol): string {
  return `${symbol}[GENE] AND Homo sapiens[ORGN]`;
}

/**
 * E-utilities client for the `gene` database. Every request is retried on
 * transient failures under a fixed policy and shares one concurrency
 * ceiling with the other requests of the same client.
 */
export class EntrezClient implements GeneQueryClient, GeneInfoClient {
  private readonly http: AxiosInstance;

  private readonly baseUrl: string;

  private readonly credentials: QueryParams;

  private readonly timeoutMs: number;

  private readonly retryPolicy: RetryPolicy;

  private readonly limit: ReturnType<typeof pLimit>;

  constructor(options: EntrezClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.baseUrl = (options.baseUrl ?? DEFAULT_ENTREZ_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = {
      attempts: options.retry?.attempts ?? DEFAULT_RETRY_ATTEMPTS,
      delayMs: options.retry?.delayMs ?? DEFAULT_RETRY_DELAY_MS,
      sleep: options.retry?.sleep,
      shouldRetry: isTransientFailure
    };
    this.limit = pLimit(options.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS);

    const credentials: QueryParams = {};
    if (options.apiKey) credentials.api_key = options.apiKey;
    if (options.tool) credentials.tool = options.tool;
    if (options.email) credentials.email = options.email;
    this.credentials = credentials;
  }

  async search(symbol: GeneSymbol, maxResults: number, sortOrder: SortOrder): Promise<CandidateId[]> {
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new RangeError(`maxResults must be a positive integer, got ${maxResults}`);
    }

    const data = await this.request("esearch.fcgi", "json", {
      db: "gene",
      retmode: "json",
      retmax: maxResults,
      term: buildGeneSearchTerm(symbol),
      sort: sortOrder
    });

    const body = typeof data === "string" ? safeJsonParse(data) : data;
    const parsed = ESearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw malformedRecordError(`ESearch response for ${symbol} has no id list`);
    }
    return parsed.data.esearchresult.idlist;
  }

  async fetchRecord(id: CandidateId): Promise<GeneRecord> {
    const xml = await this.fetchGeneXml(id);
    return parseGeneRecord(id, xml);
  }

  async fetchGeneXml(id: CandidateId): Promise<string> {
    const data = await this.request("efetch.fcgi", "text", { db: "gene", id, retmode: "xml" });
    if (typeof data !== "string") {
      throw malformedRecordError(`EFetch response for gene ${id} is not text`);
    }
    return data;
  }

  private async request(endpoint: Endpoint, responseType: ResponseType, params: QueryParams): Promise<unknown> {
    const url = `${this.baseUrl}/${endpoint}`;
    try {
      return await withRetry(
        () => this.limit(() => this.send(url, responseType, { ...params, ...this.credentials })),
        this.retryPolicy
      );
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new EntrezQueryError({
          kind: "exhausted_retries",
          attempts: error.attempts,
          message: `${endpoint} failed after ${error.attempts} attempts: ${describeError(error.lastError)}`
        });
      }
      throw error;
    }
  }

  private async send(url: string, responseType: ResponseType, params: QueryParams): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, {
        params,
        responseType,
        timeout: this.timeoutMs,
        validateStatus: () => true
      });
    } catch (error) {
      throw classifyTransportError(error);
    }

    if (response.status < 200 || response.status >= 300) {
      throw transientStatusError(response.status, url);
    }
    return response.data;
  }
}
