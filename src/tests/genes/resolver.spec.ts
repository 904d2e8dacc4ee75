import { describe, expect, it } from "vitest";
import { resolveGeneSymbol } from "../../genes/resolver";
import { EntrezQueryError } from "../../entrez/errors";
import { FakeGeneClient } from "../fixtures";

describe("resolveGeneSymbol", () => {
  it("searches human genes by relevance with 25 results", async () => {
    const client = new FakeGeneClient({ TP53: ["7157"] }, { "7157": { officialSymbol: "TP53" } });

    await resolveGeneSymbol("TP53", client);

    expect(client.searchCalls).toEqual([{ symbol: "TP53", maxResults: 25, sortOrder: "relevance" }]);
  });

  it("accepts a sole live candidate", async () => {
    const client = new FakeGeneClient({ TP53: ["7157"] }, { "7157": { officialSymbol: "TP53" } });

    const result = await resolveGeneSymbol("TP53", client);

    expect(result).toEqual({
      status: "resolved",
      symbol: "TP53",
      geneId: "7157",
      basis: "sole_candidate",
      candidates: ["7157"],
      discontinued: []
    });
  });

  it("accepts a sole candidate whose official symbol differs", async () => {
    const client = new FakeGeneClient({ P53: ["7157"] }, { "7157": { officialSymbol: "TP53", aliases: [] } });

    const result = await resolveGeneSymbol("P53", client);

    expect(result.status).toBe("resolved");
    expect(result.status === "resolved" && result.geneId).toBe("7157");
  });

  it("reports symbols without candidates", async () => {
    const client = new FakeGeneClient({ FOO: [] });

    const result = await resolveGeneSymbol("FOO", client);

    expect(result).toMatchObject({ status: "unresolved", symbol: "FOO", code: "no_candidates", reason: "no candidates" });
    expect(client.fetchCalls).toEqual([]);
  });

  it("rejects a sole discontinued candidate", async () => {
    const client = new FakeGeneClient({ OLD1: ["9"] }, { "9": { officialSymbol: "OLD1", discontinued: true } });

    const result = await resolveGeneSymbol("OLD1", client);

    expect(result).toEqual({
      status: "unresolved",
      symbol: "OLD1",
      code: "sole_candidate_discontinued",
      reason: "sole candidate discontinued",
      candidates: ["9"],
      discontinued: ["9"]
    });
  });

  it("stops at the first exact official symbol match", async () => {
    const client = new FakeGeneClient(
      { X: ["10", "20", "30"] },
      { "10": { officialSymbol: "Y" }, "20": { officialSymbol: "X" }, "30": { officialSymbol: "X" } }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ status: "resolved", geneId: "20", basis: "official_symbol" });
    expect(client.fetchCalls).toEqual(["10", "20"]);
  });

  it("prefers a later exact match over an earlier alias match", async () => {
    const client = new FakeGeneClient(
      { X: ["1", "2"] },
      { "1": { officialSymbol: "A", aliases: ["X"] }, "2": { officialSymbol: "X" } }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ status: "resolved", geneId: "2", basis: "official_symbol" });
  });

  it("falls back to the best ranked alias match", async () => {
    const client = new FakeGeneClient(
      { X: ["1", "2", "3"] },
      {
        "1": { officialSymbol: "A" },
        "2": { officialSymbol: "B", aliases: ["Q", "X"] },
        "3": { officialSymbol: "C", aliases: ["X"] }
      }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ status: "resolved", geneId: "2", basis: "alias" });
    expect(client.fetchCalls).toEqual(["1", "2", "3"]);
  });

  it("falls back to the top ranked candidate when nothing matches", async () => {
    const client = new FakeGeneClient(
      { X: ["5", "6"] },
      { "5": { officialSymbol: "A" }, "6": { aliases: ["Z"] } }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ status: "resolved", geneId: "5", basis: "top_relevance_fallback" });
  });

  it("keeps the top ranked candidate as fallback even when it is discontinued", async () => {
    const client = new FakeGeneClient(
      { X: ["5", "6"] },
      { "5": { officialSymbol: "X", discontinued: true }, "6": { officialSymbol: "A" } }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({
      status: "resolved",
      geneId: "5",
      basis: "top_relevance_fallback",
      discontinued: ["5"]
    });
  });

  it("skips discontinued candidates when matching", async () => {
    const client = new FakeGeneClient(
      { X: ["1", "2"] },
      { "1": { officialSymbol: "X", discontinued: true }, "2": { officialSymbol: "B", aliases: ["X"] } }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ status: "resolved", geneId: "2", basis: "alias", discontinued: ["1"] });
  });

  it("matches official symbols case-sensitively", async () => {
    const client = new FakeGeneClient(
      { X: ["1", "2"] },
      { "1": { officialSymbol: "A" }, "2": { officialSymbol: "x" } }
    );

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ geneId: "1", basis: "top_relevance_fallback" });
  });

  it("returns the same result for repeated lookups", async () => {
    const client = new FakeGeneClient(
      { X: ["1", "2"] },
      { "1": { officialSymbol: "A" }, "2": { aliases: ["X"] } }
    );

    const first = await resolveGeneSymbol("X", client);
    const second = await resolveGeneSymbol("X", client);

    expect(second).toEqual(first);
  });

  it("turns exhausted retries into a lookup failure", async () => {
    const failure = new EntrezQueryError({
      kind: "exhausted_retries",
      attempts: 6,
      message: "efetch.fcgi failed after 6 attempts: socket hang up"
    });
    const client = new FakeGeneClient({ X: ["1", "2"] }, { "1": { officialSymbol: "A" }, "2": failure });

    const result = await resolveGeneSymbol("X", client);

    expect(result).toEqual({
      status: "unresolved",
      symbol: "X",
      code: "lookup_failed",
      reason: "efetch.fcgi failed after 6 attempts: socket hang up",
      candidates: ["1", "2"],
      discontinued: []
    });
  });

  it("turns malformed records into a lookup failure", async () => {
    const failure = new EntrezQueryError({ kind: "malformed_record", message: "Gene record contains no Entrezgene entry" });
    const client = new FakeGeneClient({ X: failure });

    const result = await resolveGeneSymbol("X", client);

    expect(result).toMatchObject({ status: "unresolved", code: "lookup_failed", candidates: [] });
  });

  it("rethrows errors outside the lookup failure kinds", async () => {
    const client = new FakeGeneClient({ X: new TypeError("client not configured") });

    await expect(resolveGeneSymbol("X", client)).rejects.toThrow("client not configured");
  });
});
