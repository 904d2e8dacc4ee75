import { parseStringPromise } from "xml2js";
import { describeError } from "../utils";
import type { CandidateId, GeneInfo, GeneRecord } from "../genes/types";
import { malformedRecordError } from "./errors";

type XmlElement = { [key: string]: unknown };

const ATTRIBUTES_KEY = "$";
const TEXT_KEY = "_";

export const GENE_XML_PATHS = {
  entry: "Entrezgene",
  discontinueDate: "Entrezgene_track-info/Gene-track/Gene-track_discontinue-date",
  officialSymbol: "Entrezgene_gene/Gene-ref/Gene-ref_locus",
  aliases: "Entrezgene_gene/Gene-ref/Gene-ref_syn/Gene-ref_syn_E",
  description: "Entrezgene_gene/Gene-ref/Gene-ref_desc",
  geneType: "Entrezgene_type",
  summary: "Entrezgene_summary"
} as const;

function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function childrenNamed(node: unknown, name: string): unknown[] {
  return isElement(node) ? asList(node[name]) : [];
}

function descendantsNamed(node: unknown, name: string, found: unknown[] = []): unknown[] {
  if (!isElement(node)) {
    return found;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
    for (const item of asList(value)) {
      if (key === name) {
        found.push(item);
      }
      descendantsNamed(item, name, found);
    }
  }
  return found;
}

/**
 * Finds every element matching `path` below `root`. The first segment may
 * sit at any depth; each following segment must be a direct child.
 */
export function findAll(root: unknown, path: string): unknown[] {
  const [first, ...rest] = path.split("/");
  let nodes = descendantsNamed(root, first);
  for (const segment of rest) {
    nodes = nodes.flatMap((node) => childrenNamed(node, segment));
  }
  return nodes;
}

export function textOf(node: unknown): string | undefined {
  let raw: unknown = node;
  if (isElement(node)) {
    raw = node[TEXT_KEY];
  }
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function attributeOf(node: unknown, name: string): string | undefined {
  if (!isElement(node)) {
    return undefined;
  }
  const attributes = node[ATTRIBUTES_KEY];
  if (!isElement(attributes)) {
    return undefined;
  }
  const value = attributes[name];
  return typeof value === "string" ? value : undefined;
}

function texts(root: unknown, path: string): string[] {
  return findAll(root, path)
    .map((node) => textOf(node))
    .filter((value): value is string => value !== undefined);
}

function firstText(root: unknown, path: string): string | undefined {
  return texts(root, path)[0];
}

export async function parseGeneDocument(xml: string): Promise<unknown> {
  let document: unknown;
  try {
    document = await parseStringPromise(xml);
  } catch (error) {
    throw malformedRecordError(`Gene record is not valid XML: ${describeError(error)}`);
  }
  if (findAll(document, GENE_XML_PATHS.entry).length === 0) {
    throw malformedRecordError("Gene record contains no Entrezgene entry");
  }
  return document;
}

export async function parseGeneRecord(id: CandidateId, xml: string): Promise<GeneRecord> {
  const document = await parseGeneDocument(xml);
  return {
    id,
    officialSymbol: firstText(document, GENE_XML_PATHS.officialSymbol),
    aliases: new Set(texts(document, GENE_XML_PATHS.aliases)),
    discontinued: findAll(document, GENE_XML_PATHS.discontinueDate).length > 0
  };
}

export async function parseGeneInfo(id: CandidateId, xml: string): Promise<GeneInfo> {
  const document = await parseGeneDocument(xml);
  const [typeNode] = findAll(document, GENE_XML_PATHS.geneType);
  return {
    geneId: id,
    officialSymbol: firstText(document, GENE_XML_PATHS.officialSymbol) ?? null,
    description: firstText(document, GENE_XML_PATHS.description) ?? null,
    geneType: attributeOf(typeNode, "value") ?? null,
    summary: firstText(document, GENE_XML_PATHS.summary) ?? null,
    aliases: texts(document, GENE_XML_PATHS.aliases)
  };
}
