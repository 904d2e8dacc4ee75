import fs from "node:fs/promises";
import path from "node:path";
import { entrezClientOptions, loadConfig } from "../../src/config/entrez";
import { EntrezClient } from "../../src/entrez/client";
import { fetchGeneInfoBatch, geneXmlFileName, resolveGeneSymbols } from "../../src/genes/batch";
import type { GeneInfoBatchOptions } from "../../src/genes/batch";

async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.writeFile(file, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
  console.log(`Wrote ${file}`);
}

async function main() {
  const args = process.argv.slice(2);
  const withXml = args.includes("--xml");
  const withInfo = withXml || args.includes("--info");
  const [inputPath, outDirArg] = args.filter((arg) => !arg.startsWith("--"));

  if (!inputPath) {
    console.error("Usage: ts-node scripts/manual/resolveGeneList.ts <genes.txt> [outDir] [--info] [--xml]");
    process.exit(1);
  }

  const config = loadConfig();
  const client = new EntrezClient(entrezClientOptions(config));
  const outDir = path.resolve(outDirArg ?? "data");
  await fs.mkdir(outDir, { recursive: true });

  const symbols = (await fs.readFile(inputPath, "utf-8")).split(/\r?\n/);
  const report = await resolveGeneSymbols(symbols, client, { concurrency: config.RESOLVE_CONCURRENCY });

  await writeJson(path.join(outDir, "gene_to_id.json"), report.resolved);
  await writeJson(path.join(outDir, "unresolved.json"), report.unresolved);
  await writeJson(path.join(outDir, "discontinued.json"), report.discontinued);

  if (withInfo) {
    const options: GeneInfoBatchOptions = { concurrency: config.RESOLVE_CONCURRENCY };
    if (withXml) {
      const xmlDir = path.join(outDir, "genes_xml");
      await fs.mkdir(xmlDir, { recursive: true });
      options.onDocument = (symbol, geneId, xml) =>
        fs.writeFile(path.join(xmlDir, geneXmlFileName(symbol, geneId)), xml, "utf-8");
    }
    const info = await fetchGeneInfoBatch(report.resolved, client, options);
    await writeJson(path.join(outDir, "genes_info.json"), info.genes);
    if (info.failed.length > 0) {
      await writeJson(path.join(outDir, "genes_info_failed.json"), info.failed);
    }
  }

  console.log(`Resolved ${report.counts.resolved} of ${report.counts.total} symbols (${report.counts.unresolved} unresolved).`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
