import path from "node:path";
import { readCatalogFile } from "../catalog/load.js";
import { buildCatalogIndex, summarizeCatalog } from "../pipeline/catalog-index.js";
import { parseArgs, requireArg } from "../utils/cli.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const catalogPath = path.resolve(process.cwd(), requireArg(args, "catalog"));

  const catalog = await readCatalogFile(catalogPath);
  const summary = summarizeCatalog(buildCatalogIndex(catalog.rows));

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        fileName: catalog.fileName,
        sheets: catalog.sheets,
        skippedRows: catalog.skippedRows,
        ...summary,
      },
      null,
      2,
    ),
  );
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Catalog summary failed:", error);
  process.exitCode = 1;
});
