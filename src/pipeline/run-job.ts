import { randomUUID } from "node:crypto";
import { appendFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { readCatalogFile } from "../catalog/load.js";
import { getConfig } from "../config.js";
import { RunLogger } from "../logging/run-logger.js";
import type { CatalogRow, ReclassificationRunSummary } from "../types.js";
import { buildCatalogIndex, extendCatalog } from "./catalog-index.js";
import { buildCurationQueue } from "./curation.js";
import { readInputFile } from "./ingest.js";
import { reclassifyRecords } from "./run.js";
import { buildRunArtifacts } from "./run-artifacts.js";

export interface ReclassificationJobInput {
  inputPath: string;
  catalogPath: string;
  /** Curated rows added during the session; applied on top of the catalog snapshot. */
  additionsPath?: string;
  outputDir?: string;
  hiThreshold?: number;
  loThreshold?: number;
  consoleWrite?: (line: string) => void;
  now?: () => Date;
}

export async function runReclassificationJob(
  input: ReclassificationJobInput,
): Promise<ReclassificationRunSummary> {
  const config = getConfig();
  const runId = randomUUID();
  const outputDir = input.outputDir ?? config.OUTPUT_DIR;
  const logPath = path.join(outputDir, `${runId}.log.jsonl`);
  const now = input.now ?? (() => new Date());
  const startedAt = now();

  await mkdir(outputDir, { recursive: true });

  const logger = new RunLogger({
    runId,
    flushBatchSize: config.LOG_FLUSH_BATCH_SIZE,
    consoleWrite: input.consoleWrite,
    now,
    writeBatch: async (rows) => {
      await appendFile(logPath, rows.map((row) => `${JSON.stringify(row)}\n`).join(""), "utf8");
    },
  });

  try {
    const catalog = await readCatalogFile(input.catalogPath);
    if (catalog.skippedRows > 0) {
      logger.warn("catalog", "catalog.rows_skipped", "Catalog rows without labels were skipped.", {
        skipped_rows: catalog.skippedRows,
      });
    }

    let additions: CatalogRow[] = [];
    if (input.additionsPath) {
      additions = (await readCatalogFile(input.additionsPath)).rows;
    }
    const catalogRows = extendCatalog(catalog.rows, additions);
    logger.info("catalog", "catalog.loaded", "Catalog snapshot ready.", {
      file_name: catalog.fileName,
      sheets: catalog.sheets,
      rows: catalog.rows.length,
      additions: additions.length,
      snapshot_rows: catalogRows.length,
    });

    const records = await readInputFile(input.inputPath);
    logger.info("ingest", "input.loaded", "Input table loaded.", { rows: records.length });

    const result = reclassifyRecords(records, catalogRows, {
      hiThreshold: input.hiThreshold ?? config.HI_THRESHOLD,
      loThreshold: input.loThreshold ?? config.LO_THRESHOLD,
      problematicThreshold: config.PROBLEMATIC_THRESHOLD,
      problematicSubcategories: config.PROBLEMATIC_SUBCATEGORIES,
      containsFields: config.CONTAINS_FIELDS,
      dropExcludedFromDeliverable: config.DROP_EXCLUDED_FROM_DELIVERABLE,
      logger,
    });

    const index = buildCatalogIndex(catalogRows);
    const curationQueue = buildCurationQueue(result.all, index);

    const baseName = path.basename(input.inputPath, path.extname(input.inputPath));
    const artifacts = buildRunArtifacts({ result, curationQueue, baseName, now: now() });
    const written: ReclassificationRunSummary["artifacts"] = [];
    for (const artifact of artifacts) {
      const artifactPath = path.join(outputDir, artifact.fileName);
      await writeFile(artifactPath, artifact.content);
      written.push({
        key: artifact.key,
        fileName: artifact.fileName,
        format: artifact.format,
        sizeBytes: artifact.sizeBytes,
        path: artifactPath,
      });
    }
    logger.info("artifacts", "artifacts.written", "Result files written.", {
      files: written.map((artifact) => artifact.fileName),
      pending_subcategories: curationQueue.length,
    });

    return {
      runId,
      inputFileName: path.basename(input.inputPath),
      catalogFileName: catalog.fileName,
      catalogEntries: index.entries.length,
      metrics: result.metrics,
      artifacts: written,
      elapsedMs: now().getTime() - startedAt.getTime(),
    };
  } catch (error) {
    logger.error("pipeline", "job.failed", "Reclassification job failed.", {
      error_message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    await logger.flush();
  }
}
