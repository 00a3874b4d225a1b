#!/usr/bin/env node
import path from "node:path";
import { getConfig } from "../config.js";
import { runReclassificationJob } from "../pipeline/run-job.js";
import { optionalArg, optionalNumberArg, parseArgs } from "../utils/cli.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();

  const inputPath = optionalArg(args, "input") ?? config.INPUT_PATH;
  const catalogPath = optionalArg(args, "catalog") ?? config.CATALOG_PATH;
  if (!inputPath) {
    throw new Error("Missing required argument --input (or INPUT_PATH environment variable).");
  }
  if (!catalogPath) {
    throw new Error("Missing required argument --catalog (or CATALOG_PATH environment variable).");
  }

  const additionsPath = optionalArg(args, "additions");
  const outputDir = optionalArg(args, "output-dir");

  const summary = await runReclassificationJob({
    inputPath: path.resolve(process.cwd(), inputPath),
    catalogPath: path.resolve(process.cwd(), catalogPath),
    additionsPath: additionsPath ? path.resolve(process.cwd(), additionsPath) : undefined,
    outputDir: outputDir ? path.resolve(process.cwd(), outputDir) : undefined,
    hiThreshold: optionalNumberArg(args, "hi"),
    loThreshold: optionalNumberArg(args, "lo"),
  });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(summary, null, 2));
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Reclassification failed:", error);
  process.exitCode = 1;
});
