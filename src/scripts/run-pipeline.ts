import fs from "fs";
import { z } from "zod";
import { config } from "../lib/config";
import { getEngineConfig } from "../lib/engine-config";
import { unitSymbol } from "../lib/extraction/units";
import { processDocuments, runSpecPipeline } from "../lib/pipeline";
import { createHttpFetcher } from "../lib/scraping/fetcher";
import { hostnameOf, htmlToDocument } from "../lib/scraping/html";
import { sanitizeUrl } from "../lib/safety/url-gate";
import {
  ContentType,
  EquipmentClass,
  type KeyedDocument,
  type PipelineRunSummary,
  type WorkItem,
} from "../lib/types";

const equipmentSchema = {
  brand: z.string().min(1),
  model: z.string().min(1),
  equipmentClass: z.nativeEnum(EquipmentClass).optional(),
};

const documentInputSchema = z.array(
  z.object({
    ...equipmentSchema,
    url: z.string().min(1),
    contentType: z.nativeEnum(ContentType).default(ContentType.HTML),
    html: z.string().optional(),
    text: z.string().default(""),
    tables: z.array(z.array(z.array(z.string()))).default([]),
    fetchedAt: z.string().optional(),
  })
);

const workInputSchema = z.array(
  z.object({
    ...equipmentSchema,
    urls: z.array(z.string().min(1)).min(1),
  })
);

function usage(): never {
  console.error("Usage: run-pipeline (--input docs.json | --work items.json) [--brand X] [--ignore-robots] [--json]");
  process.exit(1);
}

function readJsonFile(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

function loadDocuments(file: string): KeyedDocument[] {
  const now = new Date().toISOString();
  return documentInputSchema.parse(readJsonFile(file)).map((entry) => {
    const { brand, model, equipmentClass, url } = entry;
    const document = entry.html
      ? htmlToDocument(url, entry.html, entry.fetchedAt ?? now)
      : {
          url,
          contentType: entry.contentType,
          text: entry.text,
          tables: entry.tables,
          fetchedAt: entry.fetchedAt ?? now,
          sourceDomain: hostnameOf(url),
        };
    return { brand, model, equipmentClass, document };
  });
}

async function loadWorkItems(file: string): Promise<WorkItem[]> {
  const items: WorkItem[] = [];
  for (const entry of workInputSchema.parse(readJsonFile(file))) {
    const urls: string[] = [];
    for (const raw of entry.urls) {
      const url = await sanitizeUrl(raw);
      if (url) urls.push(url);
    }
    items.push({ ...entry, urls });
  }
  return items;
}

function printSummary(summary: PipelineRunSummary): void {
  const cfg = getEngineConfig();
  for (const { report, rimpull } of summary.results) {
    console.log(`\n=== ${report.brand} ${report.model} (${report.equipmentClass}) ===`);
    for (const spec of report.accepted) {
      const unit = unitSymbol(spec.unit, cfg);
      console.log(`  ${spec.parameterName} = ${spec.value}${unit ? ` ${unit}` : ""} [${spec.status}, ${spec.confidence}]`);
    }
    for (const spec of report.rejected) {
      console.log(`  ${spec.parameterName} REJECTED: ${spec.rejection?.reason} (${spec.rejection?.bound})`);
    }
    for (const warning of report.warnings) console.log(`  warning: ${warning}`);
    if (report.missingCoreParameters.length > 0) {
      console.log(`  missing: ${report.missingCoreParameters.join(", ")}`);
    }
    if (rimpull) {
      console.log(`  rimpull: ${rimpull.points.length} points from ${rimpull.sourceRefs.length} source(s)`);
      for (const violation of rimpull.violations) console.log(`    ${violation}`);
    }
  }

  console.log(`\n=== Summary ===`);
  console.log(`Documents: ${summary.documents}`);
  console.log(`Candidates: ${summary.candidates}`);
  console.log(`Models: ${summary.results.length}`);
  console.log(`Errors: ${summary.errors.length}`);
  for (const error of summary.errors) {
    console.log(`  ${error.brand} ${error.model}${error.url ? ` ${error.url}` : ""}: ${error.error}`);
  }
}

async function main() {
  const args = process.argv.slice(2);
  let inputFile: string | null = null;
  let workFile: string | null = null;
  const brands: string[] = [];
  let respectRobots = config.respectRobots;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--input" && args[i + 1]) {
      inputFile = args[++i];
    } else if (args[i] === "--work" && args[i + 1]) {
      workFile = args[++i];
    } else if (args[i] === "--brand" && args[i + 1]) {
      brands.push(args[++i]);
    } else if (args[i] === "--ignore-robots") {
      respectRobots = false;
    } else if (args[i] === "--json") {
      json = true;
    } else {
      usage();
    }
  }
  if ((inputFile === null) === (workFile === null)) usage();

  const engineConfig = getEngineConfig();
  const wanted = (brand: string) => brands.length === 0 || brands.includes(brand);

  // One controller per brand so Ctrl-C stops fetching but keeps finished models.
  const controllers = new Map<string, AbortController>();
  const brandSignals = new Map<string, AbortSignal>();
  const track = (brand: string) => {
    if (controllers.has(brand)) return;
    const controller = new AbortController();
    controllers.set(brand, controller);
    brandSignals.set(brand, controller.signal);
  };
  process.on("SIGINT", () => {
    console.warn("\n[run-pipeline] Interrupted, cancelling remaining work...");
    for (const controller of controllers.values()) controller.abort(new Error("Cancelled"));
  });

  let summary: PipelineRunSummary;
  if (inputFile) {
    const docs = loadDocuments(inputFile).filter((d) => wanted(d.brand));
    docs.forEach((d) => track(d.brand));
    console.log(`Processing ${docs.length} documents`);
    summary = await processDocuments(docs, { engineConfig, brandSignals });
  } else if (workFile) {
    const items = (await loadWorkItems(workFile)).filter((w) => wanted(w.brand));
    items.forEach((w) => track(w.brand));
    console.log(`Processing ${items.length} work items`);
    const fetcher = createHttpFetcher({ engine: engineConfig.engine, respectRobots });
    summary = await runSpecPipeline(items, { fetcher, engineConfig, brandSignals });
  } else {
    usage();
  }

  if (json) console.log(JSON.stringify(summary, null, 2));
  else printSummary(summary);
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
