import { createAiClients } from "../src/infra/ai/createAiClients.js";
import { HttpPageFetcher } from "../src/infra/http/pageFetcher.js";
import { createGraphStore } from "../src/infra/store/createGraphStore.js";
import {
  runClassifyStage,
  runEmbedStage,
  runScrapeStage,
  runSplitStage,
  runUploadStage,
} from "../src/services/ingestionStages.js";
import { createStageContext, printSummary } from "./stageRunner.js";

// Runs every stage in order; each one still reads the previous stage's artifact.
async function main() {
  const ctx = createStageContext();
  const { config } = ctx;
  const { embedding } = createAiClients(config);

  printSummary(
    "Scrape Summary",
    await runScrapeStage(
      ctx,
      new HttpPageFetcher({ timeoutMs: config.scrape.timeoutMs, userAgent: config.scrape.userAgent }),
    ),
  );
  printSummary("Classify Summary", await runClassifyStage(ctx));
  printSummary("Split Summary", await runSplitStage(ctx));
  printSummary("Embed Summary", await runEmbedStage(ctx, embedding));

  const store = createGraphStore(config);
  try {
    printSummary("Upload Summary", await runUploadStage(ctx, store));
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  console.error("Pipeline failed:", error);
  process.exit(1);
});
