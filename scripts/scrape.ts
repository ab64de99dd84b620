import { HttpPageFetcher } from "../src/infra/http/pageFetcher.js";
import { runScrapeStage } from "../src/services/ingestionStages.js";
import { createStageContext, printSummary } from "./stageRunner.js";

async function main() {
  const ctx = createStageContext();
  const fetcher = new HttpPageFetcher({
    timeoutMs: ctx.config.scrape.timeoutMs,
    userAgent: ctx.config.scrape.userAgent,
  });

  const seedUrls = process.argv.slice(2);
  const summary = await runScrapeStage(
    ctx,
    fetcher,
    seedUrls.length > 0 ? seedUrls : ctx.config.scrape.seedUrls,
  );
  printSummary("Scrape Summary", summary);
}

main().catch((error) => {
  console.error("Scrape failed:", error);
  process.exit(1);
});
