import { createGraphStore } from "../src/infra/store/createGraphStore.js";
import { runUploadStage } from "../src/services/ingestionStages.js";
import { createStageContext, printSummary } from "./stageRunner.js";

async function main() {
  const ctx = createStageContext();
  const store = createGraphStore(ctx.config);
  try {
    const summary = await runUploadStage(ctx, store);
    printSummary("Upload Summary", { ...summary, store: ctx.config.store.kind });
    printSummary("Store Totals", await store.stats());
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  console.error("Upload failed:", error);
  process.exit(1);
});
