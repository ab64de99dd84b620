import { runClassifyStage } from "../src/services/ingestionStages.js";
import { createStageContext, printSummary } from "./stageRunner.js";

async function main() {
  const summary = await runClassifyStage(createStageContext());
  printSummary("Classify Summary", summary);
}

main().catch((error) => {
  console.error("Classify failed:", error);
  process.exit(1);
});
