import { runSplitStage } from "../src/services/ingestionStages.js";
import { createStageContext, printSummary } from "./stageRunner.js";

async function main() {
  const summary = await runSplitStage(createStageContext());
  printSummary("Split Summary", summary);
}

main().catch((error) => {
  console.error("Split failed:", error);
  process.exit(1);
});
