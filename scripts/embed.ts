import { createAiClients } from "../src/infra/ai/createAiClients.js";
import { runEmbedStage } from "../src/services/ingestionStages.js";
import { createStageContext, printSummary } from "./stageRunner.js";

async function main() {
  const ctx = createStageContext();
  const { embedding } = createAiClients(ctx.config);
  const summary = await runEmbedStage(ctx, embedding);
  printSummary("Embed Summary", summary);
}

main().catch((error) => {
  console.error("Embed failed:", error);
  process.exit(1);
});
