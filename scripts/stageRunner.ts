import "dotenv/config";
import { loadConfig } from "../src/config/env.js";
import { StageContext } from "../src/services/ingestionStages.js";
import { Logger } from "../src/utils/logger.js";

export function createStageContext(): StageContext {
  const config = loadConfig();
  return { config, logger: new Logger(config.logLevel) };
}

export function printSummary(title: string, summary: object): void {
  console.log(title);
  console.log("=".repeat(title.length));
  for (const [key, value] of Object.entries(summary)) {
    console.log(`${key}: ${typeof value === "object" ? JSON.stringify(value) : String(value)}`);
  }
}
