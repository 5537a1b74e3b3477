// main.ts
import { startBot } from "./src/bot.ts";
import { loadEnvConfig } from "./src/config.ts";
import { createAppContext } from "./src/context.ts";
import { log } from "./src/utils/misc.ts";

/**
 * Main application entry point.
 * Builds the application context and hands it to the startup sequence.
 */
async function main() {
  log("INFO", "--- Bot Initializing ---");
  const controller = new AbortController();
  for (const name of ["SIGINT", "SIGTERM"] as const) {
    process.once(name, () => {
      log("INFO", `Received ${name}, stopping the schedule checker...`);
      controller.abort();
    });
  }

  try {
    await startBot(createAppContext(loadEnvConfig()), controller.signal);
    log("INFO", "--- Bot Stopped ---");
  } catch (error) {
    log("CRITICAL", "A critical error occurred during bot startup. The application will exit.", error);
    process.exit(1);
  }
}

void main();
