import { applyCliFlags, loadConfig } from "../config/config";
import { createPlaywrightLauncher } from "../services/browserService";
import { runExtraction, ExtractionDeps } from "../services/scraperService";
import { createFileSessionStore } from "../services/sessionStore";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Runs one extraction and returns the process exit code. The browser and
 * session store default to Playwright and the configured session file.
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined>,
  deps: Partial<ExtractionDeps> = {}
): Promise<number> {
  try {
    const cfg = applyCliFlags(loadConfig(env), argv);
    logger.info("Starting product extractor...");

    const summary = await runExtraction(cfg, {
      launch: deps.launch ?? createPlaywrightLauncher(cfg),
      store: deps.store ?? createFileSessionStore(cfg.sessionFile),
      now: deps.now
    });

    logger.info(
      `Extraction complete. ${summary.recordCount} products saved to ${summary.outputPath}` +
        (summary.resumed ? " (saved session reused)" : "")
    );
    return 0;
  } catch (err) {
    logger.error(`Fatal error in extractor: ${describeError(err)}`);
    return 1;
  }
}
