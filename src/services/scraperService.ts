import { ScraperConfig } from "../config/config";
import { SessionLauncher, SessionStore } from "../types/Portal";
import { ExtractionResult } from "../types/Product";
import { saveDebugArtifacts } from "../utils/debugArtifacts";
import { messageOf } from "../utils/errors";
import { writeProductsJson } from "../utils/jsonStore";
import { logger } from "../utils/logger";
import { openSession } from "./authService";
import { navigateToListing } from "./navigationService";
import { extractProducts } from "./listingService";

export interface ExtractionDeps {
  launch: SessionLauncher;
  store: SessionStore;
  now?: () => Date;
}

export interface ExtractionSummary {
  outputPath: string;
  recordCount: number;
  resumed: boolean;
  capturedAt: Date;
}

type Stage = "navigation" | "extraction" | "write";

export async function runExtraction(
  cfg: ScraperConfig,
  deps: ExtractionDeps
): Promise<ExtractionSummary> {
  const now = deps.now ?? (() => new Date());
  const { session, resumed } = await openSession(cfg, deps.launch, deps.store);
  let stage: Stage = "navigation";

  try {
    await navigateToListing(session.driver, cfg);

    stage = "extraction";
    const result: ExtractionResult = {
      capturedAt: now(),
      records: await extractProducts(session.driver, cfg)
    };

    stage = "write";
    const outputPath = await writeProductsJson(
      result.records,
      result.capturedAt,
      cfg.outputDir
    );

    return {
      outputPath,
      recordCount: result.records.length,
      resumed,
      capturedAt: result.capturedAt
    };
  } catch (err) {
    logger.error(`${stage} failed: ${messageOf(err)}`);
    if (stage !== "write") {
      await saveDebugArtifacts(session.driver, err, cfg.debugDir, stage);
    }
    throw err;
  } finally {
    await session.close();
  }
}
