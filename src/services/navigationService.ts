import { ScraperConfig } from "../config/config";
import { PageDriver } from "../types/Portal";
import { NavigationTimeout } from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Walks the configured steps from the landing page to the product listing.
 * Each step waits for its element, clicks it, then lets the UI settle.
 */
export async function navigateToListing(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<void> {
  logger.info("Navigating to product listing...");

  for (const step of cfg.navigationSteps) {
    const timeoutMs = step.timeoutMs ?? cfg.stepTimeoutMs;
    const visible = await driver.waitForVisible(step.selector, timeoutMs);

    if (!visible) {
      if (step.optional) {
        logger.info(`"${step.name}" not shown, continuing...`);
        continue;
      }
      throw new NavigationTimeout(step.name, step.selector, timeoutMs);
    }

    await driver.click(step.selector);
    logger.info(`Clicked ${step.name}`);
    await driver.settle(step.settleMs ?? cfg.stepSettleMs);
  }

  logger.info("Listing reached, continuing to data extraction");
}
