import * as fs from "fs";
import * as path from "path";
import { PageDriver } from "../types/Portal";
import { ExtractorError, messageOf } from "./errors";
import { logger } from "./logger";

/**
 * Saves a screenshot, the page HTML and the error details for a failed step.
 * Capture problems are logged; the caller's error is what gets reported.
 */
export async function saveDebugArtifacts(
  driver: PageDriver,
  error: unknown,
  debugDir: string,
  label: string
): Promise<void> {
  if (!debugDir) return;

  try {
    await fs.promises.mkdir(debugDir, { recursive: true });
  } catch (err) {
    logger.warn(`Cannot create debug directory ${debugDir}: ${messageOf(err)}`);
    return;
  }

  const screenshotPath = path.join(debugDir, `${label}_screenshot.png`);
  try {
    await driver.screenshot(screenshotPath);
    logger.info(`Debug screenshot saved to ${screenshotPath}`);
  } catch (err) {
    logger.warn(`Could not take debug screenshot: ${messageOf(err)}`);
  }

  const htmlPath = path.join(debugDir, `${label}_page.html`);
  try {
    await fs.promises.writeFile(htmlPath, await driver.content(), "utf-8");
  } catch (err) {
    logger.warn(`Could not save page HTML: ${messageOf(err)}`);
  }

  const errorInfo = {
    name: error instanceof Error ? error.name : "Error",
    message: messageOf(error),
    step: error instanceof ExtractorError ? error.step : null,
    url: driver.url(),
    timestamp: new Date().toISOString()
  };
  const errorPath = path.join(debugDir, `${label}_error.json`);
  try {
    await fs.promises.writeFile(errorPath, JSON.stringify(errorInfo, null, 2) + "\n", "utf-8");
    logger.info(`Debug error saved to ${errorPath}`);
  } catch (err) {
    logger.warn(`Could not save error details: ${messageOf(err)}`);
  }
}
