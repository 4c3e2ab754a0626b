import * as fs from "fs";
import * as path from "path";
import { ProductRecord } from "../types/Product";
import { WriteFailure } from "./errors";
import { logger } from "./logger";
import { formatCaptureTimestamp } from "./timestamp";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/** Parsed JSON content of a file, or null when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  if (!fs.existsSync(filePath)) return null;

  const raw = await fs.promises.readFile(filePath, "utf-8");
  if (!raw.trim()) return null;
  return JSON.parse(raw);
}

export async function writeJsonFile(
  filePath: string,
  value: unknown
): Promise<void> {
  ensureDir(filePath);
  await fs.promises.writeFile(filePath, JSON.stringify(value), "utf-8");
}

export function productFileName(capturedAt: Date, attempt = 1): string {
  const suffix = attempt > 1 ? `_${attempt}` : "";
  return `product_data_${formatCaptureTimestamp(capturedAt)}${suffix}.json`;
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Writes the records as a JSON array to product_data_<timestamp>.json.
 * Never overwrites: a second capture in the same second gets _2, _3, ...
 */
export async function writeProductsJson(
  records: ProductRecord[],
  capturedAt: Date,
  outputDir: string
): Promise<string> {
  const payload = JSON.stringify(records, null, 2);

  for (let attempt = 1; ; attempt++) {
    const filePath = path.join(outputDir, productFileName(capturedAt, attempt));
    try {
      ensureDir(filePath);
      await fs.promises.writeFile(filePath, payload, { encoding: "utf-8", flag: "wx" });
      logger.info(`Data saved to ${filePath} (${records.length} products)`);
      return filePath;
    } catch (err) {
      if (isAlreadyExists(err)) {
        logger.warn(`${filePath} already exists, trying the next suffix`);
        continue;
      }
      throw new WriteFailure(filePath, err);
    }
  }
}
