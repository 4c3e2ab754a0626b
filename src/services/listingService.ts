import { ScraperConfig } from "../config/config";
import { FieldValue, ProductRecord } from "../types/Product";
import { CardSnapshot, ListingLayout, PageDriver } from "../types/Portal";
import { ExtractionTimeout } from "../utils/errors";
import { logger } from "../utils/logger";

const cleanText = (value: string | null | undefined): string =>
  (value ?? "").replace(/\s+/g, " ").trim();

/** Number for "1,299.00" or "$ 42"; null when the text is not a plain amount. */
export function parseNumeric(value: string): number | null {
  const cleaned = value.replace(/[\s,$€£]/g, "");
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

function toFieldValue(field: string, text: string, numericFields: string[]): FieldValue {
  if (!numericFields.includes(field)) return text;
  const n = parseNumeric(text);
  return n === null ? text : n;
}

export function normalizeHeaders(texts: string[]): string[] {
  const seen = new Map<string, number>();
  return texts.map((raw, i) => {
    const base = cleanText(raw) || `column_${i + 1}`;
    const times = (seen.get(base) ?? 0) + 1;
    seen.set(base, times);
    return times === 1 ? base : `${base}_${times}`;
  });
}

export function rowToRecord(
  headers: string[],
  cells: string[],
  numericFields: string[] = []
): ProductRecord {
  const record: ProductRecord = {};
  const names = headers.length > 0 ? headers : cells.map((_, i) => `column_${i + 1}`);

  cells.forEach((cell, i) => {
    if (i >= names.length) return;
    record[names[i]] = toFieldValue(names[i], cleanText(cell), numericFields);
  });
  return record;
}

export function cardToRecord(
  card: CardSnapshot,
  numericFields: string[] = []
): ProductRecord {
  const record: ProductRecord = {};
  for (const [field, raw] of Object.entries(card.fields)) {
    const text = cleanText(raw);
    if (text) record[field] = toFieldValue(field, text, numericFields);
  }
  if (Object.keys(record).length === 0) {
    record.Content = cleanText(card.text);
  }
  return record;
}

/**
 * The listing did not refresh. Under the "stop" policy the records gathered so
 * far are kept and the run continues; this may truncate the data, so it is
 * always logged.
 */
function handleRefreshTimeout(cfg: ScraperConfig, err: ExtractionTimeout): void {
  if (cfg.refreshTimeoutPolicy === "fail") throw err;
  logger.warn(
    `${err.message}. Treating it as the end of the data; results may be truncated.`
  );
}

export async function detectLayout(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<ListingLayout> {
  const { table, card } = cfg.selectors;
  const seen = await driver.firstVisible([table, card], cfg.layoutTimeoutMs);
  if (seen === table) return "table";
  if (seen === card) return "cards";
  return "empty";
}

export async function extractTable(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<ProductRecord[]> {
  const { tableHeader, tableRow, tableCell, nextPage } = cfg.selectors;
  const headers = normalizeHeaders(await driver.textsOf(tableHeader));
  logger.info(`Table columns: ${headers.join(", ") || "(none)"}`);

  if (!(await driver.waitForVisible(tableRow, cfg.layoutTimeoutMs))) {
    logger.info("Table has no rows, the listing is empty");
    return [];
  }

  const products: ProductRecord[] = [];
  const readPages = new Set<string>();
  let pageNum = 1;

  while (true) {
    logger.info(`Processing page ${pageNum}...`);
    const signature = await driver.signature(tableRow);
    readPages.add(signature);

    const rows = await driver.tableRows(tableRow, tableCell);
    for (const cells of rows) {
      products.push(rowToRecord(headers, cells, cfg.numericFields));
    }
    logger.debug(`Page ${pageNum}: ${rows.length} rows`);

    if (cfg.maxPages > 0 && pageNum >= cfg.maxPages) {
      logger.info(`Reached MAX_PAGES (${cfg.maxPages}). Stopping.`);
      break;
    }

    const next = await driver.controlState(nextPage);
    if (next !== "enabled") {
      logger.info(`Next page control is ${next}, this is the last page`);
      break;
    }

    await driver.click(nextPage);
    const refreshed = await driver.waitForSignatureChange(
      tableRow,
      signature,
      cfg.refreshTimeoutMs
    );
    if (!refreshed) {
      handleRefreshTimeout(
        cfg,
        new ExtractionTimeout("pagination", pageNum + 1, cfg.refreshTimeoutMs)
      );
      break;
    }

    if (readPages.has(await driver.signature(tableRow))) {
      logger.warn(`Page ${pageNum + 1} repeats a page already read. Stopping.`);
      break;
    }
    pageNum += 1;
  }

  logger.info(`Extracted ${products.length} products from ${pageNum} pages`);
  return products;
}

export async function extractCards(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<ProductRecord[]> {
  const { card, loadMore } = cfg.selectors;
  let count = await driver.count(card);
  let idle = 0;
  let lastTrigger: "load-more" | "scroll" = "scroll";
  let round = 0;

  logger.info(`Card layout with ${count} cards visible, loading more...`);

  while (idle < cfg.loadMoreAttempts && round < cfg.maxLoadRounds) {
    round += 1;
    if ((await driver.controlState(loadMore)) === "enabled") {
      lastTrigger = "load-more";
      await driver.click(loadMore);
    } else {
      lastTrigger = "scroll";
      await driver.scrollToBottom();
    }

    if (await driver.waitForCountAbove(card, count, cfg.refreshTimeoutMs)) {
      count = await driver.count(card);
      idle = 0;
      logger.debug(`Round ${round}: ${count} cards`);
    } else {
      idle += 1;
    }
  }

  if (round >= cfg.maxLoadRounds && idle < cfg.loadMoreAttempts) {
    logger.warn(`Stopped loading cards after MAX_LOAD_ROUNDS (${cfg.maxLoadRounds})`);
  } else if (lastTrigger === "load-more") {
    handleRefreshTimeout(
      cfg,
      new ExtractionTimeout("load-more", round, cfg.refreshTimeoutMs)
    );
  }

  const cards = await driver.cards(card, cfg.cardFields);
  const products = cards.map((c) => cardToRecord(c, cfg.numericFields));
  logger.info(`Extracted ${products.length} products from cards`);
  return products;
}

export async function extractProducts(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<ProductRecord[]> {
  logger.info("Extracting product data...");
  const layout = await detectLayout(driver, cfg);

  switch (layout) {
    case "table":
      return extractTable(driver, cfg);
    case "cards":
      return extractCards(driver, cfg);
    case "empty":
      logger.info("No table or cards found, the listing is empty");
      return [];
  }
}
