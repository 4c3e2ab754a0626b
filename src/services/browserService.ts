import { chromium, errors, Locator, Page } from "playwright";
import { ScraperConfig } from "../config/config";
import {
  CardSnapshot,
  ControlState,
  PageDriver,
  SessionLauncher
} from "../types/Portal";
import { logger } from "../utils/logger";
import { joinSignature, outermostFlags } from "./pageFunctions";

export const POLL_INTERVAL_MS = 250;

export type Sleep = (ms: number) => Promise<void>;

/** The part of Playwright's Locator the visibility and control checks use. */
export interface Matches {
  filter(options: { visible: boolean }): Matches;
  first(): Matches;
  or(other: Matches): Matches;
  waitFor(options: { state: "visible"; timeout: number }): Promise<void>;
  count(): Promise<number>;
  isEnabled(): Promise<boolean>;
  getAttribute(name: string): Promise<string | null>;
}

export async function waitOrTimeout(matches: Matches, timeoutMs: number): Promise<boolean> {
  try {
    await matches.waitFor({ state: "visible", timeout: timeoutMs });
    return true;
  } catch (err) {
    if (err instanceof errors.TimeoutError) return false;
    throw err;
  }
}

/**
 * Index of the candidate with a visible match, or -1 on timeout. Hidden
 * matches are filtered out first: `first()` alone resolves to the first match
 * in document order, visible or not.
 */
export async function firstVisibleIndex(
  candidates: Matches[],
  timeoutMs: number
): Promise<number> {
  if (candidates.length === 0) return -1;

  const shown = candidates.map((m) => m.filter({ visible: true }));
  const either = shown.slice(1).reduce((acc, m) => acc.or(m), shown[0]);
  if (!(await waitOrTimeout(either.first(), timeoutMs))) return -1;

  for (let i = 0; i < shown.length; i++) {
    if ((await shown[i].count()) > 0) return i;
  }
  return -1;
}

export async function readControlState(matches: Matches): Promise<ControlState> {
  const control = matches.filter({ visible: true }).first();
  if ((await control.count()) === 0) return "absent";
  if (!(await control.isEnabled())) return "disabled";
  if ((await control.getAttribute("aria-disabled")) === "true") return "disabled";
  return "enabled";
}

export async function pollUntil(
  check: () => Promise<boolean>,
  timeoutMs: number,
  sleep: Sleep,
  intervalMs = POLL_INTERVAL_MS
): Promise<boolean> {
  const attempts = Math.max(1, Math.ceil(timeoutMs / intervalMs));
  for (let i = 0; i <= attempts; i++) {
    if (await check()) return true;
    if (i < attempts) await sleep(intervalMs);
  }
  return false;
}

/**
 * Waits for read() to return a non-empty value other than previous that holds
 * for two reads in a row, so a transient loading row is never taken as a page.
 */
export function waitForSettledChange(
  read: () => Promise<string>,
  previous: string,
  timeoutMs: number,
  sleep: Sleep,
  intervalMs = POLL_INTERVAL_MS
): Promise<boolean> {
  let last: string | null = null;
  return pollUntil(
    async () => {
      const current = await read();
      const settled = current !== "" && current !== previous && current === last;
      last = current;
      return settled;
    },
    timeoutMs,
    sleep,
    intervalMs
  );
}

export class PlaywrightPageDriver implements PageDriver {
  private readonly sleep: Sleep = (ms) => this.page.waitForTimeout(ms);

  constructor(private readonly page: Page) {}

  private shown(selector: string): Locator {
    return this.page.locator(selector).filter({ visible: true });
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  url(): string {
    return this.page.url();
  }

  waitForVisible(selector: string, timeoutMs: number): Promise<boolean> {
    return waitOrTimeout(this.shown(selector).first(), timeoutMs);
  }

  async firstVisible(selectors: string[], timeoutMs: number): Promise<string | null> {
    const index = await firstVisibleIndex(
      selectors.map((s) => this.page.locator(s)),
      timeoutMs
    );
    return index < 0 ? null : selectors[index];
  }

  async click(selector: string): Promise<void> {
    const target = this.shown(selector).first();
    await target.scrollIntoViewIfNeeded();
    await target.click();
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.shown(selector).first().fill(value);
  }

  count(selector: string): Promise<number> {
    return this.shown(selector).count();
  }

  controlState(selector: string): Promise<ControlState> {
    return readControlState(this.page.locator(selector));
  }

  textsOf(selector: string): Promise<string[]> {
    return this.page.locator(selector).allTextContents();
  }

  async tableRows(rowSelector: string, cellSelector: string): Promise<string[][]> {
    const rows = await this.shown(rowSelector).all();
    return Promise.all(rows.map((row) => row.locator(cellSelector).allTextContents()));
  }

  async cards(cardSelector: string, fields: Record<string, string>): Promise<CardSnapshot[]> {
    const matches = this.shown(cardSelector);
    const outer = await matches.evaluateAll(outermostFlags);
    const elements = await matches.all();

    const snapshots: CardSnapshot[] = [];
    for (let i = 0; i < elements.length; i++) {
      // A card nested inside another match is part of that card.
      if (!outer[i]) continue;
      const values: Record<string, string | null> = {};
      for (const [field, sel] of Object.entries(fields)) {
        const hit = elements[i].locator(sel).first();
        values[field] = (await hit.count()) > 0 ? await hit.textContent() : null;
      }
      snapshots.push({ fields: values, text: (await elements[i].textContent()) ?? "" });
    }
    return snapshots;
  }

  async signature(selector: string): Promise<string> {
    return joinSignature(await this.shown(selector).allTextContents());
  }

  waitForSignatureChange(
    selector: string,
    previous: string,
    timeoutMs: number
  ): Promise<boolean> {
    return waitForSettledChange(
      () => this.signature(selector),
      previous,
      timeoutMs,
      this.sleep
    );
  }

  waitForCountAbove(
    selector: string,
    previous: number,
    timeoutMs: number
  ): Promise<boolean> {
    return pollUntil(
      async () => (await this.count(selector)) > previous,
      timeoutMs,
      this.sleep
    );
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }

  async settle(ms: number): Promise<void> {
    if (ms > 0) await this.page.waitForTimeout(ms);
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  content(): Promise<string> {
    return this.page.content();
  }
}

export function createPlaywrightLauncher(cfg: ScraperConfig): SessionLauncher {
  return async (state) => {
    logger.info(`Launching browser (headless=${cfg.headless})...`);
    const browser = await chromium.launch({
      headless: cfg.headless,
      slowMo: cfg.slowMoMs
    });

    try {
      const context = await browser.newContext(state ? { storageState: state } : {});
      const page = await context.newPage();

      return {
        driver: new PlaywrightPageDriver(page),
        storageState: () => context.storageState(),
        close: async () => {
          logger.info("Closing browser...");
          await context.close();
          await browser.close();
        }
      };
    } catch (err) {
      await browser.close();
      throw err;
    }
  };
}
