import * as fs from "fs";
import { loadConfig, ScraperConfig } from "../../config/config";
import {
  CardSnapshot,
  ControlState,
  PageDriver,
  PortalSession,
  SessionLauncher,
  SessionState,
  SessionStore
} from "../../types/Portal";

export const BASE_URL = "https://portal.test/";
export const USERNAME = "tester@example.com";
export const PASSWORD = "test-secret";
export const VALID_TOKEN = "valid-token";

export function testConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  const cfg = loadConfig({
    PORTAL_BASE_URL: BASE_URL,
    PORTAL_USERNAME: USERNAME,
    PORTAL_PASSWORD: PASSWORD,
    DEBUG_DIR: "",
    STEP_SETTLE_MS: "0"
  });
  return { ...cfg, ...overrides };
}

export function sessionWithToken(token: string): SessionState {
  return {
    cookies: [
      {
        name: "session",
        value: token,
        domain: "portal.test",
        path: "/",
        expires: -1,
        httpOnly: true,
        secure: true,
        sameSite: "Lax"
      }
    ],
    origins: []
  };
}

export interface FakeTable {
  headers: string[];
  pages: string[][][];
  /** How the next control looks on the last page. */
  lastPageNext?: "disabled" | "absent";
  /** Clicking next on this 1-based page never loads the following one. */
  stuckOnPage?: number;
}

export interface FakeCards {
  cards: CardSnapshot[];
  initial: number;
  perLoad: number;
  trigger: "load-more" | "scroll";
  /** Loading stops responding once this many cards are shown. */
  stuckAt?: number;
}

export interface FakePortalOptions {
  credentials?: { username: string; password: string };
  table?: FakeTable;
  cards?: FakeCards;
  /** Navigation selectors that never appear. */
  missingSelectors?: string[];
  landingFails?: boolean;
}

/** Builds table pages of `rowsPerPage` rows: ["P<n>", "Product <n>", "<n*10>"]. */
export function productPages(pageCount: number, rowsPerPage: number): string[][][] {
  const pages: string[][][] = [];
  for (let p = 0; p < pageCount; p++) {
    const rows: string[][] = [];
    for (let r = 0; r < rowsPerPage; r++) {
      const n = p * rowsPerPage + r + 1;
      rows.push([`P${n}`, `Product ${n}`, String(n * 10)]);
    }
    pages.push(rows);
  }
  return pages;
}

/**
 * In-memory portal. Signed-out it shows only the login form; signed-in it
 * shows the navigation buttons and whichever listing the options describe.
 */
export class FakePageDriver implements PageDriver {
  authenticated = false;
  readonly visits: string[] = [];
  readonly clicks: string[] = [];
  readonly filled = new Map<string, string>();
  readonly fills: string[] = [];
  readonly settles: number[] = [];
  readonly screenshots: string[] = [];
  pageIndex = 0;
  cardsShown: number;

  private readonly selectors = testConfig().selectors;

  constructor(private readonly options: FakePortalOptions = {}) {
    this.cardsShown = options.cards?.initial ?? 0;
  }

  private isShown(selector: string): boolean {
    const s = this.selectors;
    const { table, cards } = this.options;

    if (selector === s.loginEmail || selector === s.loginPassword || selector === s.loginSubmit) {
      return !this.authenticated;
    }
    if (!this.authenticated) return false;
    if (selector === s.authenticated) return true;
    if (selector === s.table) return table !== undefined;
    if (selector === s.tableRow) return table !== undefined && this.currentRows().length > 0;
    if (selector === s.card) return cards !== undefined && this.cardsShown > 0;
    if (selector === s.nextPage || selector === s.loadMore) {
      return this.controlStateSync(selector) !== "absent";
    }
    return !(this.options.missingSelectors ?? []).includes(selector);
  }

  private currentRows(): string[][] {
    return this.options.table?.pages[this.pageIndex] ?? [];
  }

  private controlStateSync(selector: string): ControlState {
    const { table, cards } = this.options;
    if (selector === this.selectors.nextPage) {
      if (!table) return "absent";
      if (this.pageIndex < table.pages.length - 1) return "enabled";
      return table.lastPageNext ?? "disabled";
    }
    if (selector === this.selectors.loadMore) {
      if (!cards || cards.trigger !== "load-more") return "absent";
      return this.cardsShown < cards.cards.length ? "enabled" : "absent";
    }
    return this.isShown(selector) ? "enabled" : "absent";
  }

  private loadMoreCards(): void {
    const cards = this.options.cards;
    if (!cards) return;
    if (cards.stuckAt !== undefined && this.cardsShown >= cards.stuckAt) return;
    this.cardsShown = Math.min(cards.cards.length, this.cardsShown + cards.perLoad);
  }

  async goto(url: string): Promise<void> {
    this.visits.push(url);
    if (this.options.landingFails) {
      throw new Error("net::ERR_NAME_NOT_RESOLVED");
    }
  }

  url(): string {
    return this.authenticated ? `${BASE_URL}dashboard` : `${BASE_URL}login`;
  }

  async waitForVisible(selector: string): Promise<boolean> {
    return this.isShown(selector);
  }

  async firstVisible(selectors: string[]): Promise<string | null> {
    return selectors.find((s) => this.isShown(s)) ?? null;
  }

  async click(selector: string): Promise<void> {
    if (!this.isShown(selector)) {
      throw new Error(`Timed out clicking ${selector}`);
    }
    this.clicks.push(selector);

    const s = this.selectors;
    const credentials = this.options.credentials ?? { username: USERNAME, password: PASSWORD };
    if (selector === s.loginSubmit) {
      this.authenticated =
        this.filled.get(s.loginEmail) === credentials.username &&
        this.filled.get(s.loginPassword) === credentials.password;
    } else if (selector === s.nextPage) {
      const table = this.options.table;
      if (table && table.stuckOnPage !== this.pageIndex + 1 && this.pageIndex < table.pages.length - 1) {
        this.pageIndex += 1;
      }
    } else if (selector === s.loadMore) {
      this.loadMoreCards();
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    this.fills.push(selector);
    this.filled.set(selector, value);
  }

  async count(selector: string): Promise<number> {
    if (selector === this.selectors.card) return this.cardsShown;
    return this.isShown(selector) ? 1 : 0;
  }

  async controlState(selector: string): Promise<ControlState> {
    return this.controlStateSync(selector);
  }

  async textsOf(selector: string): Promise<string[]> {
    return selector === this.selectors.tableHeader ? [...(this.options.table?.headers ?? [])] : [];
  }

  async tableRows(): Promise<string[][]> {
    return this.currentRows().map((row) => [...row]);
  }

  async cards(): Promise<CardSnapshot[]> {
    return (this.options.cards?.cards ?? []).slice(0, this.cardsShown);
  }

  async signature(): Promise<string> {
    return this.currentRows()
      .map((row) => row.join(" ").trim())
      .join("\n");
  }

  async waitForSignatureChange(selector: string, previous: string): Promise<boolean> {
    const current = await this.signature();
    return current !== "" && current !== previous;
  }

  async waitForCountAbove(selector: string, previous: number): Promise<boolean> {
    return (await this.count(selector)) > previous;
  }

  async scrollToBottom(): Promise<void> {
    if (this.options.cards?.trigger === "scroll") this.loadMoreCards();
  }

  async settle(ms: number): Promise<void> {
    this.settles.push(ms);
  }

  async screenshot(filePath: string): Promise<void> {
    this.screenshots.push(filePath);
    fs.writeFileSync(filePath, "fake-png");
  }

  async content(): Promise<string> {
    return "<html><body>fake portal</body></html>";
  }
}

/** Launches FakePageDriver sessions; a saved state is honoured only for VALID_TOKEN. */
export class FakeLauncher {
  readonly launchedWith: (SessionState | null)[] = [];
  readonly drivers: FakePageDriver[] = [];
  closed = 0;

  constructor(private readonly options: FakePortalOptions = {}) {}

  readonly launch: SessionLauncher = async (state) => {
    this.launchedWith.push(state);
    const driver = new FakePageDriver(this.options);
    driver.authenticated =
      state !== null &&
      state.cookies.some((c) => c.name === "session" && c.value === VALID_TOKEN);
    this.drivers.push(driver);

    const session: PortalSession = {
      driver,
      storageState: async () =>
        driver.authenticated ? sessionWithToken(VALID_TOKEN) : { cookies: [], origins: [] },
      close: async () => {
        this.closed += 1;
      }
    };
    return session;
  };

  get driver(): FakePageDriver {
    const last = this.drivers[this.drivers.length - 1];
    if (!last) throw new Error("No session launched");
    return last;
  }
}

export class MemorySessionStore implements SessionStore {
  readonly saved: SessionState[] = [];
  loads = 0;

  constructor(private current: SessionState | null = null) {}

  async load(): Promise<SessionState | null> {
    this.loads += 1;
    return this.current;
  }

  async save(state: SessionState): Promise<void> {
    this.saved.push(state);
    this.current = state;
  }
}

export function card(fields: Record<string, string | null>, text: string): CardSnapshot {
  return { fields, text };
}
