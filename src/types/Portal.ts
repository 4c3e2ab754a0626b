import type { BrowserContext } from "playwright";

/** Playwright storage state: cookies plus per-origin local storage. */
export type SessionState = Awaited<ReturnType<BrowserContext["storageState"]>>;

export type ControlState = "enabled" | "disabled" | "absent";

export type ListingLayout = "table" | "cards" | "empty";

export interface CardSnapshot {
  /** Text of the first match of each configured field selector, or null. */
  fields: Record<string, string | null>;
  text: string;
}

/**
 * The page operations the services rely on. Implemented over Playwright by
 * PlaywrightPageDriver; every wait is bounded and reports a timeout as false
 * or null instead of throwing.
 */
export interface PageDriver {
  goto(url: string): Promise<void>;
  url(): string;
  waitForVisible(selector: string, timeoutMs: number): Promise<boolean>;
  /** Returns whichever selector becomes visible first, or null on timeout. */
  firstVisible(selectors: string[], timeoutMs: number): Promise<string | null>;
  click(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  count(selector: string): Promise<number>;
  controlState(selector: string): Promise<ControlState>;
  textsOf(selector: string): Promise<string[]>;
  tableRows(rowSelector: string, cellSelector: string): Promise<string[][]>;
  cards(cardSelector: string, fields: Record<string, string>): Promise<CardSnapshot[]>;
  /** Trimmed text of every match of selector, joined by newlines. */
  signature(selector: string): Promise<string>;
  waitForSignatureChange(selector: string, previous: string, timeoutMs: number): Promise<boolean>;
  waitForCountAbove(selector: string, previous: number, timeoutMs: number): Promise<boolean>;
  scrollToBottom(): Promise<void>;
  settle(ms: number): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  content(): Promise<string>;
}

export interface PortalSession {
  driver: PageDriver;
  storageState(): Promise<SessionState>;
  close(): Promise<void>;
}

export type SessionLauncher = (state: SessionState | null) => Promise<PortalSession>;

export interface SessionStore {
  load(): Promise<SessionState | null>;
  save(state: SessionState): Promise<void>;
}
