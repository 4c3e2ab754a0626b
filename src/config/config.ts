import * as fs from "fs";
import { ConfigError } from "../utils/errors";

export interface PortalSelectors {
  loginEmail: string;
  loginPassword: string;
  loginSubmit: string;
  /** Any element that only renders for a signed-in user. */
  authenticated: string;
  table: string;
  tableHeader: string;
  tableRow: string;
  tableCell: string;
  nextPage: string;
  card: string;
  loadMore: string;
}

export interface NavigationStep {
  name: string;
  selector: string;
  /** Skipped when it never shows up instead of failing the run. */
  optional?: boolean;
  timeoutMs?: number;
  settleMs?: number;
}

/** What to do when the listing does not refresh after next / load more. */
export type RefreshTimeoutPolicy = "stop" | "fail";

export interface ScraperConfig {
  baseUrl: string;
  username: string;
  password: string;
  headless: boolean;
  slowMoMs: number;
  sessionFile: string;
  reuseSession: boolean;
  outputDir: string;
  /** Empty string turns off screenshots and page dumps on failure. */
  debugDir: string;
  sessionCheckTimeoutMs: number;
  loginTimeoutMs: number;
  stepTimeoutMs: number;
  stepSettleMs: number;
  layoutTimeoutMs: number;
  refreshTimeoutMs: number;
  refreshTimeoutPolicy: RefreshTimeoutPolicy;
  /** 0 means follow pagination until it ends. */
  maxPages: number;
  loadMoreAttempts: number;
  maxLoadRounds: number;
  numericFields: string[];
  selectors: PortalSelectors;
  cardFields: Record<string, string>;
  navigationSteps: NavigationStep[];
}

export const DEFAULT_SELECTORS: PortalSelectors = {
  loginEmail: "input[type='email']",
  loginPassword: "input[type='password']",
  loginSubmit: "button[type='submit']",
  authenticated: "button:has-text('Launch Challenge'), button:has-text('Open Options')",
  table: "table",
  tableHeader: "table thead th",
  tableRow: "table tbody tr",
  tableCell: "td",
  nextPage: "button:has-text('Next') >> visible=true",
  card: "div[class*='product'], div[class*='item'], div[class*='card']",
  loadMore: "button:has-text('Load More') >> visible=true"
};

export const DEFAULT_CARD_FIELDS: Record<string, string> = {
  Name: "h2, h3, [class*='name'], [class*='title']",
  Price: "[class*='price']"
};

export const DEFAULT_NAVIGATION_STEPS: NavigationStep[] = [
  { name: "Launch Challenge", selector: "button:has-text('Launch Challenge')", optional: true, timeoutMs: 5000, settleMs: 3000 },
  { name: "Open Options", selector: "button:has-text('Open Options')" },
  { name: "Inventory tab", selector: "button:has-text('Inventory')" },
  { name: "Access Detailed View", selector: "button:has-text('Access Detailed View')" },
  { name: "Detailed View option", selector: "div[role='dialog'] div:has-text('Detailed View')", optional: true, timeoutMs: 5000 },
  { name: "Show Full Product Table", selector: "button:has-text('Show Full Product Table')", settleMs: 5000 }
];

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name];
  return value === undefined ? fallback : value.trim();
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw.trim(), 10);
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function readPolicy(env: Env): RefreshTimeoutPolicy {
  const raw = readString(env, "ON_REFRESH_TIMEOUT", "stop").toLowerCase();
  if (raw === "stop" || raw === "fail") return raw;
  throw new ConfigError(`ON_REFRESH_TIMEOUT must be "stop" or "fail", got "${raw}"`);
}

function readList(env: Env, name: string): string[] {
  return readString(env, name, "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStep(value: unknown, index: number): NavigationStep {
  if (!isRecord(value) || typeof value.name !== "string" || typeof value.selector !== "string") {
    throw new ConfigError(`navigationSteps[${index}] needs string "name" and "selector"`);
  }
  const step: NavigationStep = { name: value.name, selector: value.selector };
  if (value.optional !== undefined) {
    if (typeof value.optional !== "boolean") {
      throw new ConfigError(`navigationSteps[${index}].optional must be a boolean`);
    }
    step.optional = value.optional;
  }
  for (const key of ["timeoutMs", "settleMs"] as const) {
    const n = value[key];
    if (n === undefined) continue;
    if (typeof n !== "number" || !Number.isInteger(n) || n < 0) {
      throw new ConfigError(`navigationSteps[${index}].${key} must be a non-negative integer`);
    }
    step[key] = n;
  }
  return step;
}

function parseStringMap(value: unknown, label: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigError(`${label} must be an object of strings`);
  }
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== "string") {
      throw new ConfigError(`${label}.${key} must be a string`);
    }
    out[key] = v;
  }
  return out;
}

/**
 * Applies a portal profile (JSON) on top of the defaults. A profile may
 * override individual selectors, the card fields and the navigation path.
 */
export function applyProfile(cfg: ScraperConfig, profile: unknown): ScraperConfig {
  if (!isRecord(profile)) {
    throw new ConfigError("Portal profile must be a JSON object");
  }
  const next: ScraperConfig = { ...cfg, selectors: { ...cfg.selectors } };

  if (profile.selectors !== undefined) {
    const overrides = parseStringMap(profile.selectors, "selectors");
    for (const [key, selector] of Object.entries(overrides)) {
      if (!isSelectorKey(key)) {
        throw new ConfigError(`Unknown selector "${key}" in portal profile`);
      }
      next.selectors[key] = selector;
    }
  }

  if (profile.cardFields !== undefined) {
    next.cardFields = parseStringMap(profile.cardFields, "cardFields");
  }

  if (profile.navigationSteps !== undefined) {
    if (!Array.isArray(profile.navigationSteps)) {
      throw new ConfigError("navigationSteps must be an array");
    }
    next.navigationSteps = profile.navigationSteps.map(parseStep);
  }

  return next;
}

function isSelectorKey(key: string): key is keyof PortalSelectors {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SELECTORS, key);
}

function loadProfile(cfg: ScraperConfig, profilePath: string): ScraperConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(profilePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read portal profile ${profilePath}: ${String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Portal profile ${profilePath} is not valid JSON: ${String(err)}`);
  }
  return applyProfile(cfg, parsed);
}

export function loadConfig(env: Env = process.env): ScraperConfig {
  const baseUrl = readString(env, "PORTAL_BASE_URL", "");
  if (!baseUrl) {
    throw new ConfigError("PORTAL_BASE_URL is required");
  }

  const cfg: ScraperConfig = {
    baseUrl,
    username: readString(env, "PORTAL_USERNAME", ""),
    password: env.PORTAL_PASSWORD ?? "",
    headless: readBool(env, "HEADLESS", true),
    slowMoMs: readInt(env, "SLOW_MO_MS", 0),
    sessionFile: readString(env, "SESSION_FILE", "session_data.json"),
    reuseSession: readBool(env, "REUSE_SESSION", true),
    outputDir: readString(env, "OUTPUT_DIR", "."),
    debugDir: readString(env, "DEBUG_DIR", "debug"),
    sessionCheckTimeoutMs: readInt(env, "SESSION_CHECK_TIMEOUT_MS", 5000),
    loginTimeoutMs: readInt(env, "LOGIN_TIMEOUT_MS", 15000),
    stepTimeoutMs: readInt(env, "STEP_TIMEOUT_MS", 10000),
    stepSettleMs: readInt(env, "STEP_SETTLE_MS", 2000),
    layoutTimeoutMs: readInt(env, "LAYOUT_TIMEOUT_MS", 10000),
    refreshTimeoutMs: readInt(env, "REFRESH_TIMEOUT_MS", 10000),
    refreshTimeoutPolicy: readPolicy(env),
    maxPages: readInt(env, "MAX_PAGES", 0),
    loadMoreAttempts: readInt(env, "LOAD_MORE_ATTEMPTS", 3),
    maxLoadRounds: readInt(env, "MAX_LOAD_ROUNDS", 100),
    numericFields: readList(env, "NUMERIC_FIELDS"),
    selectors: { ...DEFAULT_SELECTORS },
    cardFields: { ...DEFAULT_CARD_FIELDS },
    navigationSteps: DEFAULT_NAVIGATION_STEPS.map((step) => ({ ...step }))
  };

  const profilePath = readString(env, "PORTAL_PROFILE_FILE", "");
  return profilePath ? loadProfile(cfg, profilePath) : cfg;
}

const VALUE_FLAGS = new Set(["--session-file", "--output-dir"]);

/**
 * Command-line flags win over the environment:
 * --fresh-login, --session-file <path>, --output-dir <dir>, --headed
 */
export function applyCliFlags(cfg: ScraperConfig, argv: string[]): ScraperConfig {
  const next: ScraperConfig = { ...cfg };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      throw new ConfigError(`Unexpected argument ${arg}`);
    }

    let value = "";
    if (VALUE_FLAGS.has(arg)) {
      const candidate = argv[i + 1];
      if (candidate === undefined || candidate.startsWith("--")) {
        throw new ConfigError(`${arg} needs a value`);
      }
      value = candidate;
      i += 1;
    }

    switch (arg) {
      case "--fresh-login":
        next.reuseSession = false;
        break;
      case "--headed":
        next.headless = false;
        break;
      case "--session-file":
        next.sessionFile = value;
        break;
      case "--output-dir":
        next.outputDir = value;
        break;
      default:
        throw new ConfigError(`Unknown option ${arg}`);
    }
  }

  return next;
}
