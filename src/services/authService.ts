import { ScraperConfig } from "../config/config";
import {
  PageDriver,
  PortalSession,
  SessionLauncher,
  SessionStore
} from "../types/Portal";
import { saveDebugArtifacts } from "../utils/debugArtifacts";
import { LoginFailure, messageOf } from "../utils/errors";
import { logger } from "../utils/logger";
import { isEmptySessionState } from "./sessionStore";

export interface OpenedSession {
  session: PortalSession;
  /** True when saved state was accepted and the login form was never used. */
  resumed: boolean;
}

export async function isAuthenticated(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<boolean> {
  const { authenticated, loginEmail } = cfg.selectors;
  const seen = await driver.firstVisible(
    [authenticated, loginEmail],
    cfg.sessionCheckTimeoutMs
  );
  return seen === authenticated;
}

export async function authenticate(
  driver: PageDriver,
  cfg: ScraperConfig
): Promise<void> {
  const { loginEmail, loginPassword, loginSubmit, authenticated } = cfg.selectors;

  if (!cfg.username || !cfg.password) {
    throw new LoginFailure(
      "No credentials configured; set PORTAL_USERNAME and PORTAL_PASSWORD",
      "credentials"
    );
  }

  logger.info("Authenticating...");
  const formVisible =
    (await driver.waitForVisible(loginEmail, cfg.loginTimeoutMs)) &&
    (await driver.waitForVisible(loginPassword, cfg.loginTimeoutMs));
  if (!formVisible) {
    throw new LoginFailure(
      `Login form did not appear at ${driver.url()}`,
      "login-form"
    );
  }

  await driver.fill(loginEmail, cfg.username);
  await driver.fill(loginPassword, cfg.password);
  logger.info("Submitting login form...");
  await driver.click(loginSubmit);

  if (!(await driver.waitForVisible(authenticated, cfg.loginTimeoutMs))) {
    throw new LoginFailure(
      `Login was not accepted within ${cfg.loginTimeoutMs}ms (still at ${driver.url()})`,
      "post-login"
    );
  }
  logger.info("Authentication successful");
}

async function persistSession(
  session: PortalSession,
  store: SessionStore
): Promise<void> {
  const state = await session.storageState();
  if (isEmptySessionState(state)) {
    logger.warn("Session data is empty, not saving it. Login may not persist.");
    return;
  }
  await store.save(state);
}

/**
 * Opens the portal, resuming the saved session when it still reaches the
 * signed-in page and logging in once otherwise. The session is closed here
 * if anything fails; on success the caller owns it.
 */
export async function openSession(
  cfg: ScraperConfig,
  launch: SessionLauncher,
  store: SessionStore
): Promise<OpenedSession> {
  const saved = cfg.reuseSession ? await store.load() : null;
  const session = await launch(saved);

  try {
    logger.info(`Navigating to ${cfg.baseUrl}`);
    try {
      await session.driver.goto(cfg.baseUrl);
    } catch (err) {
      throw new LoginFailure(
        `Could not open ${cfg.baseUrl}: ${messageOf(err)}`,
        "landing",
        { cause: err }
      );
    }

    if (saved && (await isAuthenticated(session.driver, cfg))) {
      logger.info("Using existing session");
      return { session, resumed: true };
    }

    if (saved) {
      logger.warn("Saved session is no longer valid, logging in again");
    } else {
      logger.info("No valid session found");
    }

    await authenticate(session.driver, cfg);
    await persistSession(session, store);
    return { session, resumed: false };
  } catch (err) {
    logger.error(`Login failed: ${messageOf(err)}`);
    await saveDebugArtifacts(session.driver, err, cfg.debugDir, "login");
    await session.close();
    throw err;
  }
}
