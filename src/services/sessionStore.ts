import { SessionState, SessionStore } from "../types/Portal";
import { readJsonFile, writeJsonFile } from "../utils/jsonStore";
import { logger } from "../utils/logger";

export function isSessionState(value: unknown): value is SessionState {
  return (
    typeof value === "object" &&
    value !== null &&
    "cookies" in value &&
    "origins" in value &&
    Array.isArray(value.cookies) &&
    Array.isArray(value.origins)
  );
}

export function isEmptySessionState(state: SessionState): boolean {
  return state.cookies.length === 0 && state.origins.length === 0;
}

export function createFileSessionStore(filePath: string): SessionStore {
  return {
    async load(): Promise<SessionState | null> {
      let parsed: unknown;
      try {
        parsed = await readJsonFile(filePath);
      } catch (err) {
        logger.warn(`Failed to load session from ${filePath}: ${String(err)}`);
        return null;
      }

      if (parsed === null) {
        logger.info(`No saved session at ${filePath}`);
        return null;
      }
      if (!isSessionState(parsed)) {
        logger.warn(`Ignoring ${filePath}: not a browser storage state`);
        return null;
      }

      logger.info(`Session loaded from ${filePath}`);
      return parsed;
    },

    async save(state: SessionState): Promise<void> {
      await writeJsonFile(filePath, state);
      logger.info(`Session saved to ${filePath}`);
    }
  };
}
