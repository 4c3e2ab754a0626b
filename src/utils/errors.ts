/**
 * Error kinds raised by the extractor pipeline. Every pipeline error records
 * the step that failed so the operator can tell where the run stopped.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ExtractorError extends Error {
  readonly step: string;

  constructor(message: string, step: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractorError";
    this.step = step;
  }
}

/** Credentials rejected, missing, or the login page could not be reached. */
export class LoginFailure extends ExtractorError {
  constructor(message: string, step: string, options?: { cause?: unknown }) {
    super(message, step, options);
    this.name = "LoginFailure";
  }
}

export class NavigationTimeout extends ExtractorError {
  readonly selector: string;
  readonly timeoutMs: number;

  constructor(step: string, selector: string, timeoutMs: number) {
    super(
      `Navigation step "${step}" timed out after ${timeoutMs}ms waiting for ${selector}`,
      step
    );
    this.name = "NavigationTimeout";
    this.selector = selector;
    this.timeoutMs = timeoutMs;
  }
}

/** The listing did not refresh after a pagination or load-more trigger. */
export class ExtractionTimeout extends ExtractorError {
  readonly pageNumber: number;
  readonly timeoutMs: number;

  constructor(step: "pagination" | "load-more", pageNumber: number, timeoutMs: number) {
    super(
      step === "pagination"
        ? `Page ${pageNumber} did not load within ${timeoutMs}ms after clicking next`
        : `No new cards appeared within ${timeoutMs}ms after load more (round ${pageNumber})`,
      step
    );
    this.name = "ExtractionTimeout";
    this.pageNumber = pageNumber;
    this.timeoutMs = timeoutMs;
  }
}

export class WriteFailure extends ExtractorError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to write ${filePath}: ${messageOf(cause)}`, "write", { cause });
    this.name = "WriteFailure";
    this.filePath = filePath;
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeError(err: unknown): string {
  if (err instanceof ExtractorError) {
    return `${err.name} [${err.step}]: ${err.message}`;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
