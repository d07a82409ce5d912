// ============================================================================
// BROWSER SESSION TYPES — action results, response events, engine handles
// ============================================================================

/** Default timeout for closing one teardown layer (ms) */
export const CLOSE_TIMEOUT_MS = 10_000;

export type BrowserType = "chromium" | "firefox" | "webkit";

export type LoadState = "load" | "domcontentloaded" | "networkidle" | "commit";

/** Why a primitive did not produce a value. */
export type FailureReason =
  /** Session not alive or a stop was requested; the engine was not (usefully) called */
  | "skipped"
  /** Element did not appear within the timeout */
  | "not-found"
  /** The engine call itself failed */
  | "failed";

/**
 * Outcome of a browser primitive. Primitives never throw for expected
 * conditions; callers branch on `success`.
 */
export type ActionResult<T> =
  | { success: true; value: T }
  | { success: false; reason: FailureReason; error: string };

/** Handle returned by `locate()`. Selector-based: the element is re-resolved on use. */
export interface ElementRef {
  selector: string;
}

/** One completed network exchange observed on the page. */
export interface ResponseEvent {
  /** Full URL with query string and fragment removed */
  urlPathWithoutQuery: string;
  statusCode: number;
  /** `performance.now()` at observation time */
  timestampMonotonic: number;
}

export type ResponseListener = (event: ResponseEvent) => void;

export interface BrowserSessionConfig {
  type: BrowserType;
  headless: boolean;
  /** Default per-call timeout for element operations (ms) */
  defaultTimeoutMs: number;
  /** Timeout for navigate/reload (ms) */
  navigationTimeoutMs: number;
  viewport: { width: number; height: number };
  executablePath?: string;
  userAgent?: string;
  openDevtools: boolean;
  slowMoMs: number;
}

export interface NavigateOptions {
  waitUntil?: LoadState;
  timeoutMs?: number;
}

/**
 * Contract every pipeline component drives. `BrowserSession` implements it;
 * tests substitute in-process fakes.
 */
export interface AutomationSurface {
  readonly alive: boolean;
  shouldContinue(): boolean;
  requestStop(): void;

  navigate(url: string, options?: NavigateOptions): Promise<ActionResult<void>>;
  reload(options?: NavigateOptions): Promise<ActionResult<void>>;
  content(): Promise<ActionResult<string>>;
  locate(selector: string, timeoutMs?: number): Promise<ActionResult<ElementRef>>;
  fill(selector: string, text: string): Promise<ActionResult<void>>;
  inputValue(selector: string): Promise<ActionResult<string>>;
  click(selector: string): Promise<ActionResult<void>>;
  screenshot(selector: string): Promise<ActionResult<Buffer>>;
  textContent(selector: string, timeoutMs?: number): Promise<ActionResult<string | null>>;
  count(selector: string): Promise<ActionResult<number>>;
  evaluateScript(code: string): Promise<ActionResult<unknown>>;
  currentUrl(): ActionResult<string>;

  onResponse(listener: ResponseListener): () => void;
}

// ============================================================================
// ENGINE HANDLES — the slice of Playwright's Browser/Context/Page we rely on
// ============================================================================

export interface ResponseHandle {
  url(): string;
  status(): number;
}

export interface LocatorHandle {
  first(): LocatorHandle;
  count(): Promise<number>;
  waitFor(options?: { state?: "attached" | "detached" | "visible" | "hidden"; timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  inputValue(options?: { timeout?: number }): Promise<string>;
  click(options?: { timeout?: number }): Promise<void>;
  screenshot(options?: { timeout?: number }): Promise<Buffer>;
  textContent(options?: { timeout?: number }): Promise<string | null>;
}

export interface PageHandle {
  goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
  reload(options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
  content(): Promise<string>;
  url(): string;
  evaluate(expression: string): Promise<unknown>;
  locator(selector: string): LocatorHandle;
  addInitScript(script: string): Promise<void>;
  setDefaultTimeout(timeout: number): void;
  on(event: "response", listener: (response: ResponseHandle) => void): unknown;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface ContextHandle {
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

export interface BrowserHandle {
  newContext(options?: {
    viewport?: { width: number; height: number };
    screen?: { width: number; height: number };
    userAgent?: string;
  }): Promise<ContextHandle>;
  on(event: "disconnected", listener: () => void): unknown;
  isConnected(): boolean;
  close(): Promise<void>;
}

/** Starts a browser process for the given configuration. */
export type BrowserLauncher = (config: BrowserSessionConfig) => Promise<BrowserHandle>;

export type OpenResult =
  | { success: true }
  | { success: false; error: LaunchError };

/** Session could not be established. Partially created resources are already released. */
export class LaunchError extends Error {
  constructor(message: string, readonly stage: "launch" | "context" | "page" | "state") {
    super(message);
    this.name = "LaunchError";
  }
}
