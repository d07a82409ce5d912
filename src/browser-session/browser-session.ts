// ============================================================================
// BROWSER SESSION — one browser/page pair, liveness, soft-failing primitives
// ============================================================================

import { CancellationToken } from "./cancellation";
import { launchPlaywright } from "./launcher";
import {
  CLOSE_TIMEOUT_MS,
  LaunchError,
  type ActionResult,
  type AutomationSurface,
  type BrowserHandle,
  type BrowserLauncher,
  type BrowserSessionConfig,
  type ContextHandle,
  type ElementRef,
  type FailureReason,
  type LocatorHandle,
  type NavigateOptions,
  type OpenResult,
  type PageHandle,
  type ResponseEvent,
  type ResponseHandle,
  type ResponseListener,
} from "./types";

/** Hides the most common automation fingerprint before any page script runs. */
const HIDE_WEBDRIVER_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

export function withTimeout<T>(promise: Promise<T>, ms: number, timeoutError: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error(timeoutError)), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

/** Strip query string and fragment from a URL. Non-URLs are cut at the first `?` or `#`. */
export function stripQuery(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url.split(/[?#]/)[0];
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failure<T>(reason: FailureReason, error: string): ActionResult<T> {
  return { success: false, reason, error };
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || /timeout/i.test(error.message));
}

export interface BrowserSessionDeps {
  launcher?: BrowserLauncher;
  /** Shared with the task so a stop requested on either side reaches both. */
  token?: CancellationToken;
  closeTimeoutMs?: number;
}

/**
 * Owns one automation surface for its whole lifetime.
 *
 * Liveness only ever goes from true to false: through `handleDisconnected()`
 * (engine side) or `close()`. A single failed call never marks the session dead.
 */
export class BrowserSession implements AutomationSurface {
  readonly token: CancellationToken;

  private readonly launcher: BrowserLauncher;
  private readonly closeTimeoutMs: number;

  private browser: BrowserHandle | null = null;
  private context: ContextHandle | null = null;
  private page: PageHandle | null = null;

  private isAlive = false;
  private opened = false;
  private closePromise: Promise<void> | null = null;
  private lastKnownUrl = "about:blank";

  private readonly responseListeners = new Set<ResponseListener>();
  private readonly closeListeners = new Set<() => void>();

  constructor(
    private readonly config: BrowserSessionConfig,
    deps: BrowserSessionDeps = {}
  ) {
    this.launcher = deps.launcher ?? launchPlaywright;
    this.token = deps.token ?? new CancellationToken();
    this.closeTimeoutMs = deps.closeTimeoutMs ?? CLOSE_TIMEOUT_MS;
  }

  get alive(): boolean {
    return this.isAlive;
  }

  shouldContinue(): boolean {
    return this.isAlive && !this.token.isCancelled;
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  async open(): Promise<OpenResult> {
    if (this.closePromise) {
      return { success: false, error: new LaunchError("Session was already closed", "state") };
    }
    if (this.opened) {
      return { success: false, error: new LaunchError("Session was already opened", "state") };
    }
    this.opened = true;

    let stage: LaunchError["stage"] = "launch";
    try {
      const browser = await this.launcher(this.config);
      this.browser = browser;
      browser.on("disconnected", () => this.handleDisconnected());
      this.assertStartupWanted();

      stage = "context";
      const { viewport, userAgent } = this.config;
      this.context = await browser.newContext({
        viewport,
        screen: viewport,
        ...(userAgent && { userAgent }),
      });
      this.assertStartupWanted();

      stage = "page";
      const page = await this.context.newPage();
      this.page = page;
      this.assertStartupWanted();
      page.setDefaultTimeout(this.config.defaultTimeoutMs);
      await page.addInitScript(HIDE_WEBDRIVER_SCRIPT);
      this.assertStartupWanted();
      page.on("response", response => this.dispatchResponse(response));

      this.isAlive = browser.isConnected();
      if (!this.isAlive) {
        throw new Error("Browser disconnected during startup");
      }
    } catch (error) {
      const message = describeError(error);
      console.log(`[BrowserSession.open] Failed at ${stage}: ${message}`);
      await this.teardown();
      this.isAlive = false;
      return { success: false, error: new LaunchError(message, stage) };
    }

    // Warm-up so the first real navigation doesn't pay the renderer start cost.
    const warmUp = await this.navigate("about:blank", { waitUntil: "domcontentloaded" });
    if (!warmUp.success) {
      console.log(`[BrowserSession.open] Warm-up navigation failed (continuing): ${warmUp.error}`);
    }

    console.log(`[BrowserSession.open] Session ready (${this.config.type}, headless=${this.config.headless})`);
    return { success: true };
  }

  /** A close or stop that arrives while `open()` is suspended ends the startup. */
  private assertStartupWanted(): void {
    if (this.closePromise || this.token.isCancelled) {
      throw new Error("Session was stopped during startup");
    }
  }

  /**
   * Engine reported the browser is gone. The single authority for turning
   * liveness off from the engine side; there is no way back.
   */
  handleDisconnected(): void {
    if (!this.isAlive) return;
    this.isAlive = false;
    console.log("[BrowserSession] Browser disconnected");
    this.notifyClosed();
  }

  /** Cooperative stop: flips the shared token and schedules a best-effort close. */
  requestStop(): void {
    const wasCancelled = this.token.isCancelled;
    this.token.cancel();
    if (!wasCancelled) {
      console.log("[BrowserSession] Stop requested");
    }
    if (this.opened) {
      this.close().catch(error => {
        console.log(`[BrowserSession] Scheduled close failed: ${describeError(error)}`);
      });
    }
  }

  /** Idempotent; later calls await the same teardown. */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.runClose();
    }
    return this.closePromise;
  }

  private async runClose(): Promise<void> {
    this.isAlive = false;
    await this.teardown();
    this.notifyClosed();
    console.log("[BrowserSession.close] Session closed");
  }

  /** Release page → context → browser. Each layer is attempted even if an earlier one failed. */
  private async teardown(): Promise<void> {
    const page = this.page;
    const context = this.context;
    const browser = this.browser;
    this.page = null;
    this.context = null;
    this.browser = null;

    if (page) {
      await this.closeLayer("page", async () => {
        if (!page.isClosed()) await page.close();
      });
    }
    if (context) {
      await this.closeLayer("context", () => context.close());
    }
    if (browser) {
      await this.closeLayer("browser", () => browser.close());
    }
  }

  private async closeLayer(name: string, close: () => Promise<void>): Promise<void> {
    try {
      await withTimeout(close(), this.closeTimeoutMs, `Close ${name} timeout`);
    } catch (error) {
      console.log(`[BrowserSession.close] Failed to close ${name}: ${describeError(error)}`);
    }
  }

  // ==========================================================================
  // RESPONSE EVENTS
  // ==========================================================================

  onResponse(listener: ResponseListener): () => void {
    this.responseListeners.add(listener);
    return () => {
      this.responseListeners.delete(listener);
    };
  }

  /**
   * Lazy stream of response events that ends when the session closes.
   * Each iterator is a fresh subscription that starts when the iterator is
   * created; consumers that only need the latest status may drop events.
   */
  subscribeResponses(): AsyncIterable<ResponseEvent> {
    return {
      [Symbol.asyncIterator]: () => this.createResponseIterator(),
    };
  }

  private createResponseIterator(): AsyncIterator<ResponseEvent> {
    const ended: IteratorResult<ResponseEvent> = { done: true, value: undefined };
    const buffered: ResponseEvent[] = [];
    const waiting: Array<(result: IteratorResult<ResponseEvent>) => void> = [];
    let done = this.closePromise !== null || (this.opened && !this.isAlive);

    const unsubscribe = this.onResponse(event => {
      const resolve = waiting.shift();
      if (resolve) {
        resolve({ done: false, value: event });
      } else {
        buffered.push(event);
      }
    });

    const finish = (): void => {
      done = true;
      unsubscribe();
      this.closeListeners.delete(finish);
      for (const resolve of waiting.splice(0)) {
        resolve(ended);
      }
    };
    this.closeListeners.add(finish);
    if (done) finish();

    return {
      next: (): Promise<IteratorResult<ResponseEvent>> => {
        const event = buffered.shift();
        if (event) return Promise.resolve({ done: false, value: event });
        if (done) return Promise.resolve(ended);
        return new Promise(resolve => {
          waiting.push(resolve);
        });
      },
      return: (): Promise<IteratorResult<ResponseEvent>> => {
        finish();
        return Promise.resolve(ended);
      },
    };
  }

  private dispatchResponse(response: ResponseHandle): void {
    const event: ResponseEvent = {
      urlPathWithoutQuery: stripQuery(response.url()),
      statusCode: response.status(),
      timestampMonotonic: performance.now(),
    };
    for (const listener of this.responseListeners) {
      try {
        listener(event);
      } catch (error) {
        console.log(`[BrowserSession] Response listener failed: ${describeError(error)}`);
      }
    }
  }

  private notifyClosed(): void {
    for (const listener of [...this.closeListeners]) {
      listener();
    }
  }

  // ==========================================================================
  // PRIMITIVES
  // ==========================================================================

  /**
   * Shared guard for every primitive: skip when the session cannot continue,
   * and classify engine errors. A failure that raced a stop or disconnect is
   * reported as skipped, not failed.
   */
  private async perform<T>(
    label: string,
    action: (page: PageHandle) => Promise<T>,
    notFoundOnTimeout = false
  ): Promise<ActionResult<T>> {
    const page = this.page;
    if (!page || !this.shouldContinue()) {
      return failure("skipped", `${label} skipped: session is not active`);
    }
    try {
      return { success: true, value: await action(page) };
    } catch (error) {
      const message = describeError(error);
      if (!this.shouldContinue()) {
        return failure("skipped", `${label} interrupted: ${message}`);
      }
      if (notFoundOnTimeout && isTimeoutError(error)) {
        return failure("not-found", `${label}: ${message}`);
      }
      return failure("failed", `${label}: ${message}`);
    }
  }

  private element(page: PageHandle, selector: string): LocatorHandle {
    return page.locator(selector).first();
  }

  async navigate(url: string, options: NavigateOptions = {}): Promise<ActionResult<void>> {
    return this.perform(`navigate ${url}`, async page => {
      await page.goto(url, {
        waitUntil: options.waitUntil ?? "load",
        timeout: options.timeoutMs ?? this.config.navigationTimeoutMs,
      });
      this.lastKnownUrl = page.url();
    });
  }

  async reload(options: NavigateOptions = {}): Promise<ActionResult<void>> {
    return this.perform("reload", async page => {
      await page.reload({
        waitUntil: options.waitUntil ?? "load",
        timeout: options.timeoutMs ?? this.config.navigationTimeoutMs,
      });
      this.lastKnownUrl = page.url();
    });
  }

  async content(): Promise<ActionResult<string>> {
    return this.perform("content", page => page.content());
  }

  async locate(selector: string, timeoutMs?: number): Promise<ActionResult<ElementRef>> {
    return this.perform(
      `locate ${selector}`,
      async page => {
        await this.element(page, selector).waitFor({
          state: "visible",
          timeout: timeoutMs ?? this.config.defaultTimeoutMs,
        });
        return { selector };
      },
      true
    );
  }

  async fill(selector: string, text: string): Promise<ActionResult<void>> {
    return this.perform(`fill ${selector}`, page => this.element(page, selector).fill(text), true);
  }

  async inputValue(selector: string): Promise<ActionResult<string>> {
    return this.perform(`inputValue ${selector}`, page => this.element(page, selector).inputValue(), true);
  }

  async click(selector: string): Promise<ActionResult<void>> {
    return this.perform(`click ${selector}`, page => this.element(page, selector).click(), true);
  }

  async screenshot(selector: string): Promise<ActionResult<Buffer>> {
    return this.perform(`screenshot ${selector}`, page => this.element(page, selector).screenshot(), true);
  }

  async textContent(selector: string, timeoutMs?: number): Promise<ActionResult<string | null>> {
    return this.perform(
      `textContent ${selector}`,
      page =>
        this.element(page, selector).textContent({
          timeout: timeoutMs ?? this.config.defaultTimeoutMs,
        }),
      true
    );
  }

  async count(selector: string): Promise<ActionResult<number>> {
    return this.perform(`count ${selector}`, page => page.locator(selector).count());
  }

  async evaluateScript(code: string): Promise<ActionResult<unknown>> {
    return this.perform("evaluateScript", page => page.evaluate(code));
  }

  currentUrl(): ActionResult<string> {
    const page = this.page;
    if (!page || !this.shouldContinue()) {
      return failure("skipped", "currentUrl skipped: session is not active");
    }
    try {
      this.lastKnownUrl = page.url();
      return { success: true, value: this.lastKnownUrl };
    } catch (error) {
      return failure("failed", `currentUrl: ${describeError(error)}`);
    }
  }

  /** Last URL the session observed, available even after close. */
  get lastUrl(): string {
    return this.lastKnownUrl;
  }
}
