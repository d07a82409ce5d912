// ============================================================================
// NAVIGATION CONTROLLER — reliable page load via status correlation + DOM markers
// ============================================================================

import { createTiming, type AutomationSurface, type Timing } from "../browser-session";
import { mainDocumentMatcher, StatusSlot, type StatusMatcher } from "./status-slot";
import type { NavigationAttempt, NavigationOutcome, NavigationResult, Navigator } from "./types";

export interface NavigationSettings {
  /** Total navigation attempts */
  maxRetries: number;
  retryDelayMs: number;
  /** Pause after navigate/reload before looking at the status */
  settleDelayMs: number;
  /** Bound on waiting for the main-document status */
  statusWaitMs: number;
  statusPollIntervalMs: number;
  /** Pause after a 200 before reading page content */
  renderDelayMs: number;
  navigationTimeoutMs: number;
  /** Any one of these in the page content means the page really loaded */
  domMarkers: string[];
  /** Selector awaited by `waitForPageReady` */
  readyMarker: string;
}

const GATEWAY_ERROR = 502;

/**
 * Loads the query page, retrying on gateway errors, unexpected statuses and
 * half-rendered pages. Only the final verdict is reported upward; individual
 * attempt failures are logged and recorded in `attempts`.
 */
export class NavigationController implements Navigator {
  private readonly mainDocument: StatusSlot;
  private matcher: StatusMatcher | null = null;
  private detach: (() => void) | null = null;

  constructor(
    private readonly surface: AutomationSurface,
    private readonly settings: NavigationSettings,
    private readonly timing: Timing = createTiming()
  ) {
    this.mainDocument = new StatusSlot("main-document", path => this.matcher?.(path) ?? false);
  }

  /** Subscribe once for the controller's lifetime. */
  attach(): void {
    if (this.detach) return;
    this.detach = this.mainDocument.attach(this.surface);
  }

  dispose(): void {
    this.detach?.();
    this.detach = null;
  }

  get statusSlot(): StatusSlot {
    return this.mainDocument;
  }

  async navigateReliably(url: string): Promise<NavigationResult> {
    this.attach();
    this.matcher = mainDocumentMatcher(url);

    const { maxRetries, retryDelayMs } = this.settings;
    const attempts: NavigationAttempt[] = [];

    for (let attemptIndex = 1; attemptIndex <= maxRetries; attemptIndex++) {
      if (!this.surface.shouldContinue()) {
        console.log("[navigateReliably] Stop requested, abandoning navigation");
        break;
      }

      console.log(`[navigateReliably] Attempt ${attemptIndex}/${maxRetries}: ${url}`);
      const outcome = await this.attempt(url);
      attempts.push({ attemptIndex, outcome, statusCode: this.mainDocument.current });

      if (outcome === "success") {
        console.log(`[navigateReliably] Page loaded on attempt ${attemptIndex}`);
        return { status: "success", attempts };
      }

      console.log(`[navigateReliably] Attempt ${attemptIndex} failed: ${outcome} (status ${this.mainDocument.current ?? "unknown"})`);
      if (attemptIndex < maxRetries) {
        const completed = await this.timing.sleep(retryDelayMs);
        if (!completed) {
          console.log("[navigateReliably] Stop requested during retry delay");
          break;
        }
      }
    }

    console.log(`[navigateReliably] Giving up after ${attempts.length} attempt(s)`);
    return { status: "failed", attempts };
  }

  private async attempt(url: string): Promise<NavigationOutcome> {
    const { navigationTimeoutMs, settleDelayMs, renderDelayMs } = this.settings;

    const navigated = await this.mainDocument.expectFresh(() =>
      this.surface.navigate(url, { waitUntil: "domcontentloaded", timeoutMs: navigationTimeoutMs })
    );
    if (!navigated.success) {
      console.log(`[navigateReliably] ${navigated.error}`);
      return "transportFailure";
    }

    await this.timing.sleep(settleDelayMs);
    await this.waitForStatus();

    const status = this.mainDocument.current;
    if (status === GATEWAY_ERROR) return "gatewayError";
    if (status !== 200) return "otherStatus";

    await this.timing.sleep(renderDelayMs);
    if (await this.hasDomMarker()) return "success";

    // 200 without the expected content: one reload, then one more look.
    console.log("[navigateReliably] DOM markers missing after 200, reloading");
    const reloaded = await this.mainDocument.expectFresh(() =>
      this.surface.reload({ waitUntil: "domcontentloaded", timeoutMs: navigationTimeoutMs })
    );
    if (!reloaded.success) {
      console.log(`[navigateReliably] ${reloaded.error}`);
      return "domMarkerMissing";
    }
    await this.timing.sleep(settleDelayMs);
    await this.waitForStatus();

    return (await this.hasDomMarker()) ? "success" : "domMarkerMissing";
  }

  private waitForStatus(): Promise<boolean> {
    return this.mainDocument.waitFor(
      status => status !== null,
      { timeoutMs: this.settings.statusWaitMs, intervalMs: this.settings.statusPollIntervalMs },
      this.timing
    );
  }

  private async hasDomMarker(): Promise<boolean> {
    const html = await this.surface.content();
    if (!html.success) return false;
    return this.settings.domMarkers.some(marker => html.value.includes(marker));
  }

  /** One bounded wait for the ready marker. No retries. */
  async waitForPageReady(timeoutMs: number): Promise<boolean> {
    const located = await this.surface.locate(this.settings.readyMarker, timeoutMs);
    if (!located.success) {
      console.log(`[waitForPageReady] ${located.error}`);
    }
    return located.success;
  }
}
