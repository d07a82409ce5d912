// ============================================================================
// CAPTCHA SOLVER — load-verified screenshot → OCR → validate, bounded attempts
// ============================================================================

import { createTiming, randomDelay, type AutomationSurface, type Timing } from "../browser-session";
import { endpointMatcher, StatusSlot } from "./status-slot";
import type { CaptchaAttempt, CaptchaSolveResult, CaptchaSource, OcrEngine } from "./types";

export interface CaptchaSettings {
  /** Captcha `<img>`; clicking it loads a new image */
  imageSelector: string;
  /** Path suffix of the image endpoint, e.g. `captcha.do` */
  endpointPath: string;
  /** Soft upper bound against endless loops */
  maxAttempts: number;
  minLength: number;
  refreshDelayMinMs: number;
  refreshDelayMaxMs: number;
  /** Bound on waiting for a 200 after a refresh */
  statusWaitMs: number;
  /** Bound on waiting for the first captcha status when none was seen yet */
  initialStatusWaitMs: number;
  statusPollIntervalMs: number;
}

/** Keep letters and digits of any script. */
export function normalizeCaptchaText(raw: string): string {
  return raw.replace(/[^\p{L}\p{N}]/gu, "");
}

export class CaptchaSolver implements CaptchaSource {
  private readonly captchaStatus: StatusSlot;
  private detach: (() => void) | null = null;
  private refreshCount = 0;

  constructor(
    private readonly surface: AutomationSurface,
    private readonly ocr: OcrEngine,
    private readonly settings: CaptchaSettings,
    private readonly timing: Timing = createTiming()
  ) {
    this.captchaStatus = new StatusSlot("captcha", endpointMatcher(settings.endpointPath));
  }

  attach(): void {
    if (this.detach) return;
    this.detach = this.captchaStatus.attach(this.surface);
  }

  dispose(): void {
    this.detach?.();
    this.detach = null;
  }

  get statusSlot(): StatusSlot {
    return this.captchaStatus;
  }

  /** Refresh cycles performed over the solver's lifetime. */
  get refreshes(): number {
    return this.refreshCount;
  }

  async solve(): Promise<CaptchaSolveResult> {
    this.attach();

    const { maxAttempts } = this.settings;
    const attempts: CaptchaAttempt[] = [];
    let refreshFirst = false;

    for (let attemptIndex = 1; attemptIndex <= maxAttempts; attemptIndex++) {
      if (!this.surface.shouldContinue()) {
        console.log("[solveCaptcha] Stop requested");
        break;
      }

      const attempt = await this.runAttempt(attemptIndex, refreshFirst);
      attempts.push(attempt);

      if (attempt.outcome === "accepted" && attempt.recognizedText) {
        console.log(`[solveCaptcha] Accepted "${attempt.recognizedText}" on attempt ${attemptIndex}`);
        return { text: attempt.recognizedText, attempts };
      }

      console.log(`[solveCaptcha] Attempt ${attemptIndex}/${maxAttempts}: ${attempt.outcome}${attempt.recognizedText ? ` ("${attempt.recognizedText}")` : ""}`);
      refreshFirst = true;
    }

    console.log(`[solveCaptcha] No usable captcha after ${attempts.length} attempt(s)`);
    return { text: null, attempts };
  }

  /** Manual-entry fallback. Not implemented: always yields no text. */
  async manualEntry(): Promise<string | null> {
    return null;
  }

  private async runAttempt(attemptIndex: number, refreshFirst: boolean): Promise<CaptchaAttempt> {
    const { imageSelector, minLength, initialStatusWaitMs, statusPollIntervalMs } = this.settings;

    if (!refreshFirst && this.captchaStatus.current === null) {
      await this.captchaStatus.waitFor(
        status => status !== null,
        { timeoutMs: initialStatusWaitMs, intervalMs: statusPollIntervalMs },
        this.timing
      );
    }

    if (refreshFirst || this.captchaStatus.current !== 200) {
      await this.refresh();
    }

    const shot = await this.surface.screenshot(imageSelector);
    if (!shot.success) {
      console.log(`[solveCaptcha] ${shot.error}`);
      return { attemptIndex, outcome: "loadFailed" };
    }

    const recognizedText = normalizeCaptchaText(await this.recognize(shot.value));
    const base = { attemptIndex, imageBytes: shot.value, recognizedText };

    if (recognizedText.length === 0) return { ...base, outcome: "recognitionEmpty" };
    if (recognizedText.length < minLength) return { ...base, outcome: "recognitionTooShort" };
    return { ...base, outcome: "accepted" };
  }

  /**
   * Click the image to load a new captcha and wait for the endpoint to answer
   * 200. An unconfirmed refresh is still screenshotted by the caller.
   */
  private async refresh(): Promise<void> {
    const { imageSelector, refreshDelayMinMs, refreshDelayMaxMs, statusWaitMs, statusPollIntervalMs } = this.settings;
    this.refreshCount++;

    const clicked = await this.captchaStatus.expectFresh(() => this.surface.click(imageSelector));
    if (!clicked.success) {
      console.log(`[solveCaptcha] Refresh click failed: ${clicked.error}`);
    }

    await this.timing.sleep(randomDelay(refreshDelayMinMs, refreshDelayMaxMs, this.timing));

    const confirmed = await this.captchaStatus.waitFor(
      status => status === 200,
      { timeoutMs: statusWaitMs, intervalMs: statusPollIntervalMs },
      this.timing
    );
    if (!confirmed) {
      console.log(`[solveCaptcha] Refresh not confirmed (status ${this.captchaStatus.current ?? "unknown"}), trying anyway`);
    }
  }

  private async recognize(image: Buffer): Promise<string> {
    try {
      return await this.ocr.recognize(image);
    } catch (error) {
      console.log(`[solveCaptcha] OCR failed: ${error instanceof Error ? error.message : String(error)}`);
      return "";
    }
  }
}
