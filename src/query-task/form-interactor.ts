// ============================================================================
// FORM INTERACTOR — write-then-verify fill, submit, result classification
// ============================================================================

import { createTiming, type AutomationSurface, type Timing } from "../browser-session";
import { DETAIL, type ExtractionResult, type FormDriver } from "./types";

export interface FormSelectors {
  idInput: string;
  captchaInput: string;
  submitButton: string;
  resultTable: string;
  caseCount: string;
  /** Checked in order; the first with non-empty text wins */
  errorIndicators: string[];
}

export interface FormSettings {
  selectors: FormSelectors;
  /** Pause between the last verified field and the submit click */
  submitDelayMs: number;
  /** Pause after submit before reading the result page */
  settleDelayMs: number;
  elementTimeoutMs: number;
}

/** First run of digits in `text`, or 0. */
export function parseCaseCount(text: string | null): number {
  const match = text?.match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : 0;
}

export class FormInteractor implements FormDriver {
  constructor(
    private readonly surface: AutomationSurface,
    private readonly settings: FormSettings,
    private readonly timing: Timing = createTiming()
  ) {}

  /**
   * Fill both fields, verifying each by reading it back, then submit.
   * Returns false at the first failed step; submit is only clicked when
   * every field verified.
   */
  async fillAndSubmit(idNumber: string, captchaText: string): Promise<boolean> {
    const { selectors, submitDelayMs, elementTimeoutMs } = this.settings;

    const fields = [
      { label: "ID number", selector: selectors.idInput, value: idNumber },
      { label: "captcha", selector: selectors.captchaInput, value: captchaText },
    ];
    for (const field of fields) {
      if (!(await this.writeVerified(field.label, field.selector, field.value))) {
        return false;
      }
    }

    await this.timing.sleep(submitDelayMs);

    const button = await this.surface.locate(selectors.submitButton, elementTimeoutMs);
    if (!button.success) {
      console.log(`[fillAndSubmit] Submit button unavailable: ${button.error}`);
      return false;
    }
    const clicked = await this.surface.click(selectors.submitButton);
    if (!clicked.success) {
      console.log(`[fillAndSubmit] Submit click failed: ${clicked.error}`);
      return false;
    }
    return true;
  }

  private async writeVerified(label: string, selector: string, value: string): Promise<boolean> {
    const located = await this.surface.locate(selector, this.settings.elementTimeoutMs);
    if (!located.success) {
      console.log(`[fillAndSubmit] ${label} field unavailable: ${located.error}`);
      return false;
    }

    const cleared = await this.surface.fill(selector, "");
    const filled = cleared.success ? await this.surface.fill(selector, value) : cleared;
    if (!filled.success) {
      console.log(`[fillAndSubmit] Could not fill ${label}: ${filled.error}`);
      return false;
    }

    const readBack = await this.surface.inputValue(selector);
    if (!readBack.success) {
      console.log(`[fillAndSubmit] Could not read back ${label}: ${readBack.error}`);
      return false;
    }
    if (readBack.value !== value) {
      console.log(`[fillAndSubmit] ${label} did not take the input (read back ${readBack.value.length} chars, expected ${value.length})`);
      return false;
    }
    return true;
  }

  /**
   * Classify the page after submit: an error indicator with text is a failed
   * query; otherwise a results table means cases were found, and no table is a
   * successful query with zero cases.
   */
  async extractResult(timeoutMs: number = this.settings.elementTimeoutMs): Promise<ExtractionResult> {
    const { selectors, settleDelayMs } = this.settings;
    await this.timing.sleep(settleDelayMs);

    const errorText = await this.findErrorText(timeoutMs);
    if (errorText) {
      console.log(`[extractResult] Page reported an error: ${errorText}`);
      return { success: false, error: errorText, caseCount: 0, detail: errorText };
    }

    const tables = await this.surface.count(selectors.resultTable);
    if (!tables.success) {
      return { success: false, error: tables.error, caseCount: 0, detail: tables.error };
    }
    if (tables.value === 0) {
      return { success: true, error: null, caseCount: 0, detail: DETAIL.noCases };
    }

    const caseText = await this.surface.textContent(selectors.caseCount, timeoutMs);
    const caseCount = parseCaseCount(caseText.success ? caseText.value : null);
    console.log(`[extractResult] Results table found, ${caseCount} case(s)`);
    return { success: true, error: null, caseCount, detail: DETAIL.casesFound };
  }

  private async findErrorText(timeoutMs: number): Promise<string | null> {
    for (const selector of this.settings.selectors.errorIndicators) {
      const matches = await this.surface.count(selector);
      if (!matches.success || matches.value === 0) continue;

      const text = await this.surface.textContent(selector, timeoutMs);
      const trimmed = text.success ? text.value?.trim() : undefined;
      if (trimmed) return trimmed;
    }
    return null;
  }
}
