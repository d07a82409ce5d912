// ============================================================================
// STEP REGISTRY — closed set of pipeline step kinds mapped to handlers
// ============================================================================

import type { CancellationToken, Timing } from "../browser-session";
import { retryAsync } from "./retry-manager";
import {
  DETAIL,
  type CaptchaSource,
  type ExtractionResult,
  type FormDriver,
  type Navigator,
  type QueryRecord,
} from "./types";

export const SETUP_STEP_KINDS = ["navigate", "waitForReady"] as const;
export const RECORD_STEP_KINDS = ["solveCaptcha", "fillAndSubmit", "extractResult"] as const;

export type SetupStepKind = (typeof SETUP_STEP_KINDS)[number];
export type RecordStepKind = (typeof RECORD_STEP_KINDS)[number];

export interface StepRetryPolicy {
  /** Total attempts (1 = no retry) */
  maxRetries: number;
  retryDelayMs: number;
  backoff: number;
}

export interface StepConfig<K extends string> {
  kind: K;
  retry: StepRetryPolicy;
}

export interface PipelineConfig {
  /** Run once before the first record */
  setup: StepConfig<SetupStepKind>[];
  /** Run for every record, in order */
  record: StepConfig<RecordStepKind>[];
}

export interface StepContext {
  navigator: Navigator;
  captcha: CaptchaSource;
  form: FormDriver;
  targetUrl: string;
  readyTimeoutMs: number;
  resultTimeoutMs?: number;
  token: CancellationToken;
  timing: Timing;
}

/** Carried from one record step to the next. */
export interface RecordStepState {
  record: QueryRecord;
  captchaText: string | null;
  extraction: ExtractionResult | null;
}

export type StepOutcome = { ok: true } | { ok: false; detail: string };

type SetupHandler = (ctx: StepContext) => Promise<StepOutcome>;
type RecordHandler = (ctx: StepContext, state: RecordStepState) => Promise<StepOutcome>;

const SETUP_HANDLERS: Record<SetupStepKind, SetupHandler> = {
  navigate: async ctx => {
    const result = await ctx.navigator.navigateReliably(ctx.targetUrl);
    return result.status === "success"
      ? { ok: true }
      : { ok: false, detail: `could not load ${ctx.targetUrl} after ${result.attempts.length} attempt(s)` };
  },
  waitForReady: async ctx => {
    const ready = await ctx.navigator.waitForPageReady(ctx.readyTimeoutMs);
    return ready ? { ok: true } : { ok: false, detail: "query page did not become ready" };
  },
};

const RECORD_HANDLERS: Record<RecordStepKind, RecordHandler> = {
  solveCaptcha: async (ctx, state) => {
    const { text } = await ctx.captcha.solve();
    state.captchaText = text;
    return text ? { ok: true } : { ok: false, detail: DETAIL.captchaFailed };
  },
  fillAndSubmit: async (ctx, state) => {
    if (state.captchaText === null) {
      return { ok: false, detail: DETAIL.captchaFailed };
    }
    const submitted = await ctx.form.fillAndSubmit(state.record.idNumber, state.captchaText);
    return submitted ? { ok: true } : { ok: false, detail: DETAIL.submitFailed };
  },
  extractResult: async (ctx, state) => {
    const extraction = await ctx.form.extractResult(ctx.resultTimeoutMs);
    state.extraction = extraction;
    return extraction.success
      ? { ok: true }
      : { ok: false, detail: extraction.error ?? extraction.detail };
  },
};

function withRetry(
  kind: string,
  retry: StepRetryPolicy,
  ctx: StepContext,
  run: () => Promise<StepOutcome>
): Promise<StepOutcome> {
  return retryAsync(run, {
    maxRetries: retry.maxRetries,
    delayMs: retry.retryDelayMs,
    backoff: retry.backoff,
    retryIf: outcome => !outcome.ok,
    token: ctx.token,
    timing: ctx.timing,
    label: `step:${kind}`,
  });
}

export function runSetupStep(step: StepConfig<SetupStepKind>, ctx: StepContext): Promise<StepOutcome> {
  const handler = SETUP_HANDLERS[step.kind];
  return withRetry(step.kind, step.retry, ctx, () => handler(ctx));
}

export function runRecordStep(
  step: StepConfig<RecordStepKind>,
  ctx: StepContext,
  state: RecordStepState
): Promise<StepOutcome> {
  const handler = RECORD_HANDLERS[step.kind];
  return withRetry(step.kind, step.retry, ctx, () => handler(ctx, state));
}

/** Record steps that must run earlier in the same pipeline. */
const PREREQUISITES: Record<RecordStepKind, RecordStepKind[]> = {
  solveCaptcha: [],
  fillAndSubmit: ["solveCaptcha"],
  extractResult: ["fillAndSubmit"],
};

/**
 * Problems with a pipeline's shape, empty when valid. Each kind may appear
 * once per list, prerequisites must come first, and the record pipeline
 * must produce a result.
 */
export function validatePipeline(pipeline: PipelineConfig): string[] {
  const problems: string[] = [];

  const seenSetup = new Set<SetupStepKind>();
  for (const step of pipeline.setup) {
    if (seenSetup.has(step.kind)) problems.push(`setup step "${step.kind}" appears more than once`);
    seenSetup.add(step.kind);
  }

  const seenRecord = new Set<RecordStepKind>();
  for (const step of pipeline.record) {
    if (seenRecord.has(step.kind)) problems.push(`record step "${step.kind}" appears more than once`);
    for (const required of PREREQUISITES[step.kind]) {
      if (!seenRecord.has(required)) {
        problems.push(`record step "${step.kind}" must come after "${required}"`);
      }
    }
    seenRecord.add(step.kind);
  }
  if (!seenRecord.has("extractResult")) {
    problems.push('record pipeline must include "extractResult"');
  }

  return problems;
}

const NO_RETRY: StepRetryPolicy = { maxRetries: 1, retryDelayMs: 0, backoff: 1 };

export const DEFAULT_PIPELINE: PipelineConfig = {
  setup: [
    { kind: "navigate", retry: NO_RETRY },
    { kind: "waitForReady", retry: { maxRetries: 3, retryDelayMs: 2000, backoff: 1 } },
  ],
  record: [
    { kind: "solveCaptcha", retry: NO_RETRY },
    { kind: "fillAndSubmit", retry: NO_RETRY },
    { kind: "extractResult", retry: NO_RETRY },
  ],
};
