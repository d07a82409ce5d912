// ============================================================================
// QUERY TASK ORCHESTRATOR — per-record pipeline with cooperative stop
// ============================================================================

import { CancellationToken, createTiming, type AutomationSurface, type Timing } from "../browser-session";
import { consoleReporter, safeReporter } from "./reporter";
import { runRecordStep, runSetupStep, type PipelineConfig, type RecordStepState, type StepContext } from "./steps";
import { aggregateResults, generateSummary, maskIdNumber, type QuerySummary } from "./summary";
import {
  DETAIL,
  queryErrorDetail,
  type CaptchaSource,
  type FormDriver,
  type Navigator,
  type QueryRecord,
  type QueryResult,
  type RecordSource,
  type ResultSink,
  type TaskReporter,
  type TaskState,
} from "./types";

export interface QueryTaskSettings {
  targetUrl: string;
  readyTimeoutMs: number;
  /** Passed to `extractResult`; the form driver's default when absent */
  resultTimeoutMs?: number;
  interRecordDelayMs: number;
  /** Longest uninterrupted piece of the inter-record delay */
  delaySliceMs: number;
  pipeline: PipelineConfig;
}

export interface QueryTaskDeps {
  session: AutomationSurface;
  navigator: Navigator;
  captcha: CaptchaSource;
  form: FormDriver;
  records: RecordSource;
  sink: ResultSink;
  reporter?: TaskReporter;
  timing?: Timing;
  token?: CancellationToken;
}

export type TaskStatus = "success" | "failed" | "cancelled";

export interface TaskRunResult {
  status: TaskStatus;
  message: string;
  results: QueryResult[];
  summary: QuerySummary;
  /** Where the sink wrote the rows; null when nothing was written */
  outputPath: string | null;
}

type StopReason = "stopped" | "sessionLost";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the query pipeline over every record, one at a time.
 *
 * Every record that starts gets exactly one result row. A stop request is
 * honoured before each record, before each pipeline step and between the
 * slices of the inter-record delay. Rows collected so far always reach the
 * result sink, unless the input itself was unusable.
 */
export class QueryTaskOrchestrator {
  private readonly reporter: TaskReporter;
  private readonly timing: Timing;
  private readonly token: CancellationToken;
  private readonly state: TaskState = { currentIndex: 0, totalCount: 0, cancelRequested: false };

  constructor(
    private readonly deps: QueryTaskDeps,
    private readonly settings: QueryTaskSettings
  ) {
    this.reporter = safeReporter(deps.reporter ?? consoleReporter);
    this.token = deps.token ?? new CancellationToken();
    this.timing = deps.timing ?? createTiming(this.token);
  }

  /** Idempotent and safe to call at any time, including before `run()`. */
  requestStop(): void {
    if (!this.state.cancelRequested) {
      this.reporter.log("Stop requested");
    }
    this.state.cancelRequested = true;
    this.token.cancel();
    this.deps.session.requestStop();
  }

  getState(): TaskState {
    return { ...this.state };
  }

  async run(): Promise<TaskRunResult> {
    const records = await this.loadRecords();
    if (!records.ok) {
      this.reporter.log(records.message);
      return this.finish("failed", records.message, [], null);
    }

    const total = records.value.length;
    this.state.totalCount = total;
    this.reporter.log(`Loaded ${total} record(s) from ${this.deps.records.description}`);

    const ctx = this.stepContext();
    const results: QueryResult[] = [];

    this.deps.navigator.attach();
    this.deps.captcha.attach();

    const setupError = await this.runSetup(ctx);
    if (setupError === null) {
      for (let index = 0; index < total; index++) {
        if (this.stopReason() !== null) break;

        const record = records.value[index];
        this.state.currentIndex = index + 1;
        this.reporter.log(`(${index + 1}/${total}) Querying ${record.displayName} ${maskIdNumber(record.idNumber)}`);

        const row = await this.processRecord(record, ctx);
        results.push(row);
        this.reporter.log(`(${index + 1}/${total}) ${row.status}: ${row.detail}`);
        this.reporter.progress(index + 1, total);

        if (index < total - 1) await this.interRecordDelay();
      }
    }

    const reason = this.stopReason();
    const status: TaskStatus =
      reason === "stopped" ? "cancelled" : reason === "sessionLost" || setupError !== null ? "failed" : "success";

    const { outputPath, exportError } = await this.exportResults(results);
    return this.finish(status, this.buildMessage(status, results, setupError, exportError), results, outputPath);
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  private async loadRecords(): Promise<{ ok: true; value: QueryRecord[] } | { ok: false; message: string }> {
    try {
      const records = await this.deps.records.load();
      if (records.length === 0) {
        return { ok: false, message: `No records to query in ${this.deps.records.description}` };
      }
      return { ok: true, value: records };
    } catch (error) {
      return { ok: false, message: `Could not read records: ${describeError(error)}` };
    }
  }

  /** Returns the failure message, or null when every setup step passed. */
  private async runSetup(ctx: StepContext): Promise<string | null> {
    for (const step of this.settings.pipeline.setup) {
      const reason = this.stopReason();
      if (reason !== null) return reason === "stopped" ? DETAIL.stopped : DETAIL.sessionLost;

      this.reporter.log(`Setup: ${step.kind}`);
      try {
        const outcome = await runSetupStep(step, ctx);
        if (!outcome.ok) {
          this.reporter.log(`Setup step ${step.kind} failed: ${outcome.detail}`);
          return outcome.detail;
        }
      } catch (error) {
        this.reporter.log(`Setup step ${step.kind} threw: ${describeError(error)}`);
        return describeError(error);
      }
    }
    return null;
  }

  private async processRecord(record: QueryRecord, ctx: StepContext): Promise<QueryResult> {
    const row: QueryResult = {
      name: record.displayName,
      idNumber: record.idNumber,
      queriedAt: this.timing.now(),
      status: "failure",
      caseCount: 0,
      detail: "",
    };
    const state: RecordStepState = { record, captchaText: null, extraction: null };

    try {
      for (const step of this.settings.pipeline.record) {
        const before = this.stopReason();
        if (before !== null) {
          row.detail = this.stopDetail(before);
          return row;
        }

        const outcome = await runRecordStep(step, ctx, state);
        if (!outcome.ok) {
          // A failure caused by a stop or a lost session is reported as such.
          const after = this.stopReason();
          row.detail = after !== null ? this.stopDetail(after) : outcome.detail;
          return row;
        }
      }
    } catch (error) {
      this.reporter.log(`Record at row ${record.rowOrigin} failed: ${describeError(error)}`);
      row.detail = queryErrorDetail(describeError(error));
      return row;
    }

    const extraction = state.extraction;
    if (extraction === null) {
      row.detail = queryErrorDetail("no result was extracted");
      return row;
    }
    row.status = "success";
    row.caseCount = extraction.caseCount;
    row.detail = extraction.detail;
    return row;
  }

  private async interRecordDelay(): Promise<void> {
    const { interRecordDelayMs, delaySliceMs } = this.settings;
    let remaining = interRecordDelayMs;
    while (remaining > 0) {
      if (this.stopReason() !== null) return;
      const slice = Math.min(delaySliceMs, remaining);
      await this.timing.sleep(slice);
      remaining -= slice;
    }
  }

  private async exportResults(results: QueryResult[]): Promise<{ outputPath: string | null; exportError: string | null }> {
    try {
      const outputPath = await this.deps.sink.write(results);
      this.reporter.log(`Exported ${results.length} row(s) to ${outputPath}`);
      return { outputPath, exportError: null };
    } catch (error) {
      this.reporter.log(`Export failed: ${describeError(error)}`);
      return { outputPath: null, exportError: describeError(error) };
    }
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private stepContext(): StepContext {
    return {
      navigator: this.deps.navigator,
      captcha: this.deps.captcha,
      form: this.deps.form,
      targetUrl: this.settings.targetUrl,
      readyTimeoutMs: this.settings.readyTimeoutMs,
      resultTimeoutMs: this.settings.resultTimeoutMs,
      token: this.token,
      timing: this.timing,
    };
  }

  private stopReason(): StopReason | null {
    if (this.state.cancelRequested || this.token.isCancelled) return "stopped";
    if (!this.deps.session.alive) return "sessionLost";
    if (!this.deps.session.shouldContinue()) return "stopped";
    return null;
  }

  private stopDetail(reason: StopReason): string {
    return reason === "stopped" ? DETAIL.stopped : DETAIL.sessionLost;
  }

  private buildMessage(
    status: TaskStatus,
    results: QueryResult[],
    setupError: string | null,
    exportError: string | null
  ): string {
    const summary = generateSummary(results);
    let message: string;
    if (status === "cancelled") {
      message = `Task stopped: ${results.length}/${this.state.totalCount} record(s) processed (${summary})`;
    } else if (setupError !== null) {
      message = `Task failed during setup: ${setupError}`;
    } else if (status === "failed") {
      message = `Task failed: ${DETAIL.sessionLost} after ${results.length}/${this.state.totalCount} record(s) (${summary})`;
    } else {
      message = `Query complete: ${summary}`;
    }
    return exportError === null ? message : `${message}; export failed: ${exportError}`;
  }

  private finish(
    status: TaskStatus,
    message: string,
    results: QueryResult[],
    outputPath: string | null
  ): TaskRunResult {
    this.reporter.log(message);
    return { status, message, results, summary: aggregateResults(results), outputPath };
  }
}
