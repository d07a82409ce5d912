// ============================================================================
// APP — wires configuration, browser session and I/O into a query task
// ============================================================================

import {
  BrowserSession,
  CancellationToken,
  createTiming,
  type AutomationSurface,
  type BrowserLauncher,
  type BrowserSessionConfig,
  type Timing,
} from "./browser-session";
import type { AppConfig } from "./config";
import { HttpOcrEngine, XlsxRecordSource, XlsxResultSink, type FetchLike } from "./io";
import {
  aggregateResults,
  CaptchaSolver,
  FormInteractor,
  NavigationController,
  QueryTaskOrchestrator,
  type CaptchaSettings,
  type FormSettings,
  type NavigationSettings,
  type OcrEngine,
  type QueryTaskSettings,
  type RecordSource,
  type ResultSink,
  type TaskReporter,
  type TaskRunResult,
} from "./query-task";

// ============================================================================
// SETTINGS — AppConfig sections → component settings
// ============================================================================

export function sessionConfig(config: AppConfig): BrowserSessionConfig {
  const { browser } = config;
  return { ...browser, viewport: { ...browser.viewport } };
}

export function navigationSettings(config: AppConfig): NavigationSettings {
  const { query, browser } = config;
  return {
    ...query.navigation,
    navigationTimeoutMs: browser.navigationTimeoutMs,
    domMarkers: [...query.domMarkers],
    readyMarker: query.readyMarker,
  };
}

export function captchaSettings(config: AppConfig): CaptchaSettings {
  const { query } = config;
  return {
    ...query.captcha,
    imageSelector: query.selectors.captchaImage,
    endpointPath: query.captchaPath,
  };
}

export function formSettings(config: AppConfig): FormSettings {
  const { selectors, form } = config.query;
  return {
    selectors: {
      idInput: selectors.idInput,
      captchaInput: selectors.captchaInput,
      submitButton: selectors.submitButton,
      resultTable: selectors.resultTable,
      caseCount: selectors.caseCount,
      errorIndicators: [...selectors.errorIndicators],
    },
    submitDelayMs: form.submitDelayMs,
    settleDelayMs: form.settleDelayMs,
    elementTimeoutMs: form.elementTimeoutMs,
  };
}

export function taskSettings(config: AppConfig): QueryTaskSettings {
  const { query, pipeline } = config;
  return {
    targetUrl: query.url,
    readyTimeoutMs: query.readyTimeoutMs,
    resultTimeoutMs: query.form.resultTimeoutMs,
    interRecordDelayMs: query.task.interRecordDelayMs,
    delaySliceMs: query.task.delaySliceMs,
    pipeline,
  };
}

// ============================================================================
// TASK ASSEMBLY
// ============================================================================

export interface QueryTaskParts {
  session: AutomationSurface;
  records: RecordSource;
  sink: ResultSink;
  ocr: OcrEngine;
  reporter?: TaskReporter;
  timing?: Timing;
  token?: CancellationToken;
}

export interface QueryTask {
  orchestrator: QueryTaskOrchestrator;
  navigator: NavigationController;
  captcha: CaptchaSolver;
  form: FormInteractor;
  /** Detach the response listeners the components registered. */
  dispose(): void;
}

/** Build every pipeline component over one surface, sharing one token and one clock. */
export function createQueryTask(config: AppConfig, parts: QueryTaskParts): QueryTask {
  const token = parts.token ?? new CancellationToken();
  const timing = parts.timing ?? createTiming(token);

  const navigator = new NavigationController(parts.session, navigationSettings(config), timing);
  const captcha = new CaptchaSolver(parts.session, parts.ocr, captchaSettings(config), timing);
  const form = new FormInteractor(parts.session, formSettings(config), timing);

  const orchestrator = new QueryTaskOrchestrator(
    {
      session: parts.session,
      navigator,
      captcha,
      form,
      records: parts.records,
      sink: parts.sink,
      reporter: parts.reporter,
      timing,
      token,
    },
    taskSettings(config)
  );

  return {
    orchestrator,
    navigator,
    captcha,
    form,
    dispose() {
      navigator.dispose();
      captcha.dispose();
    },
  };
}

// ============================================================================
// RUN — one full batch against a real browser
// ============================================================================

export interface RunOptions {
  /** Workbook with the records to query */
  inputPath: string;
  /** Result workbook; a timestamped file in `records.outputDir` when absent */
  outputPath?: string;
}

export interface RunDeps {
  /** Cancelling it stops the task and closes the browser */
  token: CancellationToken;
  launcher?: BrowserLauncher;
  fetchImpl?: FetchLike;
  reporter?: TaskReporter;
  timing?: Timing;
  /** Swaps the workbook reader, e.g. for a different input format */
  records?: RecordSource;
  sink?: ResultSink;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Open a browser, run every record through the pipeline and export the rows.
 * The session is closed on every path out.
 */
export async function runQueries(config: AppConfig, options: RunOptions, deps: RunDeps): Promise<TaskRunResult> {
  const { token } = deps;
  const session = new BrowserSession(sessionConfig(config), { launcher: deps.launcher, token });

  const opened = await session.open();
  if (!opened.success) {
    const message = `Could not start browser (${opened.error.stage}): ${opened.error.message}`;
    console.log(`[runQueries] ${message}`);
    return { status: "failed", message, results: [], summary: aggregateResults([]), outputPath: null };
  }

  const ocr = new HttpOcrEngine(config.ocr, deps.fetchImpl);
  const task = createQueryTask(config, {
    session,
    ocr,
    records: deps.records ?? new XlsxRecordSource(options.inputPath, config.records),
    sink: deps.sink ?? new XlsxResultSink({ outputPath: options.outputPath, outputDir: config.records.outputDir }),
    reporter: deps.reporter,
    timing: deps.timing,
    token,
  });
  const removeStopListener = token.onCancel(() => task.orchestrator.requestStop());

  try {
    return await task.orchestrator.run();
  } finally {
    removeStopListener();
    task.dispose();
    await session.close().catch(error => {
      console.log(`[runQueries] Closing the browser failed: ${describeError(error)}`);
    });
  }
}
