// ============================================================================
// QUERY TASK TYPES — records, results, attempt logs, collaborator contracts
// ============================================================================

/** Row detail strings written to the result sheet. */
export const DETAIL = {
  stopped: "task stopped",
  captchaFailed: "captcha recognition failed",
  submitFailed: "form submission failed",
  sessionLost: "browser session lost",
  casesFound: "query succeeded, execution records found",
  noCases: "query succeeded, no execution records",
} as const;

export function queryErrorDetail(message: string): string {
  return `query error: ${message}`;
}

// ----------------------------------------------------------------------------
// Records & results
// ----------------------------------------------------------------------------

export interface QueryRecord {
  idNumber: string;
  displayName: string;
  /** Spreadsheet row the record came from; diagnostics only */
  rowOrigin: number;
}

export type QueryStatus = "success" | "failure";

export interface QueryResult {
  name: string;
  idNumber: string;
  queriedAt: Date;
  status: QueryStatus;
  caseCount: number;
  detail: string;
}

export interface TaskState {
  currentIndex: number;
  totalCount: number;
  cancelRequested: boolean;
}

// ----------------------------------------------------------------------------
// Navigation
// ----------------------------------------------------------------------------

export type NavigationOutcome =
  | "success"
  | "gatewayError"
  | "otherStatus"
  | "domMarkerMissing"
  | "transportFailure";

export interface NavigationAttempt {
  attemptIndex: number;
  outcome: NavigationOutcome;
  /** Main-document status observed for this attempt (null = none seen in time) */
  statusCode: number | null;
}

export interface NavigationResult {
  status: "success" | "failed";
  attempts: NavigationAttempt[];
}

// ----------------------------------------------------------------------------
// Captcha
// ----------------------------------------------------------------------------

export type CaptchaOutcome = "loadFailed" | "recognitionEmpty" | "recognitionTooShort" | "accepted";

export interface CaptchaAttempt {
  attemptIndex: number;
  imageBytes?: Buffer;
  recognizedText?: string;
  outcome: CaptchaOutcome;
}

export interface CaptchaSolveResult {
  /** Accepted text, or null after exhaustion or a stop */
  text: string | null;
  attempts: CaptchaAttempt[];
}

/** Image → text oracle. No retry contract of its own. */
export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
}

// ----------------------------------------------------------------------------
// Form
// ----------------------------------------------------------------------------

export interface ExtractionResult {
  success: boolean;
  error: string | null;
  caseCount: number;
  detail: string;
}

// ----------------------------------------------------------------------------
// Pipeline stage contracts (implemented by the controllers, faked in tests)
// ----------------------------------------------------------------------------

export interface Navigator {
  /** Subscribe to response events. Safe to call more than once. */
  attach(): void;
  navigateReliably(url: string): Promise<NavigationResult>;
  waitForPageReady(timeoutMs: number): Promise<boolean>;
}

export interface CaptchaSource {
  attach(): void;
  solve(): Promise<CaptchaSolveResult>;
}

export interface FormDriver {
  fillAndSubmit(idNumber: string, captchaText: string): Promise<boolean>;
  extractResult(timeoutMs?: number): Promise<ExtractionResult>;
}

// ----------------------------------------------------------------------------
// External collaborators
// ----------------------------------------------------------------------------

export interface RecordSource {
  /** Human-readable origin for log lines (e.g. a file path) */
  readonly description: string;
  /** Throws `RecordSourceError` when the input cannot be used at all. */
  load(): Promise<QueryRecord[]>;
}

export interface ResultSink {
  /** Persist all rows at once. Resolves to the location written. */
  write(results: QueryResult[]): Promise<string>;
}

/** Fire-and-forget channel to whatever displays progress. */
export interface TaskReporter {
  log(line: string): void;
  progress(current: number, total: number): void;
}

/** Input is unusable (missing file, missing columns, unreadable sheet). */
export class RecordSourceError extends Error {
  constructor(message: string, readonly source: string) {
    super(message);
    this.name = "RecordSourceError";
  }
}
