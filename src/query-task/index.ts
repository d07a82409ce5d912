// ============================================================================
// QUERY TASK — public exports
// ============================================================================

export { retryAsync } from "./retry-manager";
export type { RetryOptions } from "./retry-manager";
export { StatusSlot, urlsMatch, mainDocumentMatcher, endpointMatcher } from "./status-slot";
export type { StatusMatcher } from "./status-slot";
export { NavigationController } from "./navigation-controller";
export type { NavigationSettings } from "./navigation-controller";
export { CaptchaSolver, normalizeCaptchaText } from "./captcha-solver";
export type { CaptchaSettings } from "./captcha-solver";
export { FormInteractor, parseCaseCount } from "./form-interactor";
export type { FormSelectors, FormSettings } from "./form-interactor";
export {
  SETUP_STEP_KINDS,
  RECORD_STEP_KINDS,
  DEFAULT_PIPELINE,
  runSetupStep,
  runRecordStep,
  validatePipeline,
} from "./steps";
export type {
  SetupStepKind,
  RecordStepKind,
  StepRetryPolicy,
  StepConfig,
  PipelineConfig,
  StepContext,
  RecordStepState,
  StepOutcome,
} from "./steps";
export { QueryTaskOrchestrator } from "./orchestrator";
export type { QueryTaskSettings, QueryTaskDeps, TaskStatus, TaskRunResult } from "./orchestrator";
export { aggregateResults, generateSummary, maskIdNumber } from "./summary";
export type { QuerySummary } from "./summary";
export { consoleReporter, safeReporter } from "./reporter";
export { DETAIL, queryErrorDetail, RecordSourceError } from "./types";
export type {
  QueryRecord,
  QueryStatus,
  QueryResult,
  TaskState,
  NavigationOutcome,
  NavigationAttempt,
  NavigationResult,
  CaptchaOutcome,
  CaptchaAttempt,
  CaptchaSolveResult,
  OcrEngine,
  ExtractionResult,
  Navigator,
  CaptchaSource,
  FormDriver,
  RecordSource,
  ResultSink,
  TaskReporter,
} from "./types";
