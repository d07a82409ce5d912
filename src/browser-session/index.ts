// ============================================================================
// BROWSER SESSION — public exports
// ============================================================================

export { BrowserSession, withTimeout, stripQuery } from "./browser-session";
export type { BrowserSessionDeps } from "./browser-session";
export { CancellationToken } from "./cancellation";
export { buildChromiumArgs, launchPlaywright } from "./launcher";
export { createTiming, pollUntil, randomDelay, SLEEP_SLICE_MS } from "./timing";
export type { Timing, PollOptions } from "./timing";
export { CLOSE_TIMEOUT_MS, LaunchError } from "./types";
export type {
  ActionResult,
  AutomationSurface,
  BrowserHandle,
  BrowserLauncher,
  BrowserSessionConfig,
  BrowserType,
  ContextHandle,
  ElementRef,
  FailureReason,
  LoadState,
  LocatorHandle,
  NavigateOptions,
  OpenResult,
  PageHandle,
  ResponseEvent,
  ResponseHandle,
  ResponseListener,
} from "./types";
