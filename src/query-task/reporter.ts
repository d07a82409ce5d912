// ============================================================================
// REPORTER — progress and log channel of a query task
// ============================================================================

import type { TaskReporter } from "./types";

/** Default reporter: tagged console lines. */
export const consoleReporter: TaskReporter = {
  log: line => console.log(`[QueryTask] ${line}`),
  progress: (current, total) => console.log(`[QueryTask] Progress ${current}/${total}`),
};

/** Reporter failures never reach the task. */
export function safeReporter(reporter: TaskReporter): TaskReporter {
  const guard = (action: () => void) => {
    try {
      action();
    } catch (error) {
      console.log(`[QueryTask] Reporter failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };
  return {
    log: line => guard(() => reporter.log(line)),
    progress: (current, total) => guard(() => reporter.progress(current, total)),
  };
}
