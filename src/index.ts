/**
 * captcha-query-runner - batch form queries behind an image captcha
 *
 * - **browser-session**: Playwright session with liveness tracking, response events and cooperative stop
 * - **query-task**: navigation with status checks, captcha solving, verified form entry and the per-record pipeline
 * - **io**: spreadsheet records in, spreadsheet results out, HTTP OCR engine
 * - **config**: YAML configuration validated with zod
 */

export * from "./browser-session";
export * from "./query-task";
export * from "./io";
export * from "./config";
export {
  createQueryTask,
  runQueries,
  sessionConfig,
  navigationSettings,
  captchaSettings,
  formSettings,
  taskSettings,
} from "./app";
export type { QueryTask, QueryTaskParts, RunOptions, RunDeps } from "./app";
