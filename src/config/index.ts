export {
  AppConfigSchema,
  BrowserConfigSchema,
  QueryConfigSchema,
  RecordsConfigSchema,
  OcrConfigSchema,
  PipelineConfigSchema,
} from "./schema";
export type { AppConfig, BrowserConfig, QueryConfig } from "./schema";
export { ConfigError, loadConfig, parseConfig, parseConfigText } from "./loader";
