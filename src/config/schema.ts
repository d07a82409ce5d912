// ============================================================================
// CONFIG SCHEMA — zod schema with defaults for every field
// ============================================================================

import { z } from "zod";
import {
  DEFAULT_PIPELINE,
  RECORD_STEP_KINDS,
  SETUP_STEP_KINDS,
  validatePipeline,
  type PipelineConfig,
} from "../query-task";

const ms = () => z.number().int().min(0);

const ViewportSchema = z.object({
  width: z.number().int().positive().default(1280),
  height: z.number().int().positive().default(720),
});

export const BrowserConfigSchema = z.object({
  type: z.enum(["chromium", "firefox", "webkit"]).default("chromium"),
  headless: z.boolean().default(false),
  defaultTimeoutMs: ms().default(30_000),
  navigationTimeoutMs: ms().default(60_000),
  viewport: ViewportSchema.default({}),
  executablePath: z.string().min(1).optional(),
  userAgent: z.string().min(1).optional(),
  openDevtools: z.boolean().default(false),
  slowMoMs: ms().default(0),
});

const SelectorsSchema = z.object({
  idInput: z.string().default("#pCardNum"),
  captchaImage: z.string().default("#captchaImg"),
  captchaInput: z.string().default("#yzm"),
  submitButton: z.string().default("button:has-text('查询')"),
  resultTable: z.string().default("table[class*='result']"),
  caseCount: z.string().default("span:has-text('案件')"),
  errorIndicators: z
    .array(z.string())
    .default([
      "div[class*='error']",
      "div[class*='alert']",
      "span[class*='error']",
      "div:has-text('验证码错误')",
      "div:has-text('查询失败')",
    ]),
});

const NavigationTimingSchema = z.object({
  maxRetries: z.number().int().min(1).default(5),
  retryDelayMs: ms().default(3000),
  settleDelayMs: ms().default(2000),
  statusWaitMs: ms().default(5000),
  statusPollIntervalMs: z.number().int().positive().default(100),
  renderDelayMs: ms().default(1000),
});

const CaptchaTimingSchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(100),
    minLength: z.number().int().min(1).default(4),
    refreshDelayMinMs: ms().default(2000),
    refreshDelayMaxMs: ms().default(5000),
    statusWaitMs: ms().default(3000),
    initialStatusWaitMs: ms().default(2000),
    statusPollIntervalMs: z.number().int().positive().default(100),
  })
  .refine(c => c.refreshDelayMinMs <= c.refreshDelayMaxMs, {
    message: "refreshDelayMinMs must not exceed refreshDelayMaxMs",
    path: ["refreshDelayMinMs"],
  });

const FormTimingSchema = z.object({
  submitDelayMs: ms().default(500),
  settleDelayMs: ms().default(2000),
  elementTimeoutMs: ms().default(10_000),
  resultTimeoutMs: ms().default(10_000),
});

const TaskTimingSchema = z.object({
  interRecordDelayMs: ms().default(3000),
  delaySliceMs: z.number().int().positive().default(500),
});

export const QueryConfigSchema = z.object({
  url: z.string().url().default("https://zxgk.court.gov.cn/zhzxgk/"),
  /** Path suffix of the captcha image endpoint */
  captchaPath: z.string().min(1).default("captcha.do"),
  domMarkers: z.array(z.string().min(1)).min(1).default(["captchaImg", "pCardNum"]),
  readyMarker: z.string().default("#pCardNum"),
  readyTimeoutMs: ms().default(30_000),
  selectors: SelectorsSchema.default({}),
  navigation: NavigationTimingSchema.default({}),
  captcha: CaptchaTimingSchema.default({}),
  form: FormTimingSchema.default({}),
  task: TaskTimingSchema.default({}),
});

export const RecordsConfigSchema = z.object({
  idColumn: z.string().min(1).default("身份证号码"),
  nameColumn: z.string().min(1).default("姓名"),
  outputDir: z.string().min(1).default("output"),
});

export const OcrConfigSchema = z.object({
  endpoint: z.string().url().default("http://127.0.0.1:9898/ocr"),
  timeoutMs: z.number().int().positive().default(10_000),
});

const RetryPolicySchema = z.object({
  maxRetries: z.number().int().min(1).default(1),
  retryDelayMs: ms().default(0),
  backoff: z.number().min(1).default(1),
});

const SetupStepSchema = z.object({
  kind: z.enum(SETUP_STEP_KINDS),
  retry: RetryPolicySchema.default({}),
});

const RecordStepSchema = z.object({
  kind: z.enum(RECORD_STEP_KINDS),
  retry: RetryPolicySchema.default({}),
});

function defaultPipeline(): PipelineConfig {
  return {
    setup: DEFAULT_PIPELINE.setup.map(step => ({ ...step, retry: { ...step.retry } })),
    record: DEFAULT_PIPELINE.record.map(step => ({ ...step, retry: { ...step.retry } })),
  };
}

export const PipelineConfigSchema = z
  .object({
    setup: z.array(SetupStepSchema),
    record: z.array(RecordStepSchema),
  })
  .superRefine((pipeline, ctx) => {
    for (const problem of validatePipeline(pipeline)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });

export const AppConfigSchema = z.object({
  browser: BrowserConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
  records: RecordsConfigSchema.default({}),
  ocr: OcrConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default(defaultPipeline),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;
