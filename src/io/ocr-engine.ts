// ============================================================================
// HTTP OCR ENGINE — captcha image in, recognized text out
// ============================================================================

import { z } from "zod";
import type { OcrEngine } from "../query-task";

const OcrReplySchema = z.object({
  result: z.string(),
});

export interface OcrSettings {
  endpoint: string;
  timeoutMs: number;
}

/** The slice of `fetch` the engine uses. */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

/** OCR transport or reply-format failure. */
export class OcrError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "OcrError";
  }
}

/**
 * POSTs `{ "image": <base64> }` to an OCR service and reads `{ "result": string }`.
 */
export class HttpOcrEngine implements OcrEngine {
  constructor(
    private readonly settings: OcrSettings,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async recognize(image: Buffer): Promise<string> {
    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(this.settings.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ image: image.toString("base64") }),
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (error) {
      throw new OcrError(`OCR request failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!response.ok) {
      throw new OcrError(`OCR service answered ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new OcrError(`OCR reply is not JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = OcrReplySchema.safeParse(body);
    if (!parsed.success) {
      throw new OcrError(`Unexpected OCR reply: ${parsed.error.issues.map(i => i.message).join("; ")}`);
    }
    return parsed.data.result;
  }
}
