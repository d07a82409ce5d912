import { describe, it, expect, vi } from "vitest";
import { CaptchaSolver, normalizeCaptchaText, type CaptchaSettings } from "../captcha-solver";
import type { OcrEngine } from "../types";
import { FakeSurface, instantTiming } from "./fakes";

const SETTINGS: CaptchaSettings = {
  imageSelector: "#captchaImg",
  endpointPath: "captcha.do",
  maxAttempts: 3,
  minLength: 4,
  refreshDelayMinMs: 2000,
  refreshDelayMaxMs: 5000,
  statusWaitMs: 3000,
  initialStatusWaitMs: 2000,
  statusPollIntervalMs: 100,
};

function ocrReturning(...outputs: string[]) {
  const recognize = vi.fn(async (_image: Buffer) => "");
  for (const output of outputs) recognize.mockResolvedValueOnce(output);
  return { recognize };
}

function setup(ocr: OcrEngine, overrides: Partial<CaptchaSettings> = {}, random = 0) {
  const surface = new FakeSurface();
  const timing = instantTiming({ random });
  const solver = new CaptchaSolver(surface, ocr, { ...SETTINGS, ...overrides }, timing);
  return { surface, timing, solver };
}

describe("normalizeCaptchaText", () => {
  it("drops everything but letters and digits", () => {
    expect(normalizeCaptchaText(" a-b 1_2\n")).toBe("ab12");
  });

  it("keeps letters outside ASCII", () => {
    expect(normalizeCaptchaText("验证 码-x7!")).toBe("验证码x7");
  });
});

describe("CaptchaSolver", () => {
  it("performs exactly one refresh per attempt when the image never loads", async () => {
    const { surface, solver } = setup(ocrReturning());
    surface.captchaStatuses = [500];

    const result = await solver.solve();

    expect(result.text).toBeNull();
    expect(result.attempts).toHaveLength(3);
    expect(surface.callsTo("click #captchaImg")).toHaveLength(3);
    expect(solver.refreshes).toBe(3);
  });

  it("still screenshots a refresh that was never confirmed", async () => {
    const { surface, solver } = setup(ocrReturning("ab12"));
    surface.captchaStatuses = [null];

    const result = await solver.solve();

    expect(result.text).toBe("ab12");
    expect(surface.callsTo("screenshot")).toHaveLength(1);
  });

  it("rejects a too-short recognition, refreshes, and accepts the next", async () => {
    const { surface, solver } = setup(ocrReturning("ab", "abcd"));

    const result = await solver.solve();

    expect(result.text).toBe("abcd");
    expect(result.attempts.map(a => a.outcome)).toEqual(["recognitionTooShort", "accepted"]);
    expect(result.attempts[0].recognizedText).toBe("ab");
    expect(surface.callsTo("click #captchaImg")).toHaveLength(2);
  });

  it("screenshots directly when the captcha already answered 200", async () => {
    const ocr = ocrReturning("k7m2");
    const { surface, solver } = setup(ocr);
    solver.attach();
    surface.emit(surface.captchaUrl, 200);

    const result = await solver.solve();

    expect(result.text).toBe("k7m2");
    expect(surface.callsTo("click")).toHaveLength(0);
    expect(ocr.recognize).toHaveBeenCalledWith(Buffer.from("captcha-image"));
    expect(result.attempts[0].imageBytes).toEqual(Buffer.from("captcha-image"));
  });

  it("waits a randomized delay within the configured range after each click", async () => {
    const { timing, solver } = setup(ocrReturning("abcd"), {}, 0.5);

    await solver.solve();

    expect(timing.slept).toContain(3500);
  });

  it("records loadFailed when the screenshot fails", async () => {
    const { surface, solver } = setup(ocrReturning("abcd"));
    surface.failScreenshot = true;

    const result = await solver.solve();

    expect(result.text).toBeNull();
    expect(result.attempts.map(a => a.outcome)).toEqual(["loadFailed", "loadFailed", "loadFailed"]);
  });

  it("treats an OCR failure as an empty recognition", async () => {
    const ocr: OcrEngine = {
      recognize: vi.fn(async () => {
        throw new Error("OCR service unavailable");
      }),
    };
    const { solver } = setup(ocr, { maxAttempts: 1 });

    const result = await solver.solve();

    expect(result).toMatchObject({ text: null, attempts: [{ attemptIndex: 1, outcome: "recognitionEmpty" }] });
  });

  it("returns null immediately once a stop was requested", async () => {
    const ocr = ocrReturning("abcd");
    const { surface, solver } = setup(ocr);
    surface.requestStop();

    const result = await solver.solve();

    expect(result).toEqual({ text: null, attempts: [] });
    expect(ocr.recognize).not.toHaveBeenCalled();
  });

  it("has no manual-entry fallback", async () => {
    const { solver } = setup(ocrReturning());

    await expect(solver.manualEntry()).resolves.toBeNull();
  });
});
