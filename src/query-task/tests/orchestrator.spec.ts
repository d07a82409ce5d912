import { describe, it, expect, vi } from "vitest";
import { QueryTaskOrchestrator, type QueryTaskSettings } from "../orchestrator";
import { DEFAULT_PIPELINE } from "../steps";
import {
  DETAIL,
  RecordSourceError,
  type CaptchaSource,
  type ExtractionResult,
  type FormDriver,
  type Navigator,
  type QueryRecord,
  type QueryResult,
  type RecordSource,
  type ResultSink,
  type TaskReporter,
} from "../types";
import { FakeSurface, instantTiming } from "./fakes";

const SETTINGS: QueryTaskSettings = {
  targetUrl: "https://query.example.test/search/",
  readyTimeoutMs: 30000,
  interRecordDelayMs: 3000,
  delaySliceMs: 500,
  pipeline: DEFAULT_PIPELINE,
};

const RECORDS: QueryRecord[] = [
  { idNumber: "110101199001011234", displayName: "Person One", rowOrigin: 2 },
  { idNumber: "110101199202022345", displayName: "Person Two", rowOrigin: 3 },
  { idNumber: "11010119930303345X", displayName: "Person Three", rowOrigin: 4 },
];

const FOUND: ExtractionResult = { success: true, error: null, caseCount: 7, detail: DETAIL.casesFound };

function setup(options: { records?: QueryRecord[]; onSleep?: (ms: number) => void } = {}) {
  const surface = new FakeSurface();
  const timing = instantTiming({ onSleep: options.onSleep });

  const navigator: Navigator = {
    attach: vi.fn(),
    navigateReliably: vi.fn(async () => ({ status: "success" as const, attempts: [] })),
    waitForPageReady: vi.fn(async () => true),
  };
  const captcha: CaptchaSource = {
    attach: vi.fn(),
    solve: vi.fn(async () => ({ text: "ab12", attempts: [] })),
  };
  const form: FormDriver = {
    fillAndSubmit: vi.fn(async () => true),
    extractResult: vi.fn(async () => FOUND),
  };
  const records: RecordSource = {
    description: "records.xlsx",
    load: vi.fn(async () => options.records ?? RECORDS),
  };
  const written: QueryResult[][] = [];
  const sink: ResultSink = {
    write: vi.fn(async (results: QueryResult[]) => {
      written.push(results);
      return "output/query_result.xlsx";
    }),
  };
  const progress: Array<[number, number]> = [];
  const reporter: TaskReporter = {
    log: () => {},
    progress: (current, total) => progress.push([current, total]),
  };

  const task = new QueryTaskOrchestrator(
    { session: surface, navigator, captcha, form, records, sink, reporter, timing },
    SETTINGS
  );
  return { task, surface, timing, navigator, captcha, form, records, sink, written, progress };
}

describe("QueryTaskOrchestrator", () => {
  it("queries every record and exports all rows", async () => {
    const { task, written, progress, navigator } = setup();

    const result = await task.run();

    expect(result.status).toBe("success");
    expect(result.message).toBe("Query complete: 3 of 3 queries succeeded");
    expect(result.outputPath).toBe("output/query_result.xlsx");
    expect(written).toEqual([result.results]);
    expect(result.results[0]).toEqual({
      name: "Person One",
      idNumber: "110101199001011234",
      queriedAt: new Date("2024-03-01T08:30:00Z"),
      status: "success",
      caseCount: 7,
      detail: DETAIL.casesFound,
    });
    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(navigator.navigateReliably).toHaveBeenCalledTimes(1);
    expect(task.getState()).toEqual({ currentIndex: 3, totalCount: 3, cancelRequested: false });
  });

  it("attaches the response listeners before setup", async () => {
    const { task, navigator, captcha } = setup();

    await task.run();

    expect(navigator.attach).toHaveBeenCalledTimes(1);
    expect(captcha.attach).toHaveBeenCalledTimes(1);
  });

  it("sleeps between records in slices and not after the last", async () => {
    const { task, timing } = setup({ records: RECORDS.slice(0, 2) });

    await task.run();

    expect(timing.slept).toEqual([500, 500, 500, 500, 500, 500]);
  });

  it("records a captcha failure for one record and carries on", async () => {
    const { task, captcha, form } = setup();
    vi.mocked(captcha.solve).mockResolvedValueOnce({ text: "ab12", attempts: [] });
    vi.mocked(captcha.solve).mockResolvedValueOnce({ text: null, attempts: [] });

    const result = await task.run();

    expect(result.results.map(r => [r.status, r.detail])).toEqual([
      ["success", DETAIL.casesFound],
      ["failure", DETAIL.captchaFailed],
      ["success", DETAIL.casesFound],
    ]);
    expect(result.message).toBe("Query complete: 2 of 3 queries succeeded, 1 failed");
    expect(form.fillAndSubmit).toHaveBeenCalledTimes(2);
  });

  it("records a submission failure", async () => {
    const { task, form } = setup({ records: RECORDS.slice(0, 1) });
    vi.mocked(form.fillAndSubmit).mockResolvedValueOnce(false);

    const result = await task.run();

    expect(result.results[0]).toMatchObject({ status: "failure", caseCount: 0, detail: DETAIL.submitFailed });
    expect(form.extractResult).not.toHaveBeenCalled();
  });

  it("records a page error reported by the result page", async () => {
    const { task, form } = setup({ records: RECORDS.slice(0, 1) });
    vi.mocked(form.extractResult).mockResolvedValueOnce({
      success: false,
      error: "查询失败",
      caseCount: 0,
      detail: "查询失败",
    });

    const result = await task.run();

    expect(result.results[0]).toMatchObject({ status: "failure", detail: "查询失败" });
  });

  it("turns an exception inside a record into a failed row", async () => {
    const { task, form } = setup();
    vi.mocked(form.fillAndSubmit).mockRejectedValueOnce(new Error("boom"));

    const result = await task.run();

    expect(result.results).toHaveLength(3);
    expect(result.results[0]).toMatchObject({ status: "failure", detail: "query error: boom" });
    expect(result.status).toBe("success");
  });

  it("stops within one delay slice and exports only completed records", async () => {
    let task: QueryTaskOrchestrator | null = null;
    const context = setup({
      onSleep: () => task?.requestStop(),
    });
    task = context.task;

    const result = await task.run();

    expect(result.status).toBe("cancelled");
    expect(result.results.map(r => r.name)).toEqual(["Person One"]);
    expect(context.written).toEqual([result.results]);
    expect(context.timing.slept).toEqual([500]);
    expect(context.surface.stopRequested).toBe(true);
    expect(result.message).toBe("Task stopped: 1/3 record(s) processed (1 of 1 query succeeded)");
    expect(task.getState()).toEqual({ currentIndex: 1, totalCount: 3, cancelRequested: true });
  });

  it("marks the in-flight record as stopped when a stop arrives mid-record", async () => {
    const { task, captcha, form, written } = setup();
    vi.mocked(captcha.solve).mockImplementationOnce(async () => {
      task.requestStop();
      return { text: "ab12", attempts: [] };
    });

    const result = await task.run();

    expect(result.status).toBe("cancelled");
    expect(result.results).toHaveLength(1);
    expect(result.results[0]).toMatchObject({ status: "failure", detail: DETAIL.stopped });
    expect(form.fillAndSubmit).not.toHaveBeenCalled();
    expect(written[0]).toHaveLength(1);
  });

  it("reports a step failure caused by a stop as stopped", async () => {
    const { task, captcha } = setup();
    vi.mocked(captcha.solve).mockImplementationOnce(async () => {
      task.requestStop();
      return { text: null, attempts: [] };
    });

    const result = await task.run();

    expect(result.results[0].detail).toBe(DETAIL.stopped);
  });

  it("ends the run as failed when the browser session is lost", async () => {
    const { task, surface, form, written } = setup();
    vi.mocked(form.fillAndSubmit).mockImplementationOnce(async () => {
      surface.alive = false;
      return false;
    });

    const result = await task.run();

    expect(result.status).toBe("failed");
    expect(result.results).toHaveLength(1);
    expect(result.results[0].detail).toBe(DETAIL.sessionLost);
    expect(written[0]).toHaveLength(1);
    expect(result.message).toBe(
      "Task failed: browser session lost after 1/3 record(s) (0 of 1 query succeeded, 1 failed)"
    );
  });

  it("aborts without exporting when the record source is unusable", async () => {
    const { task, records, sink, navigator } = setup();
    vi.mocked(records.load).mockRejectedValueOnce(
      new RecordSourceError("missing column 身份证号码", "records.xlsx")
    );

    const result = await task.run();

    expect(result.status).toBe("failed");
    expect(result.message).toBe("Could not read records: missing column 身份证号码");
    expect(sink.write).not.toHaveBeenCalled();
    expect(navigator.navigateReliably).not.toHaveBeenCalled();
  });

  it("aborts without exporting when there are no records", async () => {
    const { task, sink } = setup({ records: [] });

    const result = await task.run();

    expect(result.status).toBe("failed");
    expect(result.message).toBe("No records to query in records.xlsx");
    expect(sink.write).not.toHaveBeenCalled();
  });

  it("fails the run but still exports when setup fails", async () => {
    const { task, navigator, captcha, written } = setup();
    vi.mocked(navigator.navigateReliably).mockResolvedValueOnce({ status: "failed", attempts: [] });

    const result = await task.run();

    expect(result.status).toBe("failed");
    expect(result.message).toBe(
      "Task failed during setup: could not load https://query.example.test/search/ after 0 attempt(s)"
    );
    expect(captcha.solve).not.toHaveBeenCalled();
    expect(written).toEqual([[]]);
  });

  it("runs no pipeline work when stopped before the run", async () => {
    const { task, navigator, written } = setup();
    task.requestStop();

    const result = await task.run();

    expect(result.status).toBe("cancelled");
    expect(navigator.navigateReliably).not.toHaveBeenCalled();
    expect(written).toEqual([[]]);
  });

  it("keeps the rows when the export fails", async () => {
    const { task, sink } = setup({ records: RECORDS.slice(0, 1) });
    vi.mocked(sink.write).mockRejectedValueOnce(new Error("disk full"));

    const result = await task.run();

    expect(result.status).toBe("success");
    expect(result.outputPath).toBeNull();
    expect(result.results).toHaveLength(1);
    expect(result.message).toBe("Query complete: 1 of 1 query succeeded; export failed: disk full");
  });

  it("is not disturbed by a failing reporter", async () => {
    const context = setup({ records: RECORDS.slice(0, 1) });
    const task = new QueryTaskOrchestrator(
      {
        session: context.surface,
        navigator: context.navigator,
        captcha: context.captcha,
        form: context.form,
        records: context.records,
        sink: context.sink,
        timing: context.timing,
        reporter: {
          log: () => {
            throw new Error("window closed");
          },
          progress: () => {},
        },
      },
      SETTINGS
    );

    const result = await task.run();

    expect(result.status).toBe("success");
  });

  it("treats repeated stop requests as one", () => {
    const { task, surface } = setup();

    task.requestStop();
    task.requestStop();

    expect(task.getState().cancelRequested).toBe(true);
    expect(surface.stopRequested).toBe(true);
  });
});
