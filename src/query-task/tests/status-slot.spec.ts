import { describe, it, expect } from "vitest";
import { StatusSlot, endpointMatcher, mainDocumentMatcher, urlsMatch } from "../status-slot";
import { FakeSurface, instantTiming } from "./fakes";

const PAGE = "https://query.example.test/search/";
const CAPTCHA = "https://query.example.test/search/captcha.do";

function event(url: string, statusCode: number) {
  return { urlPathWithoutQuery: url, statusCode, timestampMonotonic: 0 };
}

describe("urlsMatch", () => {
  it("ignores a trailing slash", () => {
    expect(urlsMatch("https://a.test/x/", "https://a.test/x")).toBe(true);
    expect(urlsMatch("https://a.test/x", "https://a.test/y")).toBe(false);
  });
});

describe("matchers", () => {
  it("main-document matcher accepts only the page itself", () => {
    const matches = mainDocumentMatcher(`${PAGE}?tab=1`);

    expect(matches(PAGE)).toBe(true);
    expect(matches("https://query.example.test/search")).toBe(true);
    expect(matches(CAPTCHA)).toBe(false);
  });

  it("endpoint matcher accepts paths ending in the endpoint", () => {
    const matches = endpointMatcher("captcha.do");

    expect(matches(CAPTCHA)).toBe(true);
    expect(matches("https://query.example.test/search/notcaptcha.do")).toBe(false);
    expect(matches(PAGE)).toBe(false);
  });
});

describe("StatusSlot", () => {
  it("keeps the latest matching status and counts observations", () => {
    const slot = new StatusSlot("captcha", endpointMatcher("captcha.do"));

    slot.observe(event(CAPTCHA, 500));
    slot.observe(event(PAGE, 404));
    slot.observe(event(CAPTCHA, 200));

    expect(slot.current).toBe(200);
    expect(slot.generation).toBe(2);
  });

  it("resets to unknown before running the action", async () => {
    const slot = new StatusSlot("page", mainDocumentMatcher(PAGE));
    slot.observe(event(PAGE, 200));
    let seenDuringAction: number | null = -1;

    const value = await slot.expectFresh(async () => {
      seenDuringAction = slot.current;
      return "done";
    });

    expect(value).toBe("done");
    expect(seenDuringAction).toBeNull();
  });

  it("does not let a stale status confirm a new action", async () => {
    const slot = new StatusSlot("page", mainDocumentMatcher(PAGE));
    slot.observe(event(PAGE, 200));

    await slot.expectFresh(async () => undefined);
    const confirmed = await slot.waitFor(status => status === 200, { timeoutMs: 300, intervalMs: 100 }, instantTiming());

    expect(confirmed).toBe(false);
  });

  it("waitFor resolves once a matching event arrives", async () => {
    const slot = new StatusSlot("page", mainDocumentMatcher(PAGE));
    const timing = instantTiming({ onSleep: () => slot.observe(event(PAGE, 200)) });

    const confirmed = await slot.waitFor(status => status === 200, { timeoutMs: 1000, intervalMs: 100 }, timing);

    expect(confirmed).toBe(true);
    expect(timing.slept).toEqual([100]);
  });

  it("attaches to a surface and detaches again", () => {
    const surface = new FakeSurface();
    const slot = new StatusSlot("captcha", endpointMatcher("captcha.do"));

    const detach = slot.attach(surface);
    surface.emit(CAPTCHA, 200);
    detach();
    surface.emit(CAPTCHA, 500);

    expect(slot.current).toBe(200);
    expect(surface.listenerCount).toBe(0);
  });
});
