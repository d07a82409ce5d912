// ============================================================================
// STATUS SLOT — latest observed HTTP status for one URL pattern, resettable
// ============================================================================

import {
  pollUntil,
  stripQuery,
  type AutomationSurface,
  type PollOptions,
  type ResponseEvent,
  type Timing,
} from "../browser-session";

export type StatusMatcher = (urlPathWithoutQuery: string) => boolean;

/** Compare URLs ignoring trailing slashes. */
export function urlsMatch(a: string, b: string): boolean {
  return a.replace(/\/$/, "") === b.replace(/\/$/, "");
}

/**
 * Matches the main document of `targetUrl` only: same origin and path after
 * dropping query, fragment and a trailing slash. Sub-resources below the
 * page path (e.g. its captcha endpoint) do not match.
 */
export function mainDocumentMatcher(targetUrl: string): StatusMatcher {
  const target = stripQuery(targetUrl);
  return path => urlsMatch(path, target);
}

/** Matches any response whose path ends in `endpointPath` (e.g. `captcha.do`). */
export function endpointMatcher(endpointPath: string): StatusMatcher {
  const suffix = `/${endpointPath.replace(/^\/+/, "")}`;
  return path => path.endsWith(suffix);
}

/**
 * Holds the most recent status seen for matching responses.
 *
 * The slot must be reset immediately before the action meant to produce a
 * fresh status, or a stale status from an earlier exchange confirms the new
 * action. `expectFresh` is the only way to run such an action, so callers
 * cannot forget the reset.
 */
export class StatusSlot {
  private status: number | null = null;
  private observations = 0;

  constructor(
    readonly name: string,
    private readonly matches: StatusMatcher
  ) {}

  /** Latest matching status, or null while unknown. */
  get current(): number | null {
    return this.status;
  }

  /** Number of matching events seen over the slot's lifetime. */
  get generation(): number {
    return this.observations;
  }

  observe(event: ResponseEvent): void {
    if (!this.matches(event.urlPathWithoutQuery)) return;
    this.status = event.statusCode;
    this.observations++;
  }

  /** Back to unknown. */
  invalidate(): void {
    this.status = null;
  }

  /** Reset to unknown, then run the action expected to produce a matching response. */
  async expectFresh<T>(action: () => Promise<T>): Promise<T> {
    this.invalidate();
    return action();
  }

  /** Bounded poll on the slot value. */
  waitFor(
    predicate: (status: number | null) => boolean,
    options: PollOptions,
    timing: Timing
  ): Promise<boolean> {
    return pollUntil(() => predicate(this.status), options, timing);
  }

  /** Feed this slot from a surface's response events. Returns the unsubscribe. */
  attach(surface: Pick<AutomationSurface, "onResponse">): () => void {
    return surface.onResponse(event => this.observe(event));
  }
}
