import { silentLogger, type Logger } from "../logger";
import type { PortalSession } from "./session";
import type { PortalResponse } from "./transport";
import { normalizePortalUrl, resolveLocation } from "./url";

export type RedirectFailureReason = "redirect-loop" | "missing-location-header" | "unexpected-status" | "empty-body";

export type RedirectState =
  | { kind: "requesting"; url: string; redirects: number }
  | { kind: "arrived"; url: string; redirects: number; response: PortalResponse }
  | { kind: "failed"; url: string; reason: RedirectFailureReason; message: string; status?: number };

export type RedirectOutcome = Exclude<RedirectState, { kind: "requesting" }>;

export interface FollowOptions {
  maxRedirects: number;
  referer?: string;
  logger?: Logger;
}

export function isRedirectStatus(status: number): boolean {
  return status === 301 || status === 302;
}

/**
 * GET a URL and follow 301/302 responses by hand, one state per request.
 * Stops on the first 2xx page, a revisited URL, or after maxRedirects hops.
 * Network failures propagate as PortalError.
 */
export async function followRedirects(
  session: PortalSession,
  startUrl: string,
  options: FollowOptions
): Promise<RedirectOutcome> {
  const log = options.logger ?? silentLogger;
  const visited = new Set<string>();
  let state: RedirectState = { kind: "requesting", url: startUrl, redirects: 0 };

  for (;;) {
    if (state.kind !== "requesting") {
      return state;
    }
    state = await step(session, state, visited, options, log);
  }
}

async function step(
  session: PortalSession,
  state: Extract<RedirectState, { kind: "requesting" }>,
  visited: Set<string>,
  options: FollowOptions,
  log: Logger
): Promise<RedirectState> {
  const { url, redirects } = state;

  if (redirects >= options.maxRedirects) {
    return { kind: "failed", url, reason: "redirect-loop", message: `Too many redirects: ${redirects}` };
  }
  if (visited.has(url)) {
    return { kind: "failed", url, reason: "redirect-loop", message: `Redirect loop detected at: ${url}` };
  }
  visited.add(url);

  const response = await session.get(url, options.referer);
  log.debug({ url, status: response.status }, "portal response");

  if (response.ok) {
    if (!response.body) {
      return { kind: "failed", url, reason: "empty-body", status: response.status, message: "Empty response body" };
    }
    return { kind: "arrived", url, redirects, response };
  }

  if (isRedirectStatus(response.status)) {
    const location = response.headers.get("location");
    if (!location) {
      return {
        kind: "failed",
        url,
        reason: "missing-location-header",
        status: response.status,
        message: `No Location header in redirect for URL: ${url}`,
      };
    }
    const next = normalizePortalUrl(resolveLocation(url, location));
    log.debug({ from: url, to: next }, "following redirect");
    return { kind: "requesting", url: next, redirects: redirects + 1 };
  }

  return {
    kind: "failed",
    url,
    reason: "unexpected-status",
    status: response.status,
    message: `Unexpected status ${response.status} for URL: ${url}`,
  };
}
