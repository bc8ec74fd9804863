import {
  DEFAULT_MAX_LOGIN_REDIRECTS,
  HOMEPAGE_TITLE,
  PORTAL_PATHS,
} from "../constants";
import { PortalError, errorMessage } from "../errors";
import { silentLogger, snippet, type Logger } from "../logger";
import { parseLoginForm, pageTitle, type LoginForm } from "./markup";
import { encodePassword, isValidSalt } from "./password";
import { isRedirectStatus } from "./redirects";
import { PortalSession } from "./session";
import type { PortalResponse, TransportFactory } from "./transport";
import { normalizePortalUrl, resolveLocation } from "./url";

export type AuthFailureReason =
  | "redirect-loop"
  | "missing-token"
  | "missing-location-header"
  | "unexpected-status"
  | "empty-body"
  | "io-error"
  | "login-rejected";

export interface AuthFailure {
  reason: AuthFailureReason;
  message: string;
  url?: string;
  status?: number;
  title?: string;
  bodySnippet?: string;
}

export type LoginResult = { ok: true; session: PortalSession } | { ok: false; failure: AuthFailure };

/**
 * Handshake states. A login walks them in order and ends in either
 * "verified" or "failed".
 */
export type LoginState =
  | { kind: "following-redirects"; url: string; redirects: number; sawTokenlessPage: boolean }
  | { kind: "token-found"; url: string; form: LoginForm }
  | { kind: "credentials-submitted"; url: string; response: PortalResponse }
  | { kind: "verified"; title: string }
  | { kind: "failed"; failure: AuthFailure };

type Terminal = Extract<LoginState, { kind: "verified" | "failed" }>;

export interface AuthClientOptions {
  baseUrl: string;
  transportFactory: TransportFactory;
  maxRedirects?: number;
  homepageTitle?: string;
  logger?: Logger;
}

export interface Authenticator {
  login(username: string, password: string): Promise<LoginResult>;
}

function fail(reason: AuthFailureReason, message: string, extra: Omit<AuthFailure, "reason" | "message"> = {}): Terminal {
  return { kind: "failed", failure: { reason, message, ...extra } };
}

function isTerminal(state: LoginState): state is Terminal {
  return state.kind === "verified" || state.kind === "failed";
}

/**
 * Reproduces the portal's browser login: walk redirects until a page carries
 * the verification token, post the credentials with the salted password, and
 * accept the session only when the homepage title comes back.
 *
 * Never retries; the caller owns the retry policy.
 */
export class PortalAuthClient implements Authenticator {
  private readonly baseUrl: string;
  private readonly transportFactory: TransportFactory;
  private readonly maxRedirects: number;
  private readonly homepageTitle: string;
  private readonly log: Logger;

  constructor(options: AuthClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.transportFactory = options.transportFactory;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_LOGIN_REDIRECTS;
    this.homepageTitle = options.homepageTitle ?? HOMEPAGE_TITLE;
    this.log = options.logger ?? silentLogger;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    this.log.info({ username }, "Attempting portal login");

    const session = new PortalSession(this.baseUrl, this.transportFactory());
    let outcome: Terminal;

    try {
      outcome = await this.run(session, username, password);
    } catch (error) {
      const url = error instanceof PortalError ? error.url : undefined;
      outcome = fail("io-error", `Error: ${errorMessage(error)}`, { url });
    }

    if (outcome.kind === "verified") {
      this.log.info({ username }, "Login successful - portal homepage reached");
      return { ok: true, session };
    }

    const { reason, status, url, title } = outcome.failure;
    this.log.warn({ username, reason, status, url, title }, `Login failed: ${outcome.failure.message}`);
    return { ok: false, failure: outcome.failure };
  }

  private async run(session: PortalSession, username: string, password: string): Promise<Terminal> {
    const visited = new Set<string>();
    let state: LoginState = {
      kind: "following-redirects",
      url: session.url(PORTAL_PATHS.entry),
      redirects: 0,
      sawTokenlessPage: false,
    };

    for (;;) {
      if (isTerminal(state)) {
        return state;
      }
      state = await this.step(state, session, visited, username, password);
    }
  }

  private step(
    state: Exclude<LoginState, Terminal>,
    session: PortalSession,
    visited: Set<string>,
    username: string,
    password: string
  ): Promise<LoginState> {
    switch (state.kind) {
      case "following-redirects":
        return this.followToLoginPage(state, session, visited);
      case "token-found":
        return this.submitCredentials(state, session, username, password);
      case "credentials-submitted":
        return this.verifyLanding(state, session);
    }
  }

  private async followToLoginPage(
    state: Extract<LoginState, { kind: "following-redirects" }>,
    session: PortalSession,
    visited: Set<string>
  ): Promise<LoginState> {
    const { redirects, sawTokenlessPage } = state;
    const fallbackUrl = session.url(PORTAL_PATHS.login);
    let url = state.url;

    if (redirects >= this.maxRedirects) {
      const reason = sawTokenlessPage ? "missing-token" : "redirect-loop";
      return fail(reason, `Too many redirects or fallbacks: ${redirects}`, { url });
    }

    if (visited.has(url)) {
      this.log.warn({ url }, "Possible redirect loop detected, attempting fallback");
      if (visited.has(fallbackUrl)) {
        return fail("redirect-loop", `Redirect loop detected at: ${fallbackUrl}`, { url: fallbackUrl });
      }
      url = fallbackUrl;
    }
    visited.add(url);

    const response = await session.get(url, session.url(PORTAL_PATHS.entry));
    this.log.debug({ url, status: response.status }, "login handshake response");

    if (response.status === 200) {
      if (!response.body) {
        return fail("empty-body", "Empty response body", { url, status: 200 });
      }
      const form = parseLoginForm(response.body);
      if (form) {
        return { kind: "token-found", url, form };
      }
      const next = session.url(PORTAL_PATHS.portalRoot);
      this.log.debug({ url, next }, "No verification token on page, trying portal root");
      return { kind: "following-redirects", url: next, redirects: redirects + 1, sawTokenlessPage: true };
    }

    if (isRedirectStatus(response.status)) {
      const location = response.headers.get("location");
      if (!location) {
        return fail("missing-location-header", `No Location header in redirect for URL: ${url}`, {
          url,
          status: response.status,
        });
      }
      const next = normalizePortalUrl(resolveLocation(url, location));
      return { kind: "following-redirects", url: next, redirects: redirects + 1, sawTokenlessPage };
    }

    if (response.status === 404) {
      if (visited.has(fallbackUrl)) {
        return fail("unexpected-status", `404 Not Found for: ${url}`, {
          url,
          status: 404,
          bodySnippet: snippet(response.body),
        });
      }
      this.log.warn({ url, fallbackUrl }, "404 Not Found, attempting fallback");
      return { kind: "following-redirects", url: fallbackUrl, redirects: redirects + 1, sawTokenlessPage };
    }

    return fail("unexpected-status", `Unexpected status: ${response.status}`, {
      url,
      status: response.status,
      bodySnippet: snippet(response.body),
    });
  }

  private async submitCredentials(
    state: Extract<LoginState, { kind: "token-found" }>,
    session: PortalSession,
    username: string,
    password: string
  ): Promise<LoginState> {
    const { verificationToken, passwordSalt } = state.form;
    if (!isValidSalt(passwordSalt)) {
      this.log.warn({ url: state.url }, "Password salt missing or not numeric, submitting unsalted password");
    }

    const url = session.url(PORTAL_PATHS.loginSubmit);
    const response = await session.postForm(
      url,
      {
        DeviceType: "PC",
        DesktopSelected: "true",
        __RequestVerificationToken: verificationToken,
        UserName: username,
        Password: password,
        PwEnc: encodePassword(password, passwordSalt),
        PasswordSalt: passwordSalt,
      },
      session.url(PORTAL_PATHS.portalRoot)
    );
    this.log.debug({ url, status: response.status }, "credentials submitted");

    return { kind: "credentials-submitted", url, response };
  }

  private async verifyLanding(
    state: Extract<LoginState, { kind: "credentials-submitted" }>,
    session: PortalSession
  ): Promise<LoginState> {
    const { response, url } = state;

    if (isRedirectStatus(response.status)) {
      const location = response.headers.get("location");
      if (!location) {
        return fail("missing-location-header", "Missing Location header in login redirect", {
          url,
          status: response.status,
        });
      }
      const finalUrl = normalizePortalUrl(resolveLocation(url, location));
      const landing = await session.get(finalUrl, session.url(PORTAL_PATHS.portalRoot));
      if (!landing.body) {
        return fail("empty-body", "Empty final response body", { url: finalUrl, status: landing.status });
      }
      return this.checkTitle(landing.body, landing.status, finalUrl);
    }

    if (response.ok) {
      if (!response.body) {
        return fail("empty-body", "Empty login response body", { url, status: response.status });
      }
      return this.checkTitle(response.body, response.status, url);
    }

    return fail("unexpected-status", `Login failed: ${response.status}`, {
      url,
      status: response.status,
      bodySnippet: snippet(response.body),
    });
  }

  private checkTitle(body: string, status: number, url: string): Terminal {
    const title = pageTitle(body);
    if (title.includes(this.homepageTitle)) {
      return { kind: "verified", title };
    }
    return fail("login-rejected", `Login failed - Unexpected page: ${title || "(no title)"}`, { url, status, title });
  }
}
