export type PortalErrorKind =
  | "network-error"
  | "unexpected-status"
  | "empty-body"
  | "redirect-loop"
  | "missing-location-header";

/**
 * Raised by the transport and scrape plumbing. Login and booking code turn
 * these into typed results instead of letting them escape.
 */
export class PortalError extends Error {
  readonly kind: PortalErrorKind;
  readonly status?: number;
  readonly url?: string;

  constructor(kind: PortalErrorKind, message: string, details: { status?: number; url?: string; cause?: unknown } = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "PortalError";
    this.kind = kind;
    this.status = details.status;
    this.url = details.url;
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.field} (${i.message})`).join(", ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
