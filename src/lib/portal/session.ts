import type { PortalResponse, PortalTransport, TransportStats } from "./transport";
import { portalUrl } from "./url";

/**
 * Authenticated handle returned by a successful login. It owns the cookie
 * state of one transport, so a session belongs to one caller at a time.
 */
export class PortalSession {
  readonly baseUrl: string;
  private readonly transport: PortalTransport;

  constructor(baseUrl: string, transport: PortalTransport) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.transport = transport;
  }

  url(path: string): string {
    return portalUrl(this.baseUrl, path);
  }

  get(url: string, referer?: string): Promise<PortalResponse> {
    return this.transport.send({ method: "GET", url, referer });
  }

  postForm(url: string, form: Record<string, string>, referer?: string): Promise<PortalResponse> {
    return this.transport.send({ method: "POST", url, form, referer });
  }

  stats(): TransportStats {
    return this.transport.stats();
  }
}
