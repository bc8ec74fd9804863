import got, { RequestError } from "got";
import { HttpsProxyAgent } from "https-proxy-agent";
import { CookieJar } from "tough-cookie";
import UserAgent from "user-agents";
import { PortalError } from "../errors";

export interface PortalRequest {
  method: "GET" | "POST";
  url: string;
  referer?: string;
  form?: Record<string, string>;
}

export interface PortalResponse {
  ok: boolean;
  status: number;
  statusText: string;
  url: string;
  headers: { get: (name: string) => string | null };
  body: string;
}

export interface TransportStats {
  requests: number;
  bytes: number;
}

/**
 * One cookie-bearing connection to the portal. Implementations must not
 * follow redirects on their own.
 */
export interface PortalTransport {
  send(request: PortalRequest): Promise<PortalResponse>;
  stats(): TransportStats;
}

export type TransportFactory = () => PortalTransport;

export interface GotTransportOptions {
  timeoutMs?: number;
  proxyUrl?: string;
  userAgent?: string;
}

function getHeaders(userAgent: string, referer?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "User-Agent": userAgent,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
    "Accept-Language": "en-GB,en;q=0.9",
    "Accept-Encoding": "gzip, deflate, br",
    "Upgrade-Insecure-Requests": "1",
    "Sec-Fetch-Dest": "document",
    "Sec-Fetch-Mode": "navigate",
    "Sec-Fetch-Site": referer ? "same-origin" : "none",
  };

  if (referer) {
    headers["Referer"] = referer;
  }

  return headers;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * got-backed transport with its own cookie jar and a desktop user agent that
 * stays fixed for the transport's lifetime.
 */
export function createGotTransport(options: GotTransportOptions = {}): PortalTransport {
  const jar = new CookieJar();
  const userAgent = options.userAgent ?? new UserAgent({ deviceCategory: "desktop" }).toString();
  const proxyAgent = options.proxyUrl ? new HttpsProxyAgent(options.proxyUrl) : undefined;
  const stats: TransportStats = { requests: 0, bytes: 0 };

  const client = got.extend({
    cookieJar: {
      getCookieString: (url: string) => jar.getCookieString(url),
      setCookie: (rawCookie: string, url: string) => jar.setCookie(rawCookie, url),
    },
    followRedirect: false,
    throwHttpErrors: false,
    retry: { limit: 0 },
    timeout: { request: options.timeoutMs ?? 30000 },
    agent: proxyAgent ? { https: proxyAgent, http: proxyAgent } : undefined,
  });

  return {
    async send(request: PortalRequest): Promise<PortalResponse> {
      stats.requests++;
      try {
        const response = await client(request.url, {
          method: request.method,
          headers: getHeaders(userAgent, request.referer),
          form: request.form,
        });

        stats.bytes += response.body.length;

        return {
          ok: response.statusCode >= 200 && response.statusCode < 300,
          status: response.statusCode,
          statusText: response.statusMessage || "",
          url: request.url,
          headers: {
            get: (name: string) => {
              const val = response.headers[name.toLowerCase()];
              return Array.isArray(val) ? (val[0] ?? null) : val || null;
            },
          },
          body: response.body,
        };
      } catch (error) {
        if (error instanceof RequestError) {
          throw new PortalError("network-error", `${request.method} ${request.url} failed: ${error.message}`, {
            url: request.url,
            cause: error,
          });
        }
        throw error;
      }
    },
    stats: () => ({ ...stats }),
  };
}
