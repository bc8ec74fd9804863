import { createServer, type Server } from "node:http";
import { afterEach, describe, it, expect } from "vitest";
import { PortalError } from "@/lib/errors";
import { createGotTransport, formatBytes } from "@/lib/portal/transport";

function listen(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(`http://127.0.0.1:${address.port}`);
      } else {
        reject(new Error("server has no port"));
      }
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe("createGotTransport", () => {
  let server: Server | undefined;

  afterEach(async () => {
    if (server?.listening) await close(server);
    server = undefined;
  });

  it("returns redirects unfollowed and replays cookies", async () => {
    server = createServer((req, res) => {
      if (req.url === "/start") {
        res.writeHead(302, { Location: "/next", "Set-Cookie": "sid=abc; Path=/" });
        res.end();
        return;
      }
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end(`cookie=${req.headers.cookie ?? ""}`);
    });
    const base = await listen(server);
    const transport = createGotTransport({ userAgent: "test-agent", timeoutMs: 2000 });

    const first = await transport.send({ method: "GET", url: `${base}/start` });
    expect(first.status).toBe(302);
    expect(first.ok).toBe(false);
    expect(first.headers.get("Location")).toBe("/next");

    const second = await transport.send({ method: "GET", url: `${base}/next` });
    expect(second.status).toBe(200);
    expect(second.body).toBe("cookie=sid=abc");
    expect(transport.stats()).toEqual({ requests: 2, bytes: "cookie=sid=abc".length });
  });

  it("maps a refused connection to a network error", async () => {
    const vacated = createServer();
    const base = await listen(vacated);
    await close(vacated);
    const transport = createGotTransport({ userAgent: "test-agent", timeoutMs: 2000 });

    const failure = await transport.send({ method: "GET", url: `${base}/` }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PortalError);
    expect(failure).toMatchObject({ kind: "network-error", url: `${base}/` });
  });
});

describe("formatBytes", () => {
  it("picks a readable unit", () => {
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(2048)).toBe("2.0 KB");
    expect(formatBytes(3 * 1024 * 1024)).toBe("3.00 MB");
  });
});
