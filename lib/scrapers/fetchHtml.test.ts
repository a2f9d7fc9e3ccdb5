import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createServer, type Server } from "node:http";
import { createHttpClient } from "./fetchHtml";

let server: Server;
let base = "";

beforeAll(async () => {
  server = createServer((req, res) => {
    if (req.url === "/stall") {
      res.writeHead(200, { "Content-Type": "text/html" });
      res.write("<p>erster Teil");
      return;
    }
    if (req.url === "/missing") {
      res.writeHead(404);
      res.end();
      return;
    }
    if (req.url === "/echo") {
      let body = "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString("utf-8");
      });
      req.on("end", () => {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ua: req.headers["user-agent"], body }));
      });
      return;
    }
    res.writeHead(200, { "Content-Type": "text/html" });
    res.end("<p>ok</p>");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
});

describe("createHttpClient", () => {
  it("returns the body and the final url", async () => {
    const page = await createHttpClient({ timeoutMs: 2000 }).fetchHtmlWithUrl(`${base}/page`);
    expect(page).toEqual({ html: "<p>ok</p>", finalUrl: `${base}/page` });
  });

  it("rejects on a non-2xx status", async () => {
    await expect(createHttpClient({ timeoutMs: 2000 }).fetchHtml(`${base}/missing`)).rejects.toThrow(
      `HTTP 404: ${base}/missing`
    );
  });

  it("times out while the body is still arriving", async () => {
    await expect(createHttpClient({ timeoutMs: 200 }).fetchHtml(`${base}/stall`)).rejects.toThrow(
      `Timeout after 200ms: ${base}/stall`
    );
  });

  it("posts JSON with the configured user agent", async () => {
    const client = createHttpClient({ userAgent: "test-agent/1", timeoutMs: 2000 });
    expect(await client.postJson(`${base}/echo`, { a: 1 })).toEqual({ ua: "test-agent/1", body: '{"a":1}' });
  });
});
