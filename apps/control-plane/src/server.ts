import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { URL } from "node:url";
import { createRouteContext, dispatch } from "./app.js";
import { loadBenchmarkConfig } from "./config.js";

const config = loadBenchmarkConfig();
const ctx = createRouteContext(config.router);

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

async function readBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  if (chunks.length === 0) return undefined;
  const value = Buffer.concat(chunks).toString("utf8");
  try {
    return JSON.parse(value) as unknown;
  } catch {
    return undefined;
  }
}

const server = createServer((req, res) => {
  const requestUrl = new URL(req.url ?? "/", "http://localhost:8000");
  const method = req.method ?? "GET";
  readBody(req)
    .then((body) => {
      const result = dispatch(requestUrl.pathname, method, body, ctx, requestUrl.searchParams);
      sendJson(res, result.status, result.body);
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error("[server] failed to read request body:", error);
      sendJson(res, 400, { error: "Unreadable request body" });
    });
});

const port = Number(process.env.PORT ?? "8000");
server.listen(port, () => {
  // eslint-disable-next-line no-console
  console.log(`[server] value router listening on http://localhost:${port}`);
});
