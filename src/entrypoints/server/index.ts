import { createServer, IncomingHttpHeaders, Server, ServerResponse } from "http";
import { handleFeed } from "../../index";
import { FeedEnvelope } from "../../domain/types";
import { loadConfig } from "../../config/config";
import { logger } from "../../config/logger";
import { errorResult, jsonResult, JsonResult, parseJsonBody } from "../respond";

function send(res: ServerResponse, result: JsonResult): void {
  res.statusCode = result.statusCode;
  for (const [name, value] of Object.entries(result.headers)) res.setHeader(name, value);
  res.setHeader("Content-Length", Buffer.byteLength(result.body));
  res.end(result.body);
}

/** The parts of an incoming request the router reads; IncomingMessage fits. */
export interface RequestLike extends AsyncIterable<unknown> {
  url?: string;
  method?: string;
  headers: IncomingHttpHeaders;
}

async function readBody(req: RequestLike): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function route(req: RequestLike): Promise<JsonResult> {
  const url = req.url || "/";
  const method = req.method || "GET";

  if (method === "GET" && url === "/health") {
    return jsonResult(200, { ok: true });
  }
  if (method !== "POST" || url.split("?")[0] !== "/pipes/uniq") {
    return jsonResult(404, { error: "Not Found" });
  }

  const parsed = parseJsonBody(await readBody(req));
  if (!parsed.ok) {
    return jsonResult(400, { ok: false, error: "Invalid JSON body" });
  }

  const envelope: FeedEnvelope = {
    source: "HTTP",
    body: parsed.value,
    context: { verbose: req.headers["x-pipe-verbose"] === "1" },
    receivedAt: new Date().toISOString(),
  };
  try {
    const result = await handleFeed(envelope);
    return jsonResult(200, { ok: true, result });
  } catch (err) {
    return errorResult(err);
  }
}

export function createFeedServer(): Server {
  return createServer((req, res) => {
    route(req).then(
      (result) => send(res, result),
      (err: unknown) => send(res, errorResult(err))
    );
  });
}

if (require.main === module) {
  const { port } = loadConfig().server;
  createFeedServer().listen(port, () => {
    logger.info("server:listening", { url: `http://localhost:${port}` });
  });
}
