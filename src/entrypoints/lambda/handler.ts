import { handleFeed } from "../../index";
import { FeedEnvelope, PipeContext } from "../../domain/types";
import { errorResult, headerValue, jsonResult, JsonResult, parseJsonBody } from "../respond";

// Minimal local types to avoid aws-lambda dependency
interface APIGatewayProxyEventLike {
  headers: Record<string, string | undefined> | null;
  body: string | null;
  requestContext?: { requestId?: string };
}

export async function handler(event: APIGatewayProxyEventLike): Promise<JsonResult> {
  const parsed = parseJsonBody(event.body);
  if (!parsed.ok) {
    return jsonResult(400, { ok: false, error: "Invalid JSON body" });
  }

  const context: PipeContext = {
    runId: event.requestContext?.requestId,
    verbose: headerValue(event.headers, "x-pipe-verbose") === "1",
  };
  const envelope: FeedEnvelope = {
    source: "LAMBDA",
    body: parsed.value,
    context,
    receivedAt: new Date().toISOString(),
  };

  try {
    const result = await handleFeed(envelope);
    return jsonResult(200, { ok: true, result });
  } catch (err) {
    return errorResult(err);
  }
}

export default handler;
