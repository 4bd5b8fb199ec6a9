// src/utility/wsframe.ts

import {
  InboundFrame,
  InboundFrameSchema,
  OutboundFrame,
  OutboundRequest,
} from "../dataset/messages";

export type DecodedFrame =
  | { ok: true; frame: InboundFrame }
  | { ok: false; reason: string };

/** Tags a request with its correlation id and serializes it. */
export function encodeFrame(request: OutboundRequest, reqId: number): string {
  const frame: OutboundFrame = { ...request, req_id: reqId };
  return JSON.stringify(frame);
}

/**
 * Parses and validates an inbound frame. Malformed JSON, unknown frame types
 * and payloads of the wrong shape come back as `{ ok: false }`.
 */
export function decodeFrame(raw: string): DecodedFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${error}` };
  }

  const parsed = InboundFrameSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return {
      ok: false,
      reason: `invalid frame${where}: ${issue ? issue.message : "unknown"}`,
    };
  }
  return { ok: true, frame: parsed.data };
}
