import { InternalServerError } from "../../../../packages/protocol/src/errors.js";
import type { Response } from "../../../../packages/protocol/src/types.js";

/**
 * Handle SUBSCRIBE
 *
 * Forwarding to subscribers is not offered; the request is parsed in full
 * and then refused.
 */
export async function handleSubscribe(): Promise<Response> {
  throw new InternalServerError("SUBSCRIBE is not supported");
}
