import type { FastifyReply } from "fastify";
import { isIpamError, type IpamErrorCode } from "../services/errors.js";

const STATUS_BY_CODE: Record<IpamErrorCode, number> = {
  SERVICE_NOT_FOUND: 404,
  SERVICE_EXISTS: 409,
  POOL_NOT_FOUND: 422,
  INVALID_POOL: 422,
  POOL_EXHAUSTED: 409,
  VERSION_CONFLICT: 409,
  PERSISTENCE_FAILED: 409,
  RECONCILE_ABORTED: 503,
};

/**
 * Turn an IPAM error into an error response. Anything else is rethrown
 * for fastify to log and answer with a 500.
 */
export function replyWithIpamError(reply: FastifyReply, err: unknown): { error: string; code: IpamErrorCode } {
  if (!isIpamError(err)) {
    throw err;
  }
  console.error(`Request failed with ${err.code}: ${err.message}`);
  reply.status(STATUS_BY_CODE[err.code]);
  return { error: err.message, code: err.code };
}
