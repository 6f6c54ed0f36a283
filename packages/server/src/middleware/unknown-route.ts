/**
 * Fallback for requests that match no route.
 *
 * Old or misconfigured relay clients probe endpoints this server does not
 * have; each such request is logged with enough detail to identify the
 * client, then answered with a JSON 404.
 */

import type { Request, Response } from "express";
import type { Logger } from "pino";

/** Headers that are never logged */
const REDACTED_HEADERS = new Set(["authorization", "cookie", "x-api-key"]);

/** Header values are clipped to this many characters */
const MAX_HEADER_LENGTH = 200;

/** Copy request headers for logging, minus credentials, values clipped */
export function loggableHeaders(req: Pick<Request, "headers">): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined || REDACTED_HEADERS.has(name.toLowerCase())) continue;
    const text = Array.isArray(value) ? value.join(", ") : value;
    headers[name] = text.slice(0, MAX_HEADER_LENGTH);
  }
  return headers;
}

export function createUnknownRouteHandler(
  logger: Logger,
): (req: Request, res: Response) => void {
  return (req, res) => {
    logger.info(
      {
        method: req.method,
        path: req.path,
        ip: req.ip,
        query: req.query,
        headers: loggableHeaders(req),
      },
      `Unknown endpoint: ${req.method} ${req.path}`,
    );

    res.status(404).json({ status: "error", error: "Not found" });
  };
}
