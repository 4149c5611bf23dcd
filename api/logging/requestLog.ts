import type express from "express";

import { createLogger } from "../../src/server/logging.ts";

const log = createLogger("api.request");

/** One line per finished response; health checks only show up with debug enabled. */
export function requestLog(): express.RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      const line = `Request ${req.method} ${req.originalUrl} - ${res.statusCode}`;
      const fields = { ms: Date.now() - startedAt };
      if (req.path === "/health") {
        log.debug(line, fields);
      } else {
        log.info(line, fields);
      }
    });
    next();
  };
}
