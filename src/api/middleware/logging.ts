import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import { createLogger } from "../../utils/logger";

const logger = createLogger("http");

export function loggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const header = req.headers["x-request-id"];
  const reqId = typeof header === "string" && header.length > 0 ? header : randomUUID();
  res.locals.requestId = reqId;
  res.setHeader("x-request-id", reqId);

  res.on("finish", () => {
    logger.info("http_request", {
      reqId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      ms: Date.now() - start,
      len: res.getHeader("content-length") || 0,
    });
  });
  next();
}
