import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Logs one line per finished request:
 *   [http] Method=GET Path=/users Status=200 ProcessTime=0.004s
 */
export function requestLogger(tag = "http"): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const seconds = Number(process.hrtime.bigint() - start) / 1e9;
      console.log(
        `[${tag}] Method=${req.method} Path=${req.originalUrl.split("?")[0]} ` +
          `Status=${res.statusCode} ProcessTime=${seconds.toFixed(3)}s`
      );
    });
    next();
  };
}
