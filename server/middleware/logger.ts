import type { RequestHandler } from 'express';

// Request log lines in the "<-- GET /path" / "--> GET /path 200 3ms" shape.
export function requestLogger(log: (line: string) => void = console.log): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    log(`<-- ${req.method} ${req.originalUrl}`);
    res.on('finish', () => {
      log(`--> ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`);
    });
    next();
  };
}
