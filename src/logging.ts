import pino, { type Logger } from "pino";
import type { Request, Response, NextFunction } from "express";

const level = process.env.LOG_LEVEL ?? "info";

// stderr keeps stdout clean for anything piping the process output
function createLogger(): Logger {
  const base = { service: "quote-stream-sim" };

  if (process.env.LOG_PRETTY === "false") {
    return pino({ level, base }, pino.destination(2));
  }

  const transport = pino.transport({
    target: "pino-pretty",
    options: {
      destination: 2,
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  });
  return pino({ level, base }, transport);
}

export const logger = createLogger();

// Typed child loggers for subsystems
export const logStream = logger.child({ subsystem: "stream" });
export const logIngest = logger.child({ subsystem: "ingest" });
export const logDb = logger.child({ subsystem: "database" });
export const logMarket = logger.child({ subsystem: "market-data" });
export const logRest = logger.child({ subsystem: "rest" });
export const logWs = logger.child({ subsystem: "ws" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}
