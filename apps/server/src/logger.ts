import type { NextFunction, Request, Response } from "express";
import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import { validateEnv } from "@shared/env";
import type { Env } from "@shared/env";

/** Keeps the first six and last four characters of a wallet address. */
export function maskWalletAddress(value: unknown): unknown {
  if (typeof value !== "string" || value.length <= 12) return value;
  return `${value.slice(0, 6)}...${value.slice(-4)}`;
}

export function createLogger(env: Pick<Env, "LOG_LEVEL" | "NODE_ENV">, destination?: DestinationStream): Logger {
  const options: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: "trade-journal", env: env.NODE_ENV },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["walletAddress", "*.walletAddress"],
      censor: maskWalletAddress,
    },
  };

  if (destination) {
    return pino(options, destination);
  }
  if (env.NODE_ENV === "development") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,service,env",
        },
      },
    });
  }
  return pino(options);
}

export const logger = createLogger(validateEnv(process.env));

export function createHttpLogger() {
  const httpLog = logger.child({ module: "http" });

  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      const entry = {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: Date.now() - start,
        userAgent: req.headers["user-agent"],
      };

      if (res.statusCode >= 500) {
        httpLog.error(entry, "HTTP request error");
      } else if (res.statusCode >= 400) {
        httpLog.warn(entry, "HTTP request warning");
      } else {
        httpLog.debug(entry, "HTTP request");
      }
    });
    next();
  };
}
