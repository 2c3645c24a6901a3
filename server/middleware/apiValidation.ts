import type { Request, Response, NextFunction } from "express";
import { z, type ZodSchema } from "zod";
import { log } from "../logger";

/**
 * Middleware to validate request body against a Zod schema
 */
export function validateBody<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const validated: z.infer<T> = schema.parse(req.body);
      req.body = validated;
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          error: "Validation failed",
          details: error.errors.map((err) => ({
            path: err.path.join("."),
            message: err.message,
          })),
        });
        return;
      }
      res.status(400).json({
        error: "Invalid request body",
      });
    }
  };
}

/**
 * Standard error response format
 */
export interface ApiError {
  error: string;
  message: string;
  timestamp: string;
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) {
      return candidate;
    }
  }
  return 500;
}

/**
 * Standardized error handler
 */
export function apiErrorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const status = statusOf(err);
  const error = err instanceof Error ? err : new Error(String(err));
  log(`${req.method} ${req.path} failed: ${error.message}`, "express", status >= 500 ? "error" : "warn");

  const body: ApiError = {
    error: error.name,
    message: error.message || "Internal Server Error",
    timestamp: new Date().toISOString(),
  };
  res.status(status).json(body);
}
