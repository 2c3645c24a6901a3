import type { Request, Response } from "express";
import { CircuitState, getAllCircuitBreakers } from "../../lib/reliability";
import type { SessionRegistry } from "../sessions/sessionRegistry";

interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  checks: {
    archive: {
      status: "ok" | "error" | "disabled";
      error?: string;
    };
    engines: {
      speechToText: string;
      speakerRecognition: string;
    };
    circuitBreakers: Record<string, CircuitState>;
    sessions: {
      total: number;
      active: number;
    };
    memory: {
      used: number;
      total: number;
      percentage: number;
    };
  };
}

export interface HealthCheckDependencies {
  registry: SessionRegistry;
  engines: { speechToText: string; speakerRecognition: string };
  /** Throws when the archive cannot be queried; absent when archiving is off */
  pingArchive?: () => void;
}

/**
 * Comprehensive health check endpoint
 * GET /api/health
 */
export function createHealthCheckHandler(deps: HealthCheckDependencies) {
  return (_req: Request, res: Response): void => {
    const memUsage = process.memoryUsage();
    const breakers: Record<string, CircuitState> = {};
    for (const [name, breaker] of getAllCircuitBreakers()) {
      breakers[name] = breaker.currentState;
    }

    const health: HealthStatus = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || "1.0.0",
      environment: process.env.NODE_ENV || "development",
      checks: {
        archive: { status: deps.pingArchive ? "ok" : "disabled" },
        engines: deps.engines,
        circuitBreakers: breakers,
        sessions: {
          total: deps.registry.size,
          active: deps.registry.activeCount,
        },
        memory: {
          used: Math.round(memUsage.heapUsed / 1024 / 1024),
          total: Math.round(memUsage.heapTotal / 1024 / 1024),
          percentage: Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100),
        },
      },
    };

    if (deps.pingArchive) {
      try {
        deps.pingArchive();
      } catch (error) {
        health.checks.archive.status = "error";
        health.checks.archive.error = error instanceof Error ? error.message : "Unknown error";
      }
    }

    if (health.checks.archive.status === "error") {
      health.status = "unhealthy";
    } else if (
      Object.values(breakers).some((state) => state === CircuitState.OPEN) ||
      health.checks.memory.percentage > 90
    ) {
      health.status = "degraded";
    }

    const statusCode = health.status === "unhealthy" ? 503 : 200;
    res.status(statusCode).json(health);
  };
}
