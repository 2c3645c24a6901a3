import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { createServer, type Server } from "http";
import {
  createSessionRequestSchema,
  joinGoogleMeetRequestSchema,
  type CreateSessionRequest,
  type JoinGoogleMeetRequest,
  type MeetingMetadata,
} from "@shared/schema";
import type { ArchiveStore } from "./archive";
import { log } from "./logger";
import { apiErrorHandler, validateBody } from "./middleware/apiValidation";
import type { SessionResult } from "./pipeline/coordinator";
import type { MeetingSession, SessionRegistry } from "./sessions/sessionRegistry";
import { setupAudioWebSocket, streamPathFor } from "./ws/audioIngress";

export interface RouteServices {
  registry: SessionRegistry;
  archive?: ArchiveStore;
  healthHandler: RequestHandler;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function sessionResultBody(result: SessionResult) {
  if (result.status === "empty") {
    return {
      status: result.status,
      sessionId: result.sessionId,
      failure: { name: result.failure.name, message: result.failure.message },
    };
  }
  return {
    status: result.status,
    sessionId: result.sessionId,
    transcript: result.transcript,
    summary: result.summary,
    failure:
      result.status === "failed"
        ? { name: result.failure.name, message: result.failure.message }
        : null,
  };
}

function createdBody(session: MeetingSession) {
  return {
    sessionId: session.id,
    streamPath: streamPathFor(session.id),
    status: session.pipeline.state,
  };
}

/**
 * Mounts the session API on `app`. Returns the HTTP server with the audio
 * WebSocket attached.
 */
export function registerRoutes(app: Express, services: RouteServices): Server {
  const { registry, archive } = services;

  function findSession(req: Request, res: Response): MeetingSession | null {
    const session = registry.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: "Session not found" });
      return null;
    }
    return session;
  }

  async function startSession(metadata: MeetingMetadata, res: Response): Promise<void> {
    const session = await registry.create(metadata);
    res.status(201).json(createdBody(session));
  }

  app.get("/api/health", services.healthHandler);

  // ============================================
  // SESSIONS
  // ============================================

  app.post(
    "/api/sessions",
    validateBody(createSessionRequestSchema),
    asyncRoute(async (req, res) => {
      const body: CreateSessionRequest = req.body;
      await startSession(
        { meetingUrl: body.meetingUrl, platform: body.platform, ...(body.title ? { title: body.title } : {}) },
        res
      );
    })
  );

  // Join endpoint kept for meeting bots that only know Google Meet links
  app.post(
    "/api/join/google-meet",
    validateBody(joinGoogleMeetRequestSchema),
    asyncRoute(async (req, res) => {
      const body: JoinGoogleMeetRequest = req.body;
      log(`Join request for Google Meet ${body.meeting_url}`, "express");
      await startSession({ meetingUrl: body.meeting_url, platform: "google_meet" }, res);
    })
  );

  app.get("/api/sessions", (_req, res) => {
    res.json({ sessions: registry.list() });
  });

  app.get("/api/sessions/:id", (req, res) => {
    const session = findSession(req, res);
    if (!session) return;
    res.json(session.pipeline.status());
  });

  app.get(
    "/api/sessions/:id/transcript",
    asyncRoute(async (req, res) => {
      const session = registry.get(req.params.id);
      if (session) {
        res.json(session.pipeline.snapshot());
        return;
      }
      const archived = archive ? await archive.latestSnapshot(req.params.id) : null;
      if (!archived) {
        res.status(404).json({ error: "Session not found" });
        return;
      }
      res.json(archived);
    })
  );

  app.get(
    "/api/sessions/:id/summary",
    asyncRoute(async (req, res) => {
      const session = registry.get(req.params.id);
      const summary =
        session?.result && session.result.status !== "empty"
          ? session.result.summary
          : archive
            ? await archive.getSummary(req.params.id)
            : null;
      if (!summary) {
        res.status(404).json({ error: "Summary not available" });
        return;
      }
      res.json(summary);
    })
  );

  app.post(
    "/api/sessions/:id/stop",
    asyncRoute(async (req, res) => {
      const result = await registry.stop(req.params.id);
      if (!result) {
        res.status(404).json({ error: "Session not found" });
        return;
      }
      res.json(sessionResultBody(result));
    })
  );

  app.use(apiErrorHandler);

  const httpServer = createServer(app);
  setupAudioWebSocket(httpServer, registry);
  return httpServer;
}
