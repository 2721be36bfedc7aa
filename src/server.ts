// Interview Dialogue Engine - WebSocket Handler and Express Server
//
// Two transports over the same SessionManager:
//   WebSocket: one interview per connection (start_interview / submit_answer / cancel_interview)
//   HTTP JSON: /api/sessions routes for request/response clients
//
// Session data lives in server memory only. No database, no files written.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { SessionManager } from "./session-manager.js";
import { parseJobConfig } from "./job-config.js";
import {
  TERMINAL_PHASES,
  type ClientMessage,
  type InterviewConfig,
  type ServerMessage,
  type SessionListener,
  type TurnResult,
} from "./types.js";
import { ConfigInvalidError, InterviewError, isRecoverable, type InterviewErrorCode } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { errorMessage } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** HTTP status for each error code a route can surface. */
const STATUS_BY_CODE: Readonly<Record<InterviewErrorCode, number>> = {
  CONFIG_INVALID: 400,
  SESSION_NOT_FOUND: 404,
  SESSION_ALREADY_COMPLETED: 409,
  NO_PENDING_QUESTION: 409,
  SESSION_LIMIT_REACHED: 503,
  JUDGE_UNAVAILABLE: 502,
  JUDGE_TIMEOUT: 504,
  JUDGE_MALFORMED_RESPONSE: 502,
  INTERNAL_INVARIANT_VIOLATION: 500,
};

const MAX_BODY_SIZE = "256kb";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  connectionId: number;
  sessionId: string | null;
  /** A start_interview is between its first await and the session being recorded. */
  starting: boolean;
  closed: boolean;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Interview used when a client does not send its own job configuration. */
  getInterviewConfig: () => InterviewConfig | Promise<InterviewConfig>;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port (0 for an ephemeral port). Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    getInterviewConfig,
    logger = createConsoleLogger("Server"),
    sessionManager = new SessionManager({ logger }),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", activeSessions: sessionManager.activeSessionCount });
  });

  registerSessionRoutes(app, sessionManager, getInterviewConfig);
  app.use(errorHandler(logger));

  const wss = new WebSocketServer({ server: httpServer });
  let nextConnectionId = 1;

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, nextConnectionId++, sessionManager, getInterviewConfig, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── HTTP Routes ────────────────────────────────────────────────────────────────

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected handler promises; pass them to next(). */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function registerSessionRoutes(
  app: Express,
  sessionManager: SessionManager,
  getInterviewConfig: () => InterviewConfig | Promise<InterviewConfig>,
): void {
  // Body: optional job configuration in job-file format; the server default otherwise.
  app.post(
    "/api/sessions",
    asyncRoute(async (req, res) => {
      const body: unknown = req.body;
      const config =
        isRecord(body) && body.questions !== undefined ? parseJobConfig(body) : await getInterviewConfig();
      const result = await sessionManager.createSession(config);
      res.status(201).json(withReport(sessionManager, result));
    }),
  );

  app.post(
    "/api/sessions/:id/answers",
    asyncRoute(async (req, res) => {
      const body: unknown = req.body;
      if (!isRecord(body) || typeof body.text !== "string") {
        res.status(400).json({ error: { code: "INVALID_REQUEST", message: 'Body must be { "text": string }' } });
        return;
      }
      const result = await sessionManager.submitAnswer(req.params.id, body.text);
      res.json(withReport(sessionManager, result));
    }),
  );

  app.get("/api/sessions/:id", (req, res, next) => {
    try {
      res.json(sessionManager.getState(req.params.id));
    } catch (err) {
      next(err);
    }
  });

  app.delete("/api/sessions/:id", (req, res, next) => {
    try {
      res.json(sessionManager.cancelSession(req.params.id));
    } catch (err) {
      next(err);
    }
  });
}

/** Adds the report and summary to a completed turn. */
function withReport(
  sessionManager: SessionManager,
  result: TurnResult,
): TurnResult & { report?: string | null; summary?: string | null } {
  if (result.outcome !== "completed") return result;
  const review = sessionManager.getState(result.sessionId).review;
  return { ...result, report: review?.report ?? null, summary: review?.summary.text ?? null };
}

function errorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof InterviewError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) {
        logger.error(`Request failed (${err.code}): ${err.message}`);
      }
      res.status(status).json({
        error: {
          code: err.code,
          message: err.message,
          ...(err instanceof ConfigInvalidError ? { details: err.details } : {}),
        },
      });
      return;
    }
    // express.json() parse failures
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "INVALID_REQUEST", message: err.message } });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  connectionId: number,
  sessionManager: SessionManager,
  getInterviewConfig: () => InterviewConfig | Promise<InterviewConfig>,
  logger: Logger,
): void {
  const connState: ConnectionState = { connectionId, sessionId: null, starting: false, closed: false };
  logger.info(`New WebSocket connection #${connectionId}`);

  ws.on("message", (data: Buffer | string, isBinary: boolean) => {
    if (isBinary) {
      sendMessage(ws, {
        type: "error",
        code: "INVALID_MESSAGE",
        message: "Binary frames are not supported; send JSON text messages.",
        recoverable: true,
      });
      return;
    }
    const text = typeof data === "string" ? data : data.toString("utf-8");
    const message = parseClientMessage(text);
    if (!message) {
      sendMessage(ws, {
        type: "error",
        code: "INVALID_MESSAGE",
        message: `Unrecognized message: ${text.slice(0, 100)}`,
        recoverable: true,
      });
      return;
    }
    handleClientMessage(ws, message, connState, sessionManager, getInterviewConfig, logger);
  });

  ws.on("close", () => {
    logger.info(`WebSocket #${connectionId} closed, session ${connState.sessionId ?? "(none)"}`);
    cleanupConnection(connState, sessionManager, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error on #${connectionId}: ${err.message}`);
    cleanupConnection(connState, sessionManager, logger);
  });
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

/** Validates an incoming text frame. Returns null for anything that is not a ClientMessage. */
export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  switch (parsed.type) {
    case "start_interview":
      return { type: "start_interview" };
    case "cancel_interview":
      return { type: "cancel_interview" };
    case "submit_answer":
      return typeof parsed.text === "string" ? { type: "submit_answer", text: parsed.text } : null;
    default:
      return null;
  }
}

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  getInterviewConfig: () => InterviewConfig | Promise<InterviewConfig>,
  logger: Logger,
): void {
  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      logger.warn(`WebSocket #${connState.connectionId} (${message.type}): ${errorMessage(err)}`);
      sendError(ws, err);
    });
  };

  switch (message.type) {
    case "start_interview":
      catchAsync(handleStartInterview(ws, connState, sessionManager, getInterviewConfig, logger));
      break;

    case "submit_answer":
      catchAsync(handleSubmitAnswer(ws, message.text, connState, sessionManager));
      break;

    case "cancel_interview":
      try {
        handleCancelInterview(connState, sessionManager);
      } catch (err) {
        sendError(ws, err);
      }
      break;

    default: {
      const exhaustiveCheck: never = message;
      logger.warn(`Unhandled client message ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

async function handleStartInterview(
  ws: WebSocket,
  connState: ConnectionState,
  sessionManager: SessionManager,
  getInterviewConfig: () => InterviewConfig | Promise<InterviewConfig>,
  logger: Logger,
): Promise<void> {
  if (connState.starting || (connState.sessionId && isLive(sessionManager, connState.sessionId))) {
    sendMessage(ws, {
      type: "error",
      code: "INTERVIEW_IN_PROGRESS",
      message: "An interview is already running on this connection.",
      recoverable: true,
    });
    return;
  }

  // Prompts and completion arrive as turn results; cancellation and failure can
  // happen outside a turn (idle eviction), so they come through the listener.
  const listener: SessionListener = {
    onCancelled: () => sendMessage(ws, { type: "interview_cancelled" }),
    onFailed: (_id, error) => sendMessage(ws, { type: "interview_failed", message: error.message }),
  };

  connState.starting = true;
  const result = await Promise.resolve()
    .then(() => getInterviewConfig())
    .then((config) => sessionManager.createSession(config, listener))
    .finally(() => {
      connState.starting = false;
    });

  if (connState.closed) {
    logger.info(`WebSocket #${connState.connectionId} closed while starting, cancelling session ${result.sessionId}`);
    if (isLive(sessionManager, result.sessionId)) {
      sessionManager.cancelSession(result.sessionId);
    }
    return;
  }
  connState.sessionId = result.sessionId;
  logger.info(`WebSocket #${connState.connectionId} started session ${result.sessionId}`);

  sendMessage(ws, { type: "session_started", sessionId: result.sessionId });
  sendTurnResult(ws, result, sessionManager);
}

async function handleSubmitAnswer(
  ws: WebSocket,
  text: string,
  connState: ConnectionState,
  sessionManager: SessionManager,
): Promise<void> {
  if (!connState.sessionId) {
    sendMessage(ws, {
      type: "error",
      code: "NO_SESSION",
      message: "Send start_interview before submitting answers.",
      recoverable: true,
    });
    return;
  }
  const result = await sessionManager.submitAnswer(connState.sessionId, text);
  sendTurnResult(ws, result, sessionManager);
}

function handleCancelInterview(connState: ConnectionState, sessionManager: SessionManager): void {
  if (!connState.sessionId) return;
  sessionManager.cancelSession(connState.sessionId);
}

function sendTurnResult(ws: WebSocket, result: TurnResult, sessionManager: SessionManager): void {
  if (result.outcome === "prompt" && result.prompt !== null) {
    sendMessage(ws, {
      type: "prompt",
      prompt: result.prompt,
      isFollowUp: result.isFollowUp,
      questionIndex: result.questionIndex,
    });
  } else if (result.outcome === "completed") {
    const review = sessionManager.getState(result.sessionId).review;
    sendMessage(ws, {
      type: "interview_complete",
      report: review?.report ?? null,
      summary: review?.summary.text ?? null,
    });
  }
}

function isLive(sessionManager: SessionManager, sessionId: string): boolean {
  if (!sessionManager.hasSession(sessionId)) return false;
  return !TERMINAL_PHASES.has(sessionManager.getState(sessionId).phase);
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function sendError(ws: WebSocket, err: unknown): void {
  sendMessage(ws, {
    type: "error",
    code: err instanceof InterviewError ? err.code : "INTERNAL_ERROR",
    message: errorMessage(err),
    recoverable: err instanceof InterviewError ? isRecoverable(err) : false,
  });
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

/** An interview abandoned by its connection is cancelled. */
function cleanupConnection(connState: ConnectionState, sessionManager: SessionManager, logger: Logger): void {
  connState.closed = true;
  const sessionId = connState.sessionId;
  connState.sessionId = null;
  if (!sessionId || !isLive(sessionManager, sessionId)) return;
  try {
    sessionManager.cancelSession(sessionId);
  } catch (err) {
    logger.warn(`Could not cancel session ${sessionId} on disconnect: ${errorMessage(err)}`);
  }
}
