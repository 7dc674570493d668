import type { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";

export const SESSION_HEADER = "x-session-id";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Picks up the client's session id or issues a new one; each session owns its repository list
 */
export function sessionMiddleware(req: Request, res: Response, next: NextFunction): void {
  const clientSessionId = req.header(SESSION_HEADER)?.trim();
  const sessionId =
    clientSessionId && SESSION_ID_PATTERN.test(clientSessionId) ? clientSessionId : uuidv4();

  res.locals.sessionId = sessionId;
  res.setHeader(SESSION_HEADER, sessionId);
  next();
}

export function sessionIdOf(res: Response): string {
  const sessionId: unknown = res.locals.sessionId;
  if (typeof sessionId !== "string") {
    throw new Error("Session middleware is not installed");
  }
  return sessionId;
}
