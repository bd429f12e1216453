import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";

function getBearerToken(req: Request) {
  const h = String(req.headers.authorization || "");
  if (h.startsWith("Bearer ")) return h.slice(7);
  return null;
}

export function issueToken(userId: number, secret: string, ttlSeconds = 900) {
  return jwt.sign({ userId }, secret, { expiresIn: ttlSeconds });
}

/**
 * Bearer JWT carrying { userId }. Sets req.userId or answers 401.
 */
export function requireAuth(secret: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = getBearerToken(req);
    if (!token) return res.status(401).json({ error: "Missing token" });

    try {
      const payload = jwt.verify(token, secret);
      const userId = typeof payload === "object" ? Number(payload.userId) : NaN;
      if (!Number.isFinite(userId)) return res.status(401).json({ error: "Invalid token" });

      req.userId = userId;
      return next();
    } catch {
      return res.status(401).json({ error: "Invalid token" });
    }
  };
}

declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}
