// src/routes/healthRoute.ts
import type { Request, Response } from "express";
import mongoose from "mongoose";

export function healthRoute(_req: Request, res: Response) {
  const mongoReady = mongoose.connection.readyState === 1;
  res.status(mongoReady ? 200 : 503).type("text/plain").send(mongoReady ? "OK" : "DB not ready");
}
