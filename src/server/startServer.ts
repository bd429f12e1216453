import express from "express";
import type { Server } from "http";
import { healthRoute } from "../routes/healthRoute";
import { makeEventsRouter, makeUpcomingRouter, type EventsRouteOptions } from "../routes/eventsRoute";

type ServerOptions = EventsRouteOptions & {
  port: number;
};

export function createApp(opts: EventsRouteOptions) {
  const app = express();
  app.use(express.json());

  app.use((req, _res, next) => {
    console.log(`[HTTP] ${req.method} ${req.originalUrl}`);
    next();
  });

  app.get("/health", healthRoute);
  app.use("/api/posts", makeEventsRouter(opts));
  app.use("/api/events", makeUpcomingRouter(opts));

  return app;
}

export function startServer(opts: ServerOptions): Server {
  const app = createApp(opts);

  return app.listen(opts.port, "0.0.0.0", () => {
    console.log(`Web server listening on port ${opts.port}`);
    console.log(`Health endpoint: /health`);
    console.log(`Events API: /api/posts/:postId/event`);
    console.log(`Upcoming events: /api/events/upcoming`);
  });
}
