// src/routes/eventsRoute.ts
import { Router, type Response } from "express";
import { z } from "zod";
import { requireAuth } from "../middleware/auth";
import { AttendanceForbiddenError, canUpdateAttendance, mostLikelyGoing, updateAttendance } from "../services/attendance";
import type { EventService } from "../services/event.service";
import { EventValidationError } from "../services/postEvent";
import type { EventRepository, InviteeRepository } from "../services/types";

export const ContentItemSchema = z.object({
  id: z.number().int().positive(),
  topicId: z.number().int().positive(),
  topicTitle: z.string(),
  postNumber: z.number().int().positive(),
  userId: z.number().int(),
  authorName: z.string().min(1),
  isFirstPost: z.boolean(),
  raw: z.string(),
});

export const AttendanceSchema = z.object({
  status: z.enum(["going", "interested", "not_going"]),
});

export type EventsRouteOptions = {
  service: EventService;
  events: EventRepository;
  invitees: InviteeRepository;
  jwtSecret: string;
  displayedInviteesLimit: number;
  now?: () => Date;
};

function parsePostId(raw: string) {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

function sendError(res: Response, err: unknown, what: string) {
  if (err instanceof EventValidationError) {
    return res.status(422).json({ error: "Invalid event", errors: err.errors });
  }
  if (err instanceof AttendanceForbiddenError) {
    return res.status(403).json({ error: err.message });
  }
  console.error(`[EVENT] ${what} failed:`, err);
  return res.status(500).json({ error: `Failed to ${what}` });
}

/**
 * GET /api/events/upcoming?limit=n
 * Visible events that have not started yet, soonest first.
 */
export function makeUpcomingRouter(opts: Pick<EventsRouteOptions, "events" | "jwtSecret" | "now">) {
  const router = Router();
  router.use(requireAuth(opts.jwtSecret));

  router.get("/upcoming", async (req, res) => {
    const rawLimit = req.query.limit;
    const limit = typeof rawLimit === "string" && rawLimit ? Number(rawLimit) : 20;
    if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
      return res.status(400).json({ error: "Invalid limit" });
    }

    try {
      const now = opts.now ? opts.now() : new Date();
      const items = await opts.events.listUpcoming(now, limit);
      return res.json({ items });
    } catch (err) {
      return sendError(res, err, "load upcoming events");
    }
  });

  return router;
}

/**
 * Mounted at /api/posts
 */
export function makeEventsRouter(opts: EventsRouteOptions) {
  const router = Router();
  const attendanceDeps = { invitees: opts.invitees, now: opts.now };

  router.use(requireAuth(opts.jwtSecret));

  /**
   * POST /api/posts/:postId/event
   * body: the post (ContentItem); re-reads its [event] markup
   */
  router.post("/:postId/event", async (req, res) => {
    const userId = req.userId;
    if (!userId) return res.status(401).json({ error: "Unauthorized" });

    const postId = parsePostId(req.params.postId);
    if (!postId) return res.status(400).json({ error: "Invalid postId" });

    const parsed = ContentItemSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid post", issues: parsed.error.issues });
    }
    if (parsed.data.id !== postId) return res.status(400).json({ error: "postId mismatch" });
    if (parsed.data.userId !== userId) return res.status(403).json({ error: "Only the author can do this" });

    try {
      const existing = await opts.events.findById(postId);
      if (existing && existing.ownerId !== userId) {
        return res.status(403).json({ error: "Only the author can do this" });
      }

      const event = await opts.service.createOrUpdateFromSource(parsed.data);
      return res.json({ event });
    } catch (err) {
      return sendError(res, err, "update event");
    }
  });

  /**
   * GET /api/posts/:postId/event
   */
  router.get("/:postId/event", async (req, res) => {
    const userId = req.userId;
    if (!userId) return res.status(401).json({ error: "Unauthorized" });

    const postId = parsePostId(req.params.postId);
    if (!postId) return res.status(400).json({ error: "Invalid postId" });

    try {
      const event = await opts.events.findVisible(postId);
      if (!event) return res.status(404).json({ error: "Event not found" });

      const canUpdate = await canUpdateAttendance(attendanceDeps, event, userId);
      return res.json({ event, canUpdateAttendance: canUpdate });
    } catch (err) {
      return sendError(res, err, "load event");
    }
  });

  /**
   * GET /api/posts/:postId/event/going?limit=n
   */
  router.get("/:postId/event/going", async (req, res) => {
    const userId = req.userId;
    if (!userId) return res.status(401).json({ error: "Unauthorized" });

    const postId = parsePostId(req.params.postId);
    if (!postId) return res.status(400).json({ error: "Invalid postId" });

    const rawLimit = req.query.limit;
    const limit = typeof rawLimit === "string" && rawLimit ? Number(rawLimit) : opts.displayedInviteesLimit;
    if (!Number.isInteger(limit) || limit < 0) return res.status(400).json({ error: "Invalid limit" });

    try {
      const event = await opts.events.findVisible(postId);
      if (!event) return res.status(404).json({ error: "Event not found" });

      const items = await mostLikelyGoing(attendanceDeps, event, userId, limit);
      return res.json({ items });
    } catch (err) {
      return sendError(res, err, "load attendees");
    }
  });

  /**
   * POST /api/posts/:postId/event/attendance
   * body: { status: "going" | "interested" | "not_going" }
   */
  router.post("/:postId/event/attendance", async (req, res) => {
    const userId = req.userId;
    if (!userId) return res.status(401).json({ error: "Unauthorized" });

    const postId = parsePostId(req.params.postId);
    if (!postId) return res.status(400).json({ error: "Invalid postId" });

    const parsed = AttendanceSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "Invalid attendance status" });

    try {
      const event = await opts.events.findVisible(postId);
      if (!event) return res.status(404).json({ error: "Event not found" });

      const invitee = await updateAttendance(attendanceDeps, event, userId, parsed.data.status);
      return res.json({ ok: true, invitee });
    } catch (err) {
      return sendError(res, err, "update attendance");
    }
  });

  /**
   * POST /api/posts/:postId/event/reconcile
   * body: the post (ContentItem); owner only
   */
  router.post("/:postId/event/reconcile", async (req, res) => {
    const userId = req.userId;
    if (!userId) return res.status(401).json({ error: "Unauthorized" });

    const postId = parsePostId(req.params.postId);
    if (!postId) return res.status(400).json({ error: "Invalid postId" });

    const parsed = ContentItemSchema.safeParse(req.body);
    if (!parsed.success || parsed.data.id !== postId) {
      return res.status(400).json({ error: "Invalid post" });
    }

    try {
      const event = await opts.events.findVisible(postId);
      if (!event) return res.status(404).json({ error: "Event not found" });
      if (event.ownerId !== userId) return res.status(403).json({ error: "Only the author can do this" });

      const result = await opts.service.reconcileInvitees(event, parsed.data);
      return res.json(result);
    } catch (err) {
      return sendError(res, err, "reconcile invitees");
    }
  });

  return router;
}
