import { describe, it, expect, beforeEach } from "vitest";
import {
  AttendanceForbiddenError,
  canUpdateAttendance,
  mostLikelyGoing,
  updateAttendance,
  type AttendanceDeps,
} from "./attendance";
import type { PostEventDoc } from "./types";
import { InMemoryInviteeRepository } from "../testing/inMemory";

const OWNER = 1;
const NOW = new Date("2030-05-01T12:00:00Z");

function event(overrides: Partial<PostEventDoc> = {}): PostEventDoc {
  return {
    id: 101,
    ownerId: OWNER,
    topicId: 7,
    status: "public",
    rawInvitees: [],
    startsAt: new Date("2030-05-01T18:00:00Z"),
    ...overrides,
  };
}

describe("canUpdateAttendance", () => {
  let invitees: InMemoryInviteeRepository;
  let deps: AttendanceDeps;

  beforeEach(() => {
    invitees = new InMemoryInviteeRepository();
    deps = { invitees, now: () => NOW };
  });

  it("lets anyone but the owner respond to a public event", async () => {
    expect(await canUpdateAttendance(deps, event(), 5)).toBe(true);
    expect(await canUpdateAttendance(deps, event(), OWNER)).toBe(false);
  });

  it("limits private events to people on the roster", async () => {
    await invitees.insertMany([{ postId: 101, userId: 5, status: null, notified: true }]);
    const ev = event({ status: "private" });

    expect(await canUpdateAttendance(deps, ev, 5)).toBe(true);
    expect(await canUpdateAttendance(deps, ev, 6)).toBe(false);
  });

  it("never allows responses on standalone events", async () => {
    await invitees.insertMany([{ postId: 101, userId: 5, status: null, notified: true }]);
    expect(await canUpdateAttendance(deps, event({ status: "standalone" }), 5)).toBe(false);
  });

  it("closes once the event is over", async () => {
    const later = { invitees, now: () => new Date("2030-05-01T18:00:01Z") };
    expect(await canUpdateAttendance(later, event(), 5)).toBe(false);

    const withEnd = event({ endsAt: new Date("2030-05-01T20:00:00Z") });
    expect(await canUpdateAttendance(later, withEnd, 5)).toBe(true);
    expect(
      await canUpdateAttendance({ invitees, now: () => new Date("2030-05-01T20:00:01Z") }, withEnd, 5)
    ).toBe(false);
  });
});

describe("mostLikelyGoing", () => {
  let invitees: InMemoryInviteeRepository;
  let deps: AttendanceDeps;

  beforeEach(async () => {
    invitees = new InMemoryInviteeRepository();
    deps = { invitees, now: () => NOW };
    await invitees.insertMany([
      { postId: 101, userId: 30, status: "not_going", notified: true },
      { postId: 101, userId: 20, status: null, notified: true },
      { postId: 101, userId: 12, status: "interested", notified: true },
      { postId: 101, userId: 11, status: "going", notified: true },
      { postId: 101, userId: 5, status: "interested", notified: true },
      { postId: 999, userId: 2, status: "going", notified: true },
    ]);
  });

  it("puts the viewer first, then the owner, then invitees by status and id", async () => {
    const list = await mostLikelyGoing(deps, event(), 40, 5);

    expect(list.map((i) => [i.userId, i.status])).toEqual([
      [40, null],
      [OWNER, "going"],
      [11, "going"],
      [5, "interested"],
      [12, "interested"],
    ]);
  });

  it("reuses the viewer's own row and skips it among the invitees", async () => {
    const list = await mostLikelyGoing(deps, event(), 5, 10);

    expect(list.map((i) => [i.userId, i.status])).toEqual([
      [5, "interested"],
      [OWNER, "going"],
      [11, "going"],
      [12, "interested"],
      [30, "not_going"],
      [20, null],
    ]);
  });

  it("leaves the viewer out when they cannot respond", async () => {
    const list = await mostLikelyGoing(deps, event({ status: "private" }), 40, 3);
    expect(list.map((i) => i.userId)).toEqual([OWNER, 11, 5]);
  });

  it("always includes the owner but never exceeds the limit", async () => {
    expect((await mostLikelyGoing(deps, event(), OWNER, 3)).map((i) => i.userId)).toEqual([OWNER, 11, 5]);
    expect((await mostLikelyGoing(deps, event(), 40, 1)).map((i) => i.userId)).toEqual([40]);
    expect(await mostLikelyGoing(deps, event(), 40, 0)).toEqual([]);
  });

  it("does not persist placeholders", async () => {
    await mostLikelyGoing(deps, event(), 40, 5);
    expect(await invitees.find(101, 40)).toBeNull();
    expect(await invitees.find(101, OWNER)).toBeNull();
  });
});

describe("updateAttendance", () => {
  it("records the response of an allowed user", async () => {
    const invitees = new InMemoryInviteeRepository();
    const deps = { invitees, now: () => NOW };

    const row = await updateAttendance(deps, event(), 5, "going");
    expect(row).toEqual({ postId: 101, userId: 5, status: "going", notified: true });

    await updateAttendance(deps, event(), 5, "not_going");
    expect((await invitees.find(101, 5))?.status).toBe("not_going");
    expect(invitees.rows).toHaveLength(1);
  });

  it("refuses users who cannot respond", async () => {
    const deps = { invitees: new InMemoryInviteeRepository(), now: () => NOW };
    await expect(updateAttendance(deps, event(), OWNER, "going")).rejects.toBeInstanceOf(
      AttendanceForbiddenError
    );
    await expect(updateAttendance(deps, event({ status: "private" }), 5, "going")).rejects.toBeInstanceOf(
      AttendanceForbiddenError
    );
  });
});
