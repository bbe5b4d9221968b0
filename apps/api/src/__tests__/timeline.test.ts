import { describe, expect, it } from "vitest";

import { NotFoundError } from "../server/errors.js";
import { TimelineStore } from "../server/timeline.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("TimelineStore", () => {
  const store = new TimelineStore(NOW);

  it("lists the ten newest events first", () => {
    const events = store.listEvents({ limit: 10 });

    expect(events.map((e) => e.id)).toEqual([7, 6, 8, 5, 9, 10, 11, 12, 4, 3]);
  });

  it("stamps events relative to the creation time", () => {
    expect(store.getEvent(7).timestamp).toBe("2026-03-01T11:50:00.000Z");
    expect(store.getEvent(1).timestamp).toBe("2026-02-27T12:00:00.000Z");
    expect(store.getEvent(2).timestamp).toBe("2026-02-28T07:00:00.000Z");
  });

  it("filters by exact type before limiting", () => {
    const audits = store.listEvents({ type: "Audit", limit: 5 });

    expect(audits.map((e) => e.id)).toEqual([6, 8, 5, 11, 12]);
    expect(audits.every((e) => e.type === "Audit")).toBe(true);
  });

  it("returns every match when the limit exceeds them", () => {
    expect(store.listEvents({ type: "Note", limit: 50 }).map((e) => e.id)).toEqual([
      7, 9, 10, 4, 2,
    ]);
  });

  it("treats an empty type as no filter", () => {
    expect(store.listEvents({ type: "", limit: 10 }).map((e) => e.id)).toEqual([
      7, 6, 8, 5, 9, 10, 11, 12, 4, 3,
    ]);
  });

  it("matches type case-sensitively", () => {
    expect(store.listEvents({ type: "note", limit: 10 })).toEqual([]);
  });

  it("finds an event by id", () => {
    expect(store.getEvent(3)).toMatchObject({
      id: 3,
      title: "Medication Administered",
      type: "Audit",
    });
  });

  it("throws not found for an unknown id", () => {
    expect(() => store.getEvent(99)).toThrow(NotFoundError);
    expect(() => store.getEvent(99)).toThrow("Timeline event not found");
  });
});
