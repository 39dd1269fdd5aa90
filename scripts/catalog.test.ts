import { describe, expect, it, vi } from "vitest";
import { Catalog } from "./catalog.js";
import { DuplicateUrlError, TrackNotFoundError } from "./errors.js";
import { makeTrack, RECESSIONAL } from "./testFixtures.js";

const pontchartrain = makeTrack({}, "pontchartrain.md");
const recessional = makeTrack(RECESSIONAL, "recessional.md");

function catalogOf(...tracks: ReturnType<typeof makeTrack>[]): Catalog {
  const catalog = new Catalog();
  tracks.forEach((track) => catalog.insert(track));
  return catalog;
}

describe("Catalog", () => {
  it("stores and retrieves tracks by url", () => {
    const catalog = catalogOf(pontchartrain, recessional);

    expect(catalog.size).toBe(2);
    expect(catalog.get("/tracks/recessional")).toBe(recessional);
    expect(catalog.has("/tracks/pontchartrain")).toBe(true);
    expect(catalog.find("/tracks/missing")).toBeUndefined();
  });

  it("throws NotFound for an unknown url", () => {
    expect(() => new Catalog().get("/tracks/missing")).toThrow(TrackNotFoundError);
  });

  it("keeps insertion order", () => {
    const catalog = catalogOf(recessional, pontchartrain);
    expect([...catalog.all()].map((t) => t.title)).toEqual(["Recessional", "Pontchartrain"]);
  });

  it("rejects a duplicate url and keeps the first track", () => {
    const catalog = catalogOf(pontchartrain);
    const other = makeTrack({ artist: "Another Artist" }, "other.md");

    expect(() => catalog.insert(other)).toThrow(DuplicateUrlError);
    expect(() => catalog.insert(other)).toThrow(
      "DuplicateURL: /tracks/pontchartrain from other.md is already taken by pontchartrain.md",
    );
    expect(catalog.size).toBe(1);
    expect(catalog.get("/tracks/pontchartrain").artist).toBe("Vienna Teng");
  });

  it("groups by album and artist with exact matching", () => {
    const other = makeTrack({ title: "Gravity", album: "Warm Strangers" }, "gravity.md");
    const catalog = catalogOf(pontchartrain, other, recessional);

    expect([...catalog.byAlbum("Dreaming Through the Noise")].map((t) => t.title)).toEqual([
      "Pontchartrain",
      "Recessional",
    ]);
    expect([...catalog.byAlbum("dreaming through the noise")]).toEqual([]);
    expect([...catalog.byArtist("Vienna Teng")]).toHaveLength(3);
  });

  it("recomputes groupings on every iteration", () => {
    const catalog = catalogOf(pontchartrain);
    const album = catalog.byAlbum("Dreaming Through the Noise");

    expect([...album]).toHaveLength(1);
    expect([...album]).toHaveLength(1);
    catalog.insert(recessional);
    expect([...album]).toHaveLength(2);
  });

  it("removes a track and notifies subscribers", () => {
    const catalog = catalogOf(pontchartrain, recessional);
    const listener = vi.fn();
    catalog.subscribe(listener);

    expect(catalog.remove("/tracks/pontchartrain")).toBe(pontchartrain);
    expect(catalog.has("/tracks/pontchartrain")).toBe(false);
    expect(listener).toHaveBeenCalledWith({ type: "remove", url: "/tracks/pontchartrain" });
    expect(() => catalog.remove("/tracks/pontchartrain")).toThrow(TrackNotFoundError);
  });

  it("stops notifying after unsubscribe", () => {
    const catalog = new Catalog();
    const listener = vi.fn();
    const unsubscribe = catalog.subscribe(listener);

    catalog.insert(pontchartrain);
    unsubscribe();
    catalog.insert(recessional);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ type: "insert", track: pontchartrain });
  });

  it("replaces a track by removing and re-inserting it", () => {
    const catalog = catalogOf(pontchartrain, recessional);
    const updated = makeTrack({ comments: "Remastered" }, "pontchartrain.md");

    catalog.replace("/tracks/pontchartrain", updated);

    expect(catalog.get("/tracks/pontchartrain").comments).toBe("Remastered");
    expect([...catalog.all()].map((t) => t.title)).toEqual(["Recessional", "Pontchartrain"]);
  });

  it("refuses a replacement that collides with another track", () => {
    const catalog = catalogOf(pontchartrain, recessional);
    const renamed = makeTrack({ title: "Recessional" }, "renamed.md");

    expect(() => catalog.replace("/tracks/pontchartrain", renamed)).toThrow(DuplicateUrlError);
    expect(catalog.size).toBe(2);
    expect(catalog.get("/tracks/pontchartrain")).toBe(pontchartrain);
  });
});
