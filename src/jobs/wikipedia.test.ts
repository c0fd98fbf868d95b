import axios, { AxiosHeaders } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { NotFoundError } from "../lib/errors";
import { makeAtomFeed, makeEntry } from "../test/fixtures";
import { parseFeedEntry } from "./parse";
import { loadEntryForToday, parseFeedXml, pickEntryForDate } from "./wikipedia";

const today = new Date(2026, 9, 18, 8, 0);

const xml = makeAtomFeed([
  makeEntry("2026-10-17T00:00:00Z", "<ul><li>1999: Gestern</li></ul>"),
  makeEntry("2026-10-18T00:00:00Z"),
]);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseFeedXml", () => {
  it("reads updated and the html summary of every entry", async () => {
    const entries = await parseFeedXml(xml);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toEqual({
      updated: "2026-10-17T00:00:00Z",
      summary: "<ul><li>1999: Gestern</li></ul>",
      title: "18. Oktober",
    });
    expect(parseFeedEntry(entries[1]).map((r) => r.year)).toEqual([1871, 1926, 955, 1990, 2001]);
  });

  it("skips entries whose timestamp has another format", async () => {
    const entries = await parseFeedXml(makeAtomFeed([makeEntry("2026-10-18")]));
    expect(entries).toEqual([]);
  });
});

describe("pickEntryForDate", () => {
  it("returns the entry dated today", () => {
    const entries = [makeEntry("2026-10-17T00:00:00Z"), makeEntry("2026-10-18T00:00:00Z")];
    expect(pickEntryForDate(entries, today)).toBe(entries[1]);
  });

  it("throws NotFoundError when no entry is dated today", () => {
    expect(() => pickEntryForDate([makeEntry("2026-10-17T00:00:00Z")], today)).toThrow(
      NotFoundError
    );
  });
});

describe("loadEntryForToday", () => {
  it("fetches the feed once and picks today's entry", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue({
      data: xml,
      status: 200,
      statusText: "OK",
      headers: {},
      config: { headers: new AxiosHeaders() },
    });

    const entry = await loadEntryForToday("https://feed.example.org/atom", today);
    expect(entry.updated).toBe("2026-10-18T00:00:00Z");
    expect(get).toHaveBeenCalledTimes(1);
    expect(get.mock.calls[0][0]).toBe("https://feed.example.org/atom");
  });
});
