/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * catalog.test.ts: Tests for channel catalog parsing, caching and lookup.
 */
import { findChannel, loadCatalog, parseCatalog, selectStreamUrl, suggestChannels } from "../index.js";
import type { Channel } from "../../types/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const CATALOG_URL = "https://example.com/channels.json";

function channel(id: string, title: string, playlists: Channel["playlists"] = []): Channel {

  return { description: "", dj: "", genre: "", id, listeners: 0, playlists, title };
}

const CHANNELS = [ channel("groovesalad", "Groove Salad"), channel("gsclassic", "Groove Salad Classic"), channel("dronezone", "Drone Zone") ];

describe("parseCatalog", () => {

  it("keeps entries with an id and a title", () => {

    const channels = parseCatalog({ channels: [

      {
        genre: "ambient|electronica",
        id: "groovesalad",
        image: "https://example.com/gs120.png",
        largeimage: "https://example.com/gs512.png",
        listeners: "1234",
        playlists: [ { format: "mp3", quality: "highest", url: "https://example.com/gs.pls" }, { format: "aac" } ],
        title: "Groove Salad"
      },
      { id: "", title: "Nameless" },
      "junk",
      { id: "lush", listeners: 12, title: "Lush" }
    ] });

    expect(channels).toEqual([

      {
        description: "",
        dj: "",
        genre: "ambient|electronica",
        id: "groovesalad",
        image: "https://example.com/gs512.png",
        listeners: 1234,
        playlists: [{ format: "mp3", quality: "highest", url: "https://example.com/gs.pls" }],
        title: "Groove Salad"
      },
      { description: "", dj: "", genre: "", id: "lush", listeners: 12, playlists: [], title: "Lush" }
    ]);
  });

  it("rejects data without a channels array", () => {

    expect(() => parseCatalog({ stations: [] })).toThrow("The channel list does not contain a channels array.");
    expect(() => parseCatalog(null)).toThrow("The channel list does not contain a channels array.");
  });
});

describe("findChannel", () => {

  it("matches ids exactly, then ids and titles ignoring case", () => {

    expect(findChannel(CHANNELS, "groovesalad")?.id).toBe("groovesalad");
    expect(findChannel(CHANNELS, " DRONE ZONE ")?.id).toBe("dronezone");
  });

  it("falls back to a fuzzy match", () => {

    expect(findChannel(CHANNELS, "classic")?.id).toBe("gsclassic");
    expect(findChannel(CHANNELS, "dronzone")?.id).toBe("dronezone");
    expect(findChannel(CHANNELS, "zzzzzzzz")).toBeUndefined();
  });

  it("suggests close titles for unknown names", () => {

    expect(suggestChannels(CHANNELS, "drone zones", 1)).toEqual(["Drone Zone"]);
  });
});

describe("selectStreamUrl", () => {

  const playlists = [

    { format: "aac", quality: "highest", url: "https://example.com/a.pls" },
    { format: "mp3", quality: "highest", url: "https://example.com/b.pls" },
    { format: "aacp", quality: "low", url: "https://example.com/c.pls" }
  ];

  it("prefers mp3 at the requested quality", () => {

    expect(selectStreamUrl(channel("x", "X", playlists), "highest")).toBe("https://example.com/b.pls");
    expect(selectStreamUrl(channel("x", "X", playlists), "low")).toBe("https://example.com/c.pls");
  });

  it("falls back to the first playlist", () => {

    expect(selectStreamUrl(channel("x", "X", playlists), "high")).toBe("https://example.com/a.pls");
    expect(selectStreamUrl(channel("x", "X"), "high")).toBeUndefined();
  });
});

describe("loadCatalog", () => {

  const body = JSON.stringify({ channels: [{ id: "lush", title: "Lush" }] });
  let cachePath: string;
  let dir: string;

  beforeEach(async () => {

    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "icytune-catalog-"));
    cachePath = path.join(dir, "channels.json");
  });

  afterEach(async () => {

    await fs.promises.rm(dir, { force: true, recursive: true });
  });

  it("fetches and caches the catalog when there is no cache", async () => {

    const fetchStub: jest.MockedFunction<typeof fetch> = jest.fn();

    fetchStub.mockResolvedValue(new Response(body));

    const channels = await loadCatalog({ cachePath, cacheTtl: 60000, fetch: fetchStub, url: CATALOG_URL });

    expect(channels.map((entry) => entry.id)).toEqual(["lush"]);
    expect(fetchStub).toHaveBeenCalledWith(CATALOG_URL, expect.objectContaining({ signal: expect.any(AbortSignal) }));
    expect(await fs.promises.readFile(cachePath, "utf-8")).toBe(body);
  });

  it("uses a fresh cache without fetching", async () => {

    const fetchStub: jest.MockedFunction<typeof fetch> = jest.fn();

    await fs.promises.writeFile(cachePath, body, "utf-8");

    const channels = await loadCatalog({ cachePath, cacheTtl: 60000, fetch: fetchStub, url: CATALOG_URL });

    expect(channels.map((entry) => entry.title)).toEqual(["Lush"]);
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it("refetches a fresh cache on request", async () => {

    const fetchStub: jest.MockedFunction<typeof fetch> = jest.fn();

    await fs.promises.writeFile(cachePath, body, "utf-8");
    fetchStub.mockResolvedValue(new Response(JSON.stringify({ channels: [{ id: "dronezone", title: "Drone Zone" }] })));

    const channels = await loadCatalog({ cachePath, cacheTtl: 60000, fetch: fetchStub, refresh: true, url: CATALOG_URL });

    expect(channels.map((entry) => entry.id)).toEqual(["dronezone"]);
  });

  it("falls back to a stale cache when the fetch fails", async () => {

    const fetchStub: jest.MockedFunction<typeof fetch> = jest.fn();

    await fs.promises.writeFile(cachePath, body, "utf-8");
    fetchStub.mockRejectedValue(new Error("getaddrinfo ENOTFOUND example.com"));

    const channels = await loadCatalog({ cachePath, cacheTtl: 0, fetch: fetchStub, url: CATALOG_URL });

    expect(fetchStub).toHaveBeenCalledTimes(1);
    expect(channels.map((entry) => entry.id)).toEqual(["lush"]);
  });

  it("fails without a cache when the fetch fails", async () => {

    const fetchStub: jest.MockedFunction<typeof fetch> = jest.fn();

    fetchStub.mockResolvedValue(new Response("busy", { status: 500 }));

    await expect(loadCatalog({ cachePath, cacheTtl: 0, fetch: fetchStub, url: CATALOG_URL }))
      .rejects.toThrow("Unable to load the channel list: HTTP 500 from https://example.com/channels.json.");
  });

  it("fails instead of hanging when the server never answers", async () => {

    const fetchStub: jest.MockedFunction<typeof fetch> = jest.fn();

    fetchStub.mockImplementation(async (_input, init) => new Promise<Response>((_resolve, reject) => {

      const signal = init?.signal;

      if(signal) {

        signal.addEventListener("abort", () => reject(signal.reason));
      }
    }));

    await expect(loadCatalog({ cachePath, cacheTtl: 0, fetch: fetchStub, timeout: 20, url: CATALOG_URL }))
      .rejects.toThrow("Unable to load the channel list: No response from https://example.com/channels.json within 20 ms.");
  });
});
