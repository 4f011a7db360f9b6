/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.test.ts: Tests for the stream session controller.
 */
import type { PlayerKind, SessionOptions } from "../../types/index.js";
import { StreamSession, createSessionState, runSession } from "../session.js";
import type { SessionHooks } from "../session.js";
import { TrackLog } from "../trackLog.js";

const GROOVE_SALAD = [

  "Name: Groove Salad",
  "Genre: Ambient",
  "Bitrate: 128kbps",
  "ICY Info: StreamTitle='SomaFM - Groove Salad';StreamUrl=http://x",
  "ICY Info: StreamTitle='Artist - Track';StreamUrl=http://x"
];

const OPTIONS: SessionOptions = { logEnabled: true, notifyEnabled: true, stationHighlight: true, verbose: false };

async function* linesOf(lines: readonly string[]): AsyncGenerator<string> {

  for(const line of lines) {

    yield line;
  }
}

function createHooks(): { echo: jest.Mock; notify: jest.Mock; renderHeader: jest.Mock; renderTrack: jest.Mock } & SessionHooks {

  return { echo: jest.fn(), notify: jest.fn(), renderHeader: jest.fn(), renderTrack: jest.fn() };
}

interface RunOverrides {

  channelName?: string;
  options?: Partial<SessionOptions>;
  playerKind?: PlayerKind;
  trackLog?: TrackLog;
}

async function runLines(lines: readonly string[], hooks: SessionHooks, overrides: RunOverrides = {}): ReturnType<typeof runSession> {

  return runSession({

    channelName: overrides.channelName,
    hooks,
    knownStationIds: ["SomaFM"],
    lines: linesOf(lines),
    options: { ...OPTIONS, ...overrides.options },
    playerKind: overrides.playerKind ?? "mplayer",
    trackLog: overrides.trackLog
  });
}

describe("createSessionState", () => {

  it("starts with an empty header and no titles", () => {

    expect(createSessionState("mpg123")).toEqual({ channelName: null, header: {}, headerPrinted: false, lastTitle: null, playerKind: "mpg123", tracks: 0 });
  });
});

describe("runSession", () => {

  it("renders the header, highlights the station ID and logs the music title", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();
    const result = await runLines(GROOVE_SALAD, hooks, { trackLog });

    expect(hooks.renderHeader.mock.calls).toEqual([ [ "channel", "Groove Salad" ], [ "genre", "Ambient" ], [ "bitrate", "128kbps" ] ]);
    expect(hooks.renderTrack).toHaveBeenCalledTimes(2);
    expect(hooks.renderTrack.mock.calls[0]?.[0]).toBe("SomaFM - Groove Salad");
    expect(hooks.renderTrack.mock.calls[0]?.[1]).toMatchObject({ highlight: true, stationId: true });
    expect(hooks.renderTrack.mock.calls[1]?.[1]).toMatchObject({ highlight: false, stationId: false });
    expect(hooks.notify.mock.calls).toEqual([[ "Artist - Track", "Groove Salad" ]]);
    expect(trackLog.titles("Groove Salad")).toEqual(["Artist - Track"]);
    expect(result).toMatchObject({ linesRead: 5, reason: "eof" });
    expect(result.state).toMatchObject({ channelName: "Groove Salad", headerPrinted: true, lastTitle: "Artist - Track", tracks: 1 });
  });

  it("does not highlight station IDs when highlighting is off", async () => {

    const hooks = createHooks();

    await runLines(GROOVE_SALAD, hooks, { options: { stationHighlight: false } });

    expect(hooks.renderTrack.mock.calls[0]?.[1]).toMatchObject({ highlight: false, stationId: true });
  });

  it("logs every distinct title when the channel is known", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();
    const titles = [ "A - One", "B - Two", "C - Three" ];

    const result = await runLines([ "Name: Lush", "Bitrate: 128kbps", ...titles.map((title) => [ "ICY Info: StreamTitle='", title, "';" ].join("")) ], hooks,
      { trackLog });

    expect(trackLog.titles("Lush")).toEqual(titles);
    expect(result.state.tracks).toBe(3);
    expect(hooks.renderTrack).toHaveBeenCalledTimes(3);
  });

  it.each([

    [ "mplayer", [ "Name: Lush", "Bitrate: 128kbps" ], (title: string): string => [ "ICY Info: StreamTitle='", title, "';" ].join("") ],
    [ "mpg123", [ "ICY-NAME: Lush", "MPEG 1.0 L III cbr128 44100 j-s" ], (title: string): string => [ "ICY-META: StreamTitle='", title, "';" ].join("") ],
    [ "mpv", ["Playing: https://example.com/lush"], (title: string): string => [ " icy-title: ", title ].join("") ]
  ] as const)("logs N titles for %s once the channel is known", async (playerKind, header, trackLine) => {

    const titles = [ "A - One", "B - Two", "C - Three", "D - Four" ];
    const withChannel = new TrackLog();
    const withoutChannel = new TrackLog();
    const lines = [ ...header, ...titles.map(trackLine) ];

    await runLines(lines, createHooks(), { channelName: "Lush", playerKind, trackLog: withChannel });
    await runLines(lines.filter((line) => !line.includes("Lush")), createHooks(), { playerKind, trackLog: withoutChannel });

    expect(withChannel.titles("Lush")).toEqual(titles);
    expect(withoutChannel.size).toBe(0);
  });

  it("renders but does not log titles when no channel is known", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();
    const result = await runLines([ "Bitrate: 128kbps", "ICY Info: StreamTitle='A - One';", "ICY Info: StreamTitle='B - Two';" ], hooks, { trackLog });

    expect(hooks.renderTrack).toHaveBeenCalledTimes(2);
    expect(hooks.notify).not.toHaveBeenCalled();
    expect(trackLog.size).toBe(0);
    expect(result.state.tracks).toBe(0);
  });

  it("uses the catalog channel name when the player reports none", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();

    await runLines([ "Bitrate: 128kbps", "ICY Info: StreamTitle='A - One';" ], hooks, { channelName: "Drone Zone", trackLog });

    expect(trackLog.titles("Drone Zone")).toEqual(["A - One"]);
  });

  it("returns the initial state for a player that prints nothing", async () => {

    const hooks = createHooks();
    const result = await runLines([], hooks);

    expect(result.linesRead).toBe(0);
    expect(result.reason).toBe("eof");
    expect(result.state).toEqual(createSessionState("mplayer"));
    expect(hooks.renderHeader).not.toHaveBeenCalled();
    expect(hooks.renderTrack).not.toHaveBeenCalled();
  });

  it("calls no hook for unrecognized lines unless verbose", async () => {

    const quiet = createHooks();
    const verbose = createHooks();
    const noise = [ "Cache fill: 12.50% (32768 bytes)", "A:   1.2 (01.2) of 0.0 (00.0)  0.5%" ];

    const result = await runLines(noise, quiet);

    await runLines(noise, verbose, { options: { verbose: true } });

    expect(quiet.echo).not.toHaveBeenCalled();
    expect(quiet.renderHeader).not.toHaveBeenCalled();
    expect(quiet.renderTrack).not.toHaveBeenCalled();
    expect(verbose.echo.mock.calls).toEqual([ [noise[0]], [noise[1]] ]);
    expect(result.linesRead).toBe(2);
    expect(result.state).toEqual(createSessionState("mplayer"));
  });

  it("treats a repeated title as no change", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();

    await runLines([ "Name: Lush", "Bitrate: 128kbps", "ICY Info: StreamTitle='A - One';", "ICY Info: StreamTitle='A - One';" ], hooks, { trackLog });

    expect(hooks.renderTrack).toHaveBeenCalledTimes(1);
    expect(trackLog.titles("Lush")).toEqual(["A - One"]);
  });

  it("renders a header field once after the header is complete", async () => {

    const hooks = createHooks();

    await runLines([ "Name: Lush", "Bitrate: 128kbps", "Name: Other", "Bitrate: 64kbps" ], hooks);

    expect(hooks.renderHeader.mock.calls).toEqual([ [ "channel", "Lush" ], [ "bitrate", "128kbps" ] ]);
  });

  it("does not log titles that arrive before the header is complete", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();

    await runLines([ "Name: Lush", "ICY Info: StreamTitle='A - One';", "Bitrate: 128kbps", "ICY Info: StreamTitle='B - Two';" ], hooks, { trackLog });

    expect(hooks.renderTrack).toHaveBeenCalledTimes(2);
    expect(trackLog.titles("Lush")).toEqual(["B - Two"]);
  });

  it("streams mpv titles without waiting for a header", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();

    await runLines([ " icy-title: A - One", "Playing: https://example.com/stream", " icy-title: B - Two" ], hooks,
      { channelName: "Groove Salad", playerKind: "mpv", trackLog });

    expect(trackLog.titles("Groove Salad")).toEqual([ "A - One", "B - Two" ]);
    expect(hooks.renderHeader.mock.calls).toEqual([[ "player", "Playing: https://example.com/stream" ]]);
  });

  it("skips the log and notifier when they are disabled", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();
    const result = await runLines(GROOVE_SALAD, hooks, { options: { logEnabled: false, notifyEnabled: false }, trackLog });

    expect(trackLog.size).toBe(0);
    expect(result.state.tracks).toBe(0);
    expect(hooks.notify).not.toHaveBeenCalled();
  });

  it("keeps reading when a hook throws", async () => {

    const hooks = createHooks();
    const trackLog = new TrackLog();

    hooks.renderHeader.mockImplementation(() => {

      throw new Error("terminal gone");
    });

    const result = await runLines(GROOVE_SALAD, hooks, { trackLog });

    expect(result.linesRead).toBe(5);
    expect(trackLog.titles("Groove Salad")).toEqual(["Artist - Track"]);
  });

  it("stops when the signal aborts while a read is pending", async () => {

    const controller = new AbortController();
    const hooks = createHooks();

    // Yields one line, then blocks like a silent player.
    async function* stalled(): AsyncGenerator<string> {

      yield "Name: Lush";

      await new Promise<void>(() => undefined);
    }

    const session = new StreamSession({ hooks, knownStationIds: [], lines: stalled(), options: OPTIONS, playerKind: "mplayer", signal: controller.signal });
    const running = session.run();

    setTimeout(() => controller.abort(), 10);

    const result = await running;

    expect(result.reason).toBe("aborted");
    expect(result.linesRead).toBe(1);
    expect(session.phase).toBe("terminated");
  });

  it("keeps titles logged before the signal aborts", async () => {

    const controller = new AbortController();
    const trackLog = new TrackLog();

    // Plays one title, then goes silent.
    async function* stalled(): AsyncGenerator<string> {

      yield "Name: Lush";
      yield "Bitrate: 128kbps";
      yield "ICY Info: StreamTitle='A - One';";

      await new Promise<void>(() => undefined);
    }

    const running = runSession({ hooks: createHooks(), knownStationIds: [], lines: stalled(), options: OPTIONS, playerKind: "mplayer", signal: controller.signal,
      trackLog });

    setTimeout(() => controller.abort(), 10);

    const result = await running;

    expect(result).toMatchObject({ linesRead: 3, reason: "aborted" });
    expect(result.state.tracks).toBe(1);
    expect(trackLog.toJSON()).toEqual({ Lush: ["A - One"] });
  });

  it("does not read at all when the signal has already aborted", async () => {

    const controller = new AbortController();

    controller.abort();

    const result = await runSession({ hooks: createHooks(), knownStationIds: [], lines: linesOf(GROOVE_SALAD), options: OPTIONS, playerKind: "mplayer",
      signal: controller.signal });

    expect(result).toMatchObject({ linesRead: 0, reason: "aborted" });
  });
});
