/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.ts: Stream session controller that interprets player output.
 */
import type { DialectProfile, HeaderField, Nullable, PlayerKind, SessionOptions, SessionState, TrackDisplay } from "../types/index.js";
import { LOG, formatError } from "../utils/index.js";
import type { TrackLog } from "./trackLog.js";
import { classifyLine } from "./classifier.js";
import { getDialect } from "./dialects.js";
import { isStationId } from "./stationId.js";

/*
 * SESSION LIFECYCLE
 *
 * A session is one pass over the output of one player process. The controller reads lines in order, classifies them with the player's dialect, and moves through
 * three phases:
 *
 * 1. awaitingHeader - The player is still describing the stream. Header fields are stored and rendered as they arrive. Seeing the dialect's end-of-header field
 *    (the bitrate for mplayer and mpg123) moves the session to streaming. Dialects without a meaningful header (mpv) skip this phase entirely.
 * 2. streaming - Each new title is timestamped and rendered, checked against the known station IDs, and, when it is music and the channel is known, recorded in
 *    the track log and passed to the notifier.
 * 3. terminated - The line source ended (the player exited or was killed) or the caller aborted. The state is handed back; tearing down the process and writing
 *    the track log are the caller's job.
 *
 * Hooks are invoked synchronously from the read loop. A hook that throws is logged and the loop carries on with the next line.
 */

/**
 * Side effects driven by the session. renderHeader and renderTrack are always called; echo only in verbose mode; notify only for music titles with a known
 * channel when notifications are enabled.
 */
export interface SessionHooks {

  echo?: (line: string) => void;
  notify?: (title: string, channelName: string) => void;
  renderHeader: (field: HeaderField, value: string) => void;
  renderTrack: (title: string, display: TrackDisplay) => void;
}

/**
 * Everything a session needs.
 */
export interface SessionInput {

  // Channel name from the catalog. Used when the dialect does not report one in its header.
  channelName?: Nullable<string>;

  hooks: SessionHooks;

  // Substrings identifying station ID titles.
  knownStationIds: Iterable<string>;

  // Player output, one line per item. Ends when the player exits.
  lines: AsyncIterable<Buffer | string>;

  options: SessionOptions;
  playerKind: PlayerKind;

  // Aborting stops the session between (or during) line reads.
  signal?: AbortSignal;

  // Destination for logged titles. When absent, nothing is recorded regardless of options.logEnabled.
  trackLog?: TrackLog;
}

export type SessionPhase = "awaitingHeader" | "streaming" | "terminated";

/**
 * What the caller gets back when the session ends.
 */
export interface SessionResult {

  linesRead: number;
  reason: "aborted" | "eof";
  state: SessionState;
}

// Sentinel resolved when the abort signal fires while a read is pending.
const ABORTED: unique symbol = Symbol("aborted");

/**
 * Creates the initial state for a session.
 * @param playerKind - The active player.
 * @param channelName - Channel name known before the player starts, if any.
 * @returns A fresh session state.
 */
export function createSessionState(playerKind: PlayerKind, channelName: Nullable<string> = null): SessionState {

  return {

    channelName,
    header: {},
    headerPrinted: false,
    lastTitle: null,
    playerKind,
    tracks: 0
  };
}

/**
 * The stateful interpreter behind runSession(). One instance serves exactly one session.
 */
export class StreamSession {

  private readonly input: SessionInput;
  private readonly knownStationIds: string[];
  private _phase: SessionPhase;
  private readonly profile: DialectProfile;
  public readonly state: SessionState;

  constructor(input: SessionInput) {

    this.input = input;
    this.knownStationIds = [...input.knownStationIds];
    this.profile = getDialect(input.playerKind);
    this.state = createSessionState(input.playerKind, input.channelName ?? null);
    this._phase = this.profile.requiresHeader ? "awaitingHeader" : "streaming";
  }

  public get phase(): SessionPhase {

    return this._phase;
  }

  /**
   * Reads the line source until it ends or the signal aborts.
   * @returns The session result.
   */
  public async run(): Promise<SessionResult> {

    const { lines, signal } = this.input;
    const iterator = lines[Symbol.asyncIterator]();
    let linesRead = 0;
    let reason: SessionResult["reason"] = "eof";
    let onAbort = (): void => undefined;

    // The executor runs synchronously, so onAbort resolves this promise by the time the listener is attached.
    const aborted = new Promise<typeof ABORTED>((resolve) => {

      onAbort = (): void => resolve(ABORTED);
    });

    signal?.addEventListener("abort", onAbort, { once: true });

    LOG.debug("session", "Session started for %s in phase %s.", this.profile.kind, this._phase);

    try {

      for(;;) {

        if(signal?.aborted) {

          reason = "aborted";

          break;
        }

        const pending = iterator.next();
        const next = signal ? await Promise.race([ pending, aborted ]) : await pending;

        if(next === ABORTED) {

          reason = "aborted";

          // The read still in flight may settle later. Its outcome no longer matters, but a rejection must not go unhandled.
          void pending.catch((error: unknown) => LOG.debug("session", "Pending read failed after abort: %s.", formatError(error)));

          break;
        }

        if(next.done) {

          break;
        }

        linesRead++;
        this.handleLine(next.value);
      }
    } finally {

      signal?.removeEventListener("abort", onAbort);
      this._phase = "terminated";
    }

    // Let the source release its resources. We do not wait for it: a source blocked on a silent player may never settle.
    if(reason === "aborted") {

      void iterator.return?.().catch((error: unknown) => LOG.debug("session", "Closing the line source failed: %s.", formatError(error)));
    }

    LOG.debug("session", "Session ended (%s) after %s lines, %s titles logged.", reason, linesRead, this.state.tracks);

    return { linesRead, reason, state: this.state };
  }

  /**
   * Classifies one line and dispatches the result.
   * @param line - The raw line.
   */
  private handleLine(line: Buffer | string): void {

    const event = classifyLine(line, this.profile, this.state.headerPrinted);

    switch(event.type) {

      case "header": {

        this.handleHeader(event.field, event.value);

        break;
      }

      case "track": {

        this.handleTrack(event.title);

        break;
      }

      default: {

        if(this.input.options.verbose) {

          const { echo } = this.input.hooks;

          if(echo) {

            this.invoke("echo", () => echo(event.line));
          }
        }

        break;
      }
    }
  }

  /**
   * Stores and renders a header field, and ends the header when the dialect's end marker arrives.
   * @param field - The header field.
   * @param value - Its value.
   */
  private handleHeader(field: HeaderField, value: string): void {

    if(this.state.header[field] !== value) {

      this.state.header[field] = value;

      if(field === "channel") {

        this.state.channelName = value;
      }

      this.invoke("renderHeader", () => this.input.hooks.renderHeader(field, value));
    }

    if(field === this.profile.endOfHeader) {

      this.state.headerPrinted = true;
      this._phase = "streaming";

      LOG.debug("session", "Header complete for %s.", this.state.channelName ?? "an unnamed channel");
    }
  }

  /**
   * Renders a new title and, for music on a known channel, logs and announces it.
   * @param title - The track title.
   */
  private handleTrack(title: string): void {

    // Players repeat the current title after reconnecting. That is not a track change.
    if(title === this.state.lastTitle) {

      return;
    }

    const { hooks, options, trackLog } = this.input;
    const stationId = isStationId(title, this.knownStationIds);
    const display: TrackDisplay = { highlight: stationId && options.stationHighlight, stationId, timestamp: new Date() };

    this.state.lastTitle = title;
    this.invoke("renderTrack", () => hooks.renderTrack(title, display));

    if(stationId) {

      LOG.debug("session", "Station ID: %s.", title);

      return;
    }

    if(this.profile.requiresHeader && !this.state.headerPrinted) {

      LOG.debug("session", "Title before the end of the header, not logged: %s.", title);

      return;
    }

    const channelName = this.state.channelName;

    if(!channelName) {

      LOG.debug("session", "No channel name known, not logged: %s.", title);

      return;
    }

    if(options.logEnabled && trackLog) {

      trackLog.record(channelName, title);
      this.state.tracks++;
    }

    const { notify } = hooks;

    if(options.notifyEnabled && notify) {

      this.invoke("notify", () => notify(title, channelName));
    }
  }

  /**
   * Runs a hook, logging instead of propagating any failure.
   * @param name - The hook name for the log message.
   * @param fn - The hook invocation.
   */
  private invoke(name: keyof SessionHooks, fn: () => void): void {

    try {

      fn();
    } catch(error) {

      LOG.warn("Session hook %s failed: %s.", name, formatError(error));
    }
  }
}

/**
 * Runs one playback session over a player's output. Returns when the output ends or the signal aborts. Never rejects because of player output.
 * @param input - The session input.
 * @returns The final session state, the reason the session ended, and the number of lines read.
 */
export async function runSession(input: SessionInput): Promise<SessionResult> {

  return new StreamSession(input).run();
}
