/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * render.ts: Console rendering of stream headers and track titles.
 */
import type { HeaderField, TrackDisplay } from "../types/index.js";
import type { SessionHooks } from "./session.js";
import df from "dateformat";

/* This is the now-playing output the user watches, not diagnostics: it goes to stdout whatever the logging mode. Header fields print once as "Label: value", and
 * every title prints with the local time it started:
 *
 *   Channel: Groove Salad
 *   Genre: ambient chill
 *   Bitrate: 128 kbit/s
 *   [21:04:13] SomaFM Station ID
 *   [21:04:41] Tycho - Awake
 *
 * Colors are used only when the output is a terminal.
 */

const ANSI = {

  bold: "\x1b[1m",
  dim: "\x1b[2m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

const HEADER_LABELS: Record<HeaderField, string> = {

  bitrate: "Bitrate",
  channel: "Channel",
  genre: "Genre",
  player: "Player"
};

/**
 * Wraps text in an ANSI style when color is on.
 * @param text - The text.
 * @param style - The ANSI sequence.
 * @param color - Whether color is on.
 * @returns The styled text.
 */
function paint(text: string, style: string, color: boolean): string {

  return color ? [ style, text, ANSI.reset ].join("") : text;
}

/**
 * Formats one header field for display.
 * @param field - The header field.
 * @param value - Its value.
 * @param color - Whether to use ANSI colors.
 * @returns The display line, without a newline.
 */
export function formatHeaderLine(field: HeaderField, value: string, color = false): string {

  return [ paint([ HEADER_LABELS[field], ":" ].join(""), ANSI.bold, color), " ", value ].join("");
}

/**
 * Formats one title for display.
 * @param title - The track title.
 * @param display - Timestamp and highlighting.
 * @param color - Whether to use ANSI colors.
 * @returns The display line, without a newline.
 */
export function formatTrackLine(title: string, display: TrackDisplay, color = false): string {

  const stamp = [ "[", df(display.timestamp, "HH:MM:ss"), "]" ].join("");

  return [ stamp, " ", display.highlight ? paint(title, ANSI.yellow, color) : title ].join("");
}

/**
 * Options for the console renderer.
 */
export interface ConsoleRendererOptions {

  color?: boolean;

  // Destination of the rendered text. Defaults to stdout.
  write?: (text: string) => void;
}

/**
 * Creates the rendering hooks of a session.
 * @param options - Renderer options.
 * @returns The echo, renderHeader and renderTrack hooks.
 */
export function createConsoleRenderer(options: ConsoleRendererOptions = {}): Required<Pick<SessionHooks, "echo" | "renderHeader" | "renderTrack">> {

  const color = options.color ?? (process.stdout.isTTY === true);
  const write = options.write ?? ((text: string): void => {

    process.stdout.write(text);
  });

  return {

    echo: (line: string): void => write([ paint(line, ANSI.dim, color), "\n" ].join("")),
    renderHeader: (field: HeaderField, value: string): void => write([ formatHeaderLine(field, value, color), "\n" ].join("")),
    renderTrack: (title: string, display: TrackDisplay): void => write([ formatTrackLine(title, display, color), "\n" ].join(""))
  };
}
