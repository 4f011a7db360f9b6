/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * classifier.ts: Line classification for player console output.
 */
import type { ClassifiedEvent, DialectProfile, FieldExtraction, TrackRule } from "../types/index.js";

/* The classifier is a pure function from one line of player output to a tagged event. It never throws: anything it cannot make sense of, including bytes that are
 * not valid UTF-8, becomes an "unrecognized" event that the session either ignores or echoes.
 *
 * Header rules are consulted first, in the order the profile declares them, but only while the header is still incomplete. Once the session has seen the end of the
 * header, a player re-announcing its stream properties (mplayer does this after reconnecting) is unrecognized, so each header field is rendered once. Track rules
 * match at any time.
 */

// Strict decoder: invalid byte sequences throw instead of turning into replacement characters.
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

// ICY metadata markers. The title runs from the opening marker up to the first quote-semicolon pair.
const ICY_TITLE_START = "StreamTitle='";
const ICY_TITLE_END = "';";

// Bitrate token of an mpg123 stream-info line ("MPEG 1.0 L III cbr128 44100 j-s").
const MPG123_BITRATE = /\b(?:abr|cbr|vbr)(\d+)\b/;

/**
 * Decodes a raw line. Buffers must be valid UTF-8.
 * @param line - The raw line.
 * @returns The decoded text, or null if the bytes are not valid UTF-8.
 */
export function decodeLine(line: Buffer | string): string | null {

  if(typeof line === "string") {

    return line;
  }

  try {

    return utf8Decoder.decode(line);
  } catch {

    return null;
  }
}

/**
 * Extracts the title from an ICY metadata payload such as "StreamTitle='Artist - Track';StreamUrl='http://x';". Quotes inside the title are kept as long as they
 * are not followed by a semicolon. When no terminator is present, the rest of the payload is taken and a single trailing quote removed.
 * @param payload - The text following the dialect's track prefix.
 * @returns The title, or null if the payload carries no StreamTitle.
 */
export function extractStreamTitle(payload: string): string | null {

  const start = payload.indexOf(ICY_TITLE_START);

  if(start === -1) {

    return null;
  }

  const titleStart = start + ICY_TITLE_START.length;
  const end = payload.indexOf(ICY_TITLE_END, titleStart);

  if(end !== -1) {

    return payload.slice(titleStart, end);
  }

  const rest = payload.slice(titleStart);

  return rest.endsWith("'") ? rest.slice(0, -1) : rest;
}

/**
 * Cuts a header value out of a line according to the rule's extraction mode.
 * @param line - The trimmed line.
 * @param extract - The extraction mode.
 * @returns The trimmed value, or an empty string if the line does not carry one.
 */
export function extractField(line: string, extract: FieldExtraction): string {

  const firstColon = line.indexOf(":");

  switch(extract) {

    case "line": {

      return line.trim();
    }

    case "afterColon": {

      return (firstColon === -1) ? "" : line.slice(firstColon + 1).trim();
    }

    case "afterSecondColon": {

      if(firstColon === -1) {

        return "";
      }

      const secondColon = line.indexOf(":", firstColon + 1);

      return line.slice(((secondColon === -1) ? firstColon : secondColon) + 1).trim();
    }

    case "colonSegment": {

      if(firstColon === -1) {

        return "";
      }

      const secondColon = line.indexOf(":", firstColon + 1);

      return line.slice(firstColon + 1, (secondColon === -1) ? undefined : secondColon).trim();
    }

    case "cbrBitrate": {

      const match = MPG123_BITRATE.exec(line);

      return match ? [ match[1], " kbit/s" ].join("") : "";
    }

    default: {

      return "";
    }
  }
}

/**
 * Extracts a track title from a line that starts with the track rule's prefix.
 * @param line - The trimmed line.
 * @param rule - The dialect's track rule.
 * @returns The title, or null if the line does not carry one.
 */
function extractTitle(line: string, rule: TrackRule): string | null {

  const payload = line.slice(rule.prefix.length);

  if(rule.format === "plain") {

    return payload.trim();
  }

  return extractStreamTitle(payload)?.trim() ?? null;
}

/**
 * Classifies one line of player output.
 * @param line - The raw line, as bytes or text. Line terminators are ignored.
 * @param profile - The dialect of the active player.
 * @param headerComplete - True once the session has seen the end of the header. Header rules are skipped from then on.
 * @returns The classified event. Lines matching no rule, decode failures, and empty values are "unrecognized".
 */
export function classifyLine(line: Buffer | string, profile: DialectProfile, headerComplete = false): ClassifiedEvent {

  const decoded = decodeLine(line);

  if(decoded === null) {

    return { line: (typeof line === "string") ? line : line.toString("latin1"), type: "unrecognized" };
  }

  const text = decoded.replace(/[\r\n]+$/, "");
  const trimmed = text.trim();

  if(!headerComplete) {

    for(const rule of profile.headerRules) {

      if(!trimmed.startsWith(rule.prefix)) {

        continue;
      }

      const value = extractField(trimmed, rule.extract);

      if(value.length > 0) {

        return { field: rule.field, type: "header", value };
      }
    }
  }

  if(trimmed.startsWith(profile.trackRule.prefix)) {

    const title = extractTitle(trimmed, profile.trackRule);

    if(title) {

      return { title, type: "track" };
    }
  }

  return { line: text, type: "unrecognized" };
}
