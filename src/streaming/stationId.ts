/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * stationId.ts: Station identification detection.
 */

/**
 * Checks whether a track title is a station identification jingle rather than music. A title is a station ID when any of the known ID strings occurs in it,
 * ignoring case. Empty ID strings never match.
 * @param title - The track title.
 * @param knownIds - Substrings that identify station IDs (e.g., "SomaFM").
 * @returns True if the title is a station ID.
 */
export function isStationId(title: string, knownIds: Iterable<string>): boolean {

  const normalized = title.toLowerCase();

  for(const id of knownIds) {

    if((id.length > 0) && normalized.includes(id.toLowerCase())) {

      return true;
    }
  }

  return false;
}
