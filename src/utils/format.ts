/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for icytune.
 */

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Lays out rows of cells as left-aligned text columns separated by two spaces. The last column is not padded.
 * @param rows - The rows to format. Rows may have different lengths.
 * @returns One string per row.
 */
export function formatColumns(rows: readonly (readonly string[])[]): string[] {

  const widths: number[] = [];

  for(const row of rows) {

    row.forEach((cell, index) => {

      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }

  return rows.map((row) => row.map((cell, index) => (index === (row.length - 1)) ? cell : cell.padEnd(widths[index] ?? 0)).join("  "));
}
