/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and handling utilities for icytune.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if((typeof error === "object") && (error !== null) && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  return message.replace(/[.!?]+$/, "");
}

/**
 * Checks whether a thrown value carries the given Node.js system error code (e.g., "ENOENT", "EEXIST").
 * @param error - The error to check.
 * @param code - The expected error code.
 * @returns True if the error carries that code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {

  return (typeof error === "object") && (error !== null) && ("code" in error) && (error.code === code);
}
