/**
 * Destructive command signatures checked before a command leaves the relay
 * client. Plain case-insensitive substring matching: this is an advisory
 * filter and is easy to bypass (aliases, quoting, encodings). The sandbox
 * executor is the isolation boundary, not this list.
 */

import { RelayError } from "../relay/errors.js";

export const DEFAULT_DENYLIST: ReadonlyArray<string> = [
  "rm -rf",            // recursive force remove
  "mkfs",              // filesystem format
  "dd if=",            // raw device copy
  ":(){ :|:& };:"      // fork bomb
];

/** Returns the first denylist entry found in the command, if any. */
export function findDeniedPattern(
  command: string,
  denylist: ReadonlyArray<string> = DEFAULT_DENYLIST
): string | undefined {
  const normalized = command.toLowerCase();
  return denylist.find((pattern) => normalized.includes(pattern.toLowerCase()));
}

export function validateCommand(
  command: unknown,
  denylist: ReadonlyArray<string> = DEFAULT_DENYLIST
): asserts command is string {
  if (typeof command !== "string" || command.trim().length === 0) {
    throw new RelayError("validation", "Command must be a non-empty string", {
      command: typeof command === "string" ? command : null
    });
  }
  const pattern = findDeniedPattern(command, denylist);
  if (pattern !== undefined) {
    throw new RelayError("validation", "Potentially dangerous command detected", {
      command,
      pattern
    });
  }
}
