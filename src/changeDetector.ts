import type { ChangeResult } from "./types";

/**
 * Classifies an incoming fingerprint against the stored one. A key seen for
 * the first time is "new", never "changed": there is no baseline to differ from.
 */
export function detectChange(
  previousFingerprint: string | undefined,
  nextFingerprint: string
): ChangeResult {
  if (previousFingerprint === undefined) {
    return "new";
  }
  return previousFingerprint === nextFingerprint ? "unchanged" : "changed";
}

/** Only a change against an existing baseline warrants telling subscribers. */
export function shouldAnnounce(result: ChangeResult): boolean {
  return result === "changed";
}
