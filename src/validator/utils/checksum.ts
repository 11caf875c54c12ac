import crypto from "node:crypto";

/** SHA-256 of a line's trimmed text, base64 to keep digest buckets small. */
export function contentDigest(text: string): string {
  return crypto.createHash("sha256").update(text, "utf8").digest("base64");
}
