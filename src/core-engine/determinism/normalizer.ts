/**
 * Replace every occurrence of every ignorable region with `placeholder`.
 *
 * Matching is a single left-to-right pass over the raw bytes; at each
 * position the longest matching region wins, and replaced text is never
 * scanned again (a placeholder cannot be re-matched by a shorter region).
 * Empty regions are ignored.
 */
export function normalizeArtifact(bytes: Buffer, regions: readonly string[], placeholder: string): Buffer {
  const needles = Array.from(new Set(regions))
    .map((region) => Buffer.from(region, "utf-8"))
    .filter((needle) => needle.length > 0)
    .sort((a, b) => b.length - a.length);
  if (needles.length === 0) {
    return Buffer.from(bytes);
  }

  // latin1 maps each byte to exactly one code unit, so string offsets are byte offsets.
  const escape = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(needles.map((needle) => escape(needle.toString("latin1"))).join("|"), "g");
  const replacement = Buffer.from(placeholder, "utf-8").toString("latin1");

  const normalized = bytes.toString("latin1").replace(pattern, () => replacement);
  return Buffer.from(normalized, "latin1");
}
