/**
 * Version-control patch headers. Fast-Apply blocks are plain annotated source,
 * so these lines are noise when a model mixes in unified-diff syntax.
 */
const DIFF_HEADER_PATTERNS: RegExp[] = [
  /^diff --git /,
  /^index [0-9a-f]+\.\.[0-9a-f]+/,
  /^--- (?:a\/\S+|\/dev\/null|\S+)(?:\t.*)?$/,
  /^\+\+\+ (?:b\/\S+|\/dev\/null|\S+)(?:\t.*)?$/,
  /^@@ .* @@/,
];

export function isDiffHeader(line: string): boolean {
  const bare = line.endsWith('\r') ? line.slice(0, -1) : line;
  return DIFF_HEADER_PATTERNS.some((pattern) => pattern.test(bare));
}

export function stripDiffHeaders(updateBlock: string): string {
  return updateBlock
    .split('\n')
    .filter((line) => !isDiffHeader(line))
    .join('\n');
}
