const VERSION_PARTS = 3;

/**
 * MAJOR.MINOR.PATCH as numbers, missing parts padded with 0.
 * Returns null when any part is not a plain non-negative integer.
 */
export function parseVersion(version: string): number[] | null {
  const parts = version.trim().split('.');
  if (parts.some((part) => !/^\d+$/.test(part))) return null;
  const numbers = parts.map(Number);
  while (numbers.length < VERSION_PARTS) numbers.push(0);
  return numbers;
}

/**
 * True when `candidate` is strictly newer than `current`. Unparsable
 * versions never count as newer.
 */
export function isNewer(candidate: string, current: string): boolean {
  const next = parseVersion(candidate);
  const installed = parseVersion(current);
  if (!next || !installed) return false;

  const length = Math.max(next.length, installed.length);
  for (let index = 0; index < length; index += 1) {
    const a = next[index] ?? 0;
    const b = installed[index] ?? 0;
    if (a !== b) return a > b;
  }
  return false;
}
