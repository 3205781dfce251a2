const NS_UNITS: [string, bigint][] = [
  ["y", 365n * 24n * 60n * 60n * 1_000_000_000n],
  ["mo", 30n * 24n * 60n * 60n * 1_000_000_000n],
  ["d", 24n * 60n * 60n * 1_000_000_000n],
  ["h", 60n * 60n * 1_000_000_000n],
  ["m", 60n * 1_000_000_000n],
  ["s", 1_000_000_000n],
  ["ms", 1_000_000n],
  ["us", 1_000n],
  ["ns", 1n],
];

/**
 * Human-friendly duration keeping the two largest non-zero units.
 *
 * input: 1_250_000_000n
 * output: "1s250ms"
 *
 * input: 3_723_000_000_000n
 * output: "1h2m"
 */
export function formatDuration(nanoseconds: bigint): string {
  let remaining = nanoseconds < 0n ? 0n : nanoseconds;
  const parts: string[] = [];
  for (const [name, factor] of NS_UNITS) {
    const value = remaining / factor;
    remaining = remaining % factor;
    if (value > 0n) {
      parts.push(`${value}${name}`);
    }
    if (parts.length === 2) {
      break;
    }
  }
  return parts.length ? parts.join("") : "0s";
}
