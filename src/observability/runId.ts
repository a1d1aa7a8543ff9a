/** `booru-20261019T083015Z-k3f9qa`: UTC start time to the second plus a random suffix. */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `booru-${stamp}-${suffix}`;
}
