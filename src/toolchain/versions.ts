function parts(version: string): number[] {
  return version
    .split(/[.\-+_]/)
    .map((segment) => Number.parseInt(segment, 10))
    .map((value) => (Number.isFinite(value) ? value : 0));
}

/** Dotted numeric comparison; missing segments count as zero, so "17" equals "17.0.0". */
export function compareVersions(a: string, b: string): number {
  const left = parts(a);
  const right = parts(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

export function satisfiesVersion(installed: string, required: string): boolean {
  return compareVersions(installed, required) >= 0;
}
