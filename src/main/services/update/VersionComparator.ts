export type VersionComparator = (left: string, right: string) => number;

interface VersionKey {
  release: number[];
  prerelease: string[];
}

/**
 * Orders dotted version strings. Missing release segments count as zero
 * (`6.5` equals `6.5.0`) and a prerelease sorts below its release.
 */
export const compareVersions: VersionComparator = (left, right) => {
  return compareVersionKeys(parseVersionKey(left), parseVersionKey(right));
};

function parseVersionKey(value: string): VersionKey {
  const normalized = value.trim().replace(/^v/i, '').split('+')[0] ?? '';
  const dash = normalized.indexOf('-');
  const releasePart = dash === -1 ? normalized : normalized.slice(0, dash);
  const prereleasePart = dash === -1 ? '' : normalized.slice(dash + 1);

  return {
    release: releasePart
      .split('.')
      .filter((segment) => segment.length > 0)
      .map((segment) => {
        const digits = segment.match(/^\d+/);
        return digits ? Number(digits[0]) : 0;
      }),
    prerelease: prereleasePart ? prereleasePart.split('.') : []
  };
}

function compareVersionKeys(left: VersionKey, right: VersionKey): number {
  const length = Math.max(left.release.length, right.release.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left.release[i] ?? 0) - (right.release[i] ?? 0);
    if (diff !== 0) {
      return Math.sign(diff);
    }
  }

  if (left.prerelease.length === 0 && right.prerelease.length > 0) {
    return 1;
  }
  if (left.prerelease.length > 0 && right.prerelease.length === 0) {
    return -1;
  }

  const max = Math.max(left.prerelease.length, right.prerelease.length);
  for (let i = 0; i < max; i += 1) {
    const a = left.prerelease[i];
    const b = right.prerelease[i];
    if (a === undefined) {
      return -1;
    }
    if (b === undefined) {
      return 1;
    }
    if (a === b) {
      continue;
    }

    const aNum = /^\d+$/.test(a) ? Number(a) : null;
    const bNum = /^\d+$/.test(b) ? Number(b) : null;
    if (aNum !== null && bNum !== null) {
      return Math.sign(aNum - bNum);
    }
    if (aNum !== null) {
      return -1;
    }
    if (bNum !== null) {
      return 1;
    }
    return a < b ? -1 : 1;
  }

  return 0;
}
