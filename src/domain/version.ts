import { InvalidVersionError, assertNever } from './errors.js';

export const LEVELS = ['MAJOR', 'MINOR', 'PATCH', 'NO_CHANGES'] as const;

/** Semantic-version severity implied by a schema change. */
export type Level = (typeof LEVELS)[number];

/** Lower ordinal = more severe. */
const LEVEL_ORDINAL: Record<Level, number> = {
  MAJOR: 0,
  MINOR: 1,
  PATCH: 2,
  NO_CHANGES: 3,
};

/** Returns whichever of the two levels is more severe. */
export function mostSevere(a: Level, b: Level): Level {
  return LEVEL_ORDINAL[b] < LEVEL_ORDINAL[a] ? b : a;
}

export function compareLevels(a: Level, b: Level): number {
  return LEVEL_ORDINAL[a] - LEVEL_ORDINAL[b];
}

const VERSION_RE = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Immutable `major.minor.patch` schema version.
 */
export class Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;

  constructor(major: number, minor: number, patch: number) {
    this.major = major;
    this.minor = minor;
    this.patch = patch;
  }

  static parse(text: string): Version {
    const match = VERSION_RE.exec(text);
    if (match === null) {
      throw new InvalidVersionError(`Invalid version "${text}": expected major.minor.patch`);
    }
    return new Version(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  /** Increments the component for `level` and resets every lower one. */
  bump(level: Level): Version {
    switch (level) {
      case 'MAJOR':
        return new Version(this.major + 1, 0, 0);
      case 'MINOR':
        return new Version(this.major, this.minor + 1, 0);
      case 'PATCH':
        return new Version(this.major, this.minor, this.patch + 1);
      case 'NO_CHANGES':
        return this;
      default:
        return assertNever(level);
    }
  }

  compare(other: Version): -1 | 0 | 1 {
    const pairs: Array<[number, number]> = [
      [this.major, other.major],
      [this.minor, other.minor],
      [this.patch, other.patch],
    ];
    for (const [a, b] of pairs) {
      if (a !== b) return a < b ? -1 : 1;
    }
    return 0;
  }

  toString(): string {
    return `${this.major}.${this.minor}.${this.patch}`;
  }
}
