/**
 * Spec version parsing and range checks.
 *
 * Versions are `MAJOR.MINOR.PATCH` with an optional `v` prefix and optional
 * pre-release / build suffixes. Only the numeric core takes part in
 * comparisons.
 */

export interface SpecVersion {
  major: number;
  minor: number;
  patch: number;
  preRelease?: string;
  build?: string;
}

export interface SpecVersionRange {
  /** inclusive */
  min: string;
  /** exclusive */
  max: string;
}

const VERSION_PATTERN =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

export function parseSpecVersion(text: string): SpecVersion | undefined {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [, major, minor, patch, preRelease, build] = match;
  const version: SpecVersion = {
    major: Number.parseInt(major, 10),
    minor: Number.parseInt(minor, 10),
    patch: Number.parseInt(patch, 10),
  };
  if (preRelease !== undefined) {
    version.preRelease = preRelease;
  }
  if (build !== undefined) {
    version.build = build;
  }
  return version;
}

export function compareSpecVersions(a: SpecVersion, b: SpecVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function formatSpecVersion(version: SpecVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export type VersionCheck =
  | { compatible: true; version: SpecVersion }
  | { compatible: false; reason: 'malformed' | 'below_minimum' | 'not_below_maximum'; message: string };

export function checkSpecVersion(text: string, range: SpecVersionRange): VersionCheck {
  const version = parseSpecVersion(text);
  if (!version) {
    return {
      compatible: false,
      reason: 'malformed',
      message: `Version '${text}' is not in MAJOR.MINOR.PATCH format`,
    };
  }
  const min = parseSpecVersion(range.min);
  const max = parseSpecVersion(range.max);
  if (min && compareSpecVersions(version, min) < 0) {
    return {
      compatible: false,
      reason: 'below_minimum',
      message: `Version ${formatSpecVersion(version)} is below the minimum supported version ${range.min}`,
    };
  }
  if (max && compareSpecVersions(version, max) >= 0) {
    return {
      compatible: false,
      reason: 'not_below_maximum',
      message: `Version ${formatSpecVersion(version)} is not below the maximum supported version ${range.max}`,
    };
  }
  return { compatible: true, version };
}
