/**
 * Where an analyzed unit comes from.
 *
 * - `system`: provided by the platform SDK (`dart:core`).
 * - `package`: part of a named distribution package (`package:foo/foo.dart`).
 * - `loose`: anything else, including identifiers that do not parse.
 */
export type UnitScope = 'system' | 'package' | 'loose';

export type UnitIdentity =
  | { readonly scope: 'system'; readonly identifier: string }
  | { readonly scope: 'package'; readonly identifier: string; readonly packageName: string }
  | { readonly scope: 'loose'; readonly identifier: string };

const SYSTEM_SCHEMES: ReadonlySet<string> = new Set(['dart', 'platform']);
const PACKAGE_SCHEME = 'package';
const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):(.*)$/i;

/**
 * Anything with a string form can identify a unit, which covers `URL` instances.
 */
export type UnitIdentifier = string | { toString(): string };

/**
 * Classifies a unit identifier of the form `scheme:path`.
 *
 * Never throws: identifiers without a scheme, with an empty path, or a package
 * identifier without a package segment are classified as `loose`.
 *
 * @param identifier - Unit identifier such as `package:foo/bar.dart`.
 * @returns The scope of the unit and, for packages, the package name.
 */
export function resolveUnitIdentity(identifier: UnitIdentifier): UnitIdentity {
  const text = String(identifier);
  const match = SCHEME_PATTERN.exec(text);
  const scheme = match?.[1]?.toLowerCase();
  const unitPath = match?.[2] ?? '';

  if (!scheme || unitPath.length === 0) {
    return { scope: 'loose', identifier: text };
  }

  if (SYSTEM_SCHEMES.has(scheme)) {
    return { scope: 'system', identifier: text };
  }

  if (scheme === PACKAGE_SCHEME) {
    const packageName = unitPath.split('/')[0] ?? '';
    if (packageName.length > 0) {
      return { scope: 'package', identifier: text, packageName };
    }
  }

  return { scope: 'loose', identifier: text };
}
