import { getOrCreate } from '@lintstat/core/collections';

import { resolveUnitIdentity, type UnitIdentifier } from '../identity/unit-identity.js';
import {
  HtmlSummary,
  LibrarySummary,
  PackageSummary,
  type GlobalSummary,
  type UnitSummary,
} from './summary-nodes.js';

/**
 * Returns the summary of the library identified by `identifier`, creating it (and
 * its package) in the container matching the identifier's scope when absent.
 *
 * A loose identifier already recorded as an HTML document keeps its HTML summary.
 */
export function getOrCreateLibrary(
  global: GlobalSummary,
  identifier: UnitIdentifier,
): UnitSummary {
  const identity = resolveUnitIdentity(identifier);
  const create = (key: string) => new LibrarySummary(key);

  switch (identity.scope) {
    case 'system': {
      return getOrCreate(global.system, identity.identifier, create);
    }
    case 'package': {
      const summary = getOrCreate(
        global.packages,
        identity.packageName,
        (name) => new PackageSummary(name),
      );
      return getOrCreate(summary.libraries, identity.identifier, create);
    }
    default: {
      return getOrCreate(global.loose, identity.identifier, create);
    }
  }
}

/**
 * Returns the loose summary for an HTML document, creating it when absent.
 */
export function getOrCreateHtml(global: GlobalSummary, identifier: UnitIdentifier): UnitSummary {
  return getOrCreate(global.loose, String(identifier), (key) => new HtmlSummary(key));
}

/**
 * Looks up a unit summary without creating anything.
 */
export function findUnit(
  global: GlobalSummary,
  identifier: UnitIdentifier,
): UnitSummary | undefined {
  const identity = resolveUnitIdentity(identifier);
  switch (identity.scope) {
    case 'system': {
      return global.system.get(identity.identifier);
    }
    case 'package': {
      return global.packages.get(identity.packageName)?.libraries.get(identity.identifier);
    }
    default: {
      return global.loose.get(identity.identifier);
    }
  }
}

/**
 * Iterates every unit of the tree in traversal order: system, packages, loose.
 */
export function* iterateUnits(global: GlobalSummary): Generator<UnitSummary> {
  yield* global.system.values();
  for (const summary of global.packages.values()) {
    yield* summary.libraries.values();
  }
  yield* global.loose.values();
}

function mergeUnit(target: UnitSummary, source: UnitSummary): void {
  target.messages.push(...source.messages);
  if (target.type === 'library' && source.type === 'library') {
    target.lines += source.lines;
  }
}

/**
 * Folds the units of `source` into `target`. Units present in both trees keep the
 * target's summary object; messages are appended and line counts summed. Used to
 * combine the trees of reporters that analyzed disjoint sets of units in parallel.
 *
 * @returns The updated `target`.
 */
export function mergeGlobalSummaries(target: GlobalSummary, source: GlobalSummary): GlobalSummary {
  const createLibrary = (key: string) => new LibrarySummary(key);

  for (const library of source.system.values()) {
    mergeUnit(getOrCreate(target.system, library.identifier, createLibrary), library);
  }

  for (const summary of source.packages.values()) {
    const targetPackage = getOrCreate(
      target.packages,
      summary.name,
      (name) => new PackageSummary(name),
    );
    for (const library of summary.libraries.values()) {
      mergeUnit(getOrCreate(targetPackage.libraries, library.identifier, createLibrary), library);
    }
  }

  for (const unit of source.loose.values()) {
    mergeUnit(
      getOrCreate(target.loose, unit.identifier, (key) =>
        unit.type === 'library' ? new LibrarySummary(key) : new HtmlSummary(key),
      ),
      unit,
    );
  }

  return target;
}
