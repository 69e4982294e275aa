/**
 * Region Classification
 *
 * Maps a geocoded pickup point (plus its raw address text) to the named
 * service zones it falls in. Zones come from a data table, so adding a
 * neighbourhood is a config change rather than a code change.
 *
 * A point may sit in several zones at once (the boxes overlap along
 * their shared edges). A point in none of them is "Unknown", which
 * callers must treat as "outside the supported service area".
 */

import { RegionRule, UNKNOWN_REGION } from '../models/types';

// =============================================================================
// PREDICATES
// =============================================================================

export type RegionPredicate = (address: string, lat: number, lng: number) => boolean;

export interface RegionEntry {
  name: string;
  predicate: RegionPredicate;
}

/**
 * Turn one config rule into a predicate.
 * Box bounds are closed on every side.
 */
export function toRegionEntry(rule: RegionRule): RegionEntry {
  if (rule.kind === 'box') {
    const { latMin, latMax, lngMin, lngMax } = rule;
    return {
      name: rule.name,
      predicate: (_address, lat, lng) =>
        lat >= latMin && lat <= latMax && lng >= lngMin && lng <= lngMax
    };
  }

  const keyword = rule.keyword.toLowerCase();
  return {
    name: rule.name,
    predicate: (address) => address.toLowerCase().includes(keyword)
  };
}

// =============================================================================
// CLASSIFIER
// =============================================================================

export class RegionClassifier {
  private entries: RegionEntry[];

  constructor(rules: RegionRule[]) {
    this.entries = rules.map(toRegionEntry);
  }

  /**
   * Every region the point belongs to, in table order.
   * Returns [Unknown] when nothing matches.
   */
  classify(address: string, lat: number, lng: number): string[] {
    const regions: string[] = [];

    for (const entry of this.entries) {
      if (entry.predicate(address, lat, lng) && !regions.includes(entry.name)) {
        regions.push(entry.name);
      }
    }

    return regions.length > 0 ? regions : [UNKNOWN_REGION];
  }

  /** Names of all configured regions (used to list divisions in the UI). */
  regionNames(): string[] {
    return Array.from(new Set(this.entries.map(e => e.name)));
  }
}

/**
 * True if a classification result is usable for matching.
 */
export function isSupportedRegionSet(regions: string[]): boolean {
  return regions.length > 0 && !regions.includes(UNKNOWN_REGION);
}
