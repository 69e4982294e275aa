/**
 * Geocoding Utilities
 *
 * Turns a free-text pickup address into coordinates so it can be
 * classified into a region. Two implementations are provided:
 * 1. GoogleMapsGeocoder - Uses @googlemaps/google-maps-services-js (requires API key)
 * 2. MockGeocoder - Deterministic fake coordinates inside the service area
 */

import { Client, Status } from '@googlemaps/google-maps-services-js';
import { Coordinates } from '../models/types';
import { stableHash } from './hash';

// =============================================================================
// SERVICE INTERFACE
// =============================================================================

/**
 * Anything that can convert an address to coordinates.
 * null means the address could not be found.
 */
export interface GeocodeProvider {
  geocode(address: string): Promise<Coordinates | null>;
}

// =============================================================================
// GOOGLE MAPS GEOCODER
// Uses the official @googlemaps/google-maps-services-js client.
// Requires a valid API key with the Geocoding API enabled.
// =============================================================================

export class GoogleMapsGeocoder implements GeocodeProvider {
  private client: Client;
  private apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
    this.client = new Client();
  }

  async geocode(address: string): Promise<Coordinates | null> {
    try {
      const res = await this.client.geocode({
        params: { address, key: this.apiKey },
      });

      if (res.data.status !== Status.OK || !res.data.results?.[0]) {
        console.warn(`[Geocoding] No result for "${address}": ${res.data.status}`);
        return null;
      }

      const { lat, lng } = res.data.results[0].geometry.location;
      return { lat, lng };
    } catch (error) {
      // An API failure is reported the same way as an unknown address
      console.error(`[Geocoding] Request failed for "${address}":`, error);
      return null;
    }
  }
}

// =============================================================================
// MOCK GEOCODER
// Fake implementation for development without API calls.
// Same address always lands on the same point inside the service area.
// =============================================================================

/** Bounding box of the shipped region table */
const SERVICE_AREA = {
  latMin: 42.26433,
  latMax: 42.286811,
  lngMin: -83.747954,
  lngMax: -83.722809
};

export class MockGeocoder implements GeocodeProvider {
  async geocode(address: string): Promise<Coordinates | null> {
    const normalized = address.trim().toLowerCase();
    if (!normalized) return null;

    const hash = stableHash(normalized);
    const latSpan = SERVICE_AREA.latMax - SERVICE_AREA.latMin;
    const lngSpan = SERVICE_AREA.lngMax - SERVICE_AREA.lngMin;

    return {
      lat: SERVICE_AREA.latMin + ((hash % 1000) / 1000) * latSpan,
      lng: SERVICE_AREA.lngMin + ((Math.floor(hash / 1000) % 1000) / 1000) * lngSpan
    };
  }
}
