/**
 * DistanceCalculator
 * Great-circle distances using the Haversine formula, in kilometers
 */

import type { Coordinates } from '../types.js';

export class DistanceCalculator {
  private readonly EARTH_RADIUS_KM = 6371;

  /**
   * Haversine distance between two coordinates
   *
   * Examples:
   * - Same point: 0
   * - Marienplatz (48.1374, 11.5755) to Englischer Garten (48.1642, 11.6056): ~3.6 km
   */
  haversine(lat1: number, lon1: number, lat2: number, lon2: number): number {
    const dLat = this.toRadians(lat2 - lat1);
    const dLon = this.toRadians(lon2 - lon1);

    const a =
      Math.sin(dLat / 2) * Math.sin(dLat / 2) +
      Math.cos(this.toRadians(lat1)) *
      Math.cos(this.toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
    return this.EARTH_RADIUS_KM * c;
  }

  between(from: Coordinates, to: Coordinates): number {
    return this.haversine(from.lat, from.lng, to.lat, to.lng);
  }

  private toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
  }
}

export const distanceCalculator = new DistanceCalculator();
