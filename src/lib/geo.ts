/**
 * Geodesy helpers shared by the path generator, the recommender and every exporter.
 *
 * Two models live here on purpose side by side:
 * - a spherical earth (mean radius) for great-circle offsets, bearings and distances;
 * - the WGS84 ellipsoid for ECEF and the east-north-up local tangent frame.
 *
 * Anything that previews or composites a shot must go through LocalTangentFrame
 * so metric offsets agree across tools.
 */

export const EARTH_RADIUS_M = 6_371_008.8;

export const WGS84_A = 6_378_137.0;
export const WGS84_F = 1 / 298.257223563;
export const WGS84_B = WGS84_A * (1 - WGS84_F);
export const WGS84_E2 = 2 * WGS84_F - WGS84_F * WGS84_F;

export interface LatLng {
  lat: number;
  lng: number;
}

export interface Geodetic extends LatLng {
  altM: number;
}

export interface Ecef {
  x: number;
  y: number;
  z: number;
}

export interface Enu {
  east: number;
  north: number;
  up: number;
}

export const toRad = (deg: number): number => (deg * Math.PI) / 180;
export const toDeg = (rad: number): number => (rad * 180) / Math.PI;

/** Normalize into [0, 360). */
export function normalizeHeading(deg: number): number {
  let r = deg % 360;
  if (r < 0) r += 360;
  if (r >= 360) r = 0;
  // -0 -> 0
  return r + 0;
}

/** Wrap a longitude into [-180, 180). */
export function normalizeLongitude(deg: number): number {
  return normalizeHeading(deg + 180) - 180;
}

/** Signed smallest rotation from a to b, in (-180, 180]. */
export function angleDelta(a: number, b: number): number {
  const d = normalizeHeading(b - a);
  return d > 180 ? d - 360 : d;
}

export function haversineM(a: LatLng, b: LatLng): number {
  const lat1 = toRad(a.lat);
  const lat2 = toRad(b.lat);
  const dLat = lat2 - lat1;
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/** Initial great-circle bearing from a to b, degrees in [0, 360). */
export function bearingDeg(a: LatLng, b: LatLng): number {
  const lat1 = toRad(a.lat);
  const lat2 = toRad(b.lat);
  const dLng = toRad(b.lng - a.lng);
  const y = Math.sin(dLng) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);
  return normalizeHeading(toDeg(Math.atan2(y, x)));
}

/** Point reached travelling `distanceM` from `origin` on the initial bearing `bearing`. */
export function destinationPoint(origin: LatLng, bearing: number, distanceM: number): LatLng {
  if (distanceM === 0) return { lat: origin.lat, lng: origin.lng };

  const delta = distanceM / EARTH_RADIUS_M;
  const theta = toRad(bearing);
  const lat1 = toRad(origin.lat);
  const lng1 = toRad(origin.lng);

  const sinLat2 =
    Math.sin(lat1) * Math.cos(delta) + Math.cos(lat1) * Math.sin(delta) * Math.cos(theta);
  const lat2 = Math.asin(Math.max(-1, Math.min(1, sinLat2)));
  const lng2 =
    lng1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(delta) * Math.cos(lat1),
      Math.cos(delta) - Math.sin(lat1) * Math.sin(lat2),
    );

  return { lat: toDeg(lat2), lng: normalizeLongitude(toDeg(lng2)) };
}

export function geodeticToEcef(p: Geodetic): Ecef {
  const lat = toRad(p.lat);
  const lng = toRad(p.lng);
  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const n = WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
  return {
    x: (n + p.altM) * cosLat * Math.cos(lng),
    y: (n + p.altM) * cosLat * Math.sin(lng),
    z: (n * (1 - WGS84_E2) + p.altM) * sinLat,
  };
}

export function ecefToGeodetic(e: Ecef): Geodetic {
  const lng = Math.atan2(e.y, e.x);
  const p = Math.sqrt(e.x * e.x + e.y * e.y);
  let lat = Math.atan2(e.z, p * (1 - WGS84_E2));

  for (let i = 0; i < 12; i++) {
    const sinLat = Math.sin(lat);
    const n = WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
    lat = Math.atan2(e.z + WGS84_E2 * n * sinLat, p);
  }

  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const n = WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
  const altM = Math.abs(cosLat) > 1e-10 ? p / cosLat - n : Math.abs(e.z) - WGS84_B;

  return { lat: toDeg(lat), lng: toDeg(lng), altM };
}

/**
 * East-north-up frame anchored at a geodetic point (WGS84).
 * toLocal / toGeodetic are exact inverses up to the ECEF iteration tolerance.
 */
export class LocalTangentFrame {
  readonly anchor: Geodetic;
  private readonly origin: Ecef;
  private readonly sinLat: number;
  private readonly cosLat: number;
  private readonly sinLng: number;
  private readonly cosLng: number;

  constructor(anchor: Geodetic) {
    this.anchor = { lat: anchor.lat, lng: anchor.lng, altM: anchor.altM };
    this.origin = geodeticToEcef(anchor);
    this.sinLat = Math.sin(toRad(anchor.lat));
    this.cosLat = Math.cos(toRad(anchor.lat));
    this.sinLng = Math.sin(toRad(anchor.lng));
    this.cosLng = Math.cos(toRad(anchor.lng));
  }

  toLocal(p: Geodetic): Enu {
    const e = geodeticToEcef(p);
    const dx = e.x - this.origin.x;
    const dy = e.y - this.origin.y;
    const dz = e.z - this.origin.z;
    return {
      east: -this.sinLng * dx + this.cosLng * dy,
      north: -this.sinLat * this.cosLng * dx - this.sinLat * this.sinLng * dy + this.cosLat * dz,
      up: this.cosLat * this.cosLng * dx + this.cosLat * this.sinLng * dy + this.sinLat * dz,
    };
  }

  toGeodetic(v: Enu): Geodetic {
    const dx =
      -this.sinLng * v.east - this.sinLat * this.cosLng * v.north + this.cosLat * this.cosLng * v.up;
    const dy =
      this.cosLng * v.east - this.sinLat * this.sinLng * v.north + this.cosLat * this.sinLng * v.up;
    const dz = this.cosLat * v.north + this.sinLat * v.up;
    return ecefToGeodetic({
      x: this.origin.x + dx,
      y: this.origin.y + dy,
      z: this.origin.z + dz,
    });
  }
}
