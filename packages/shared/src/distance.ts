import type { Coordinates } from "./contracts.js";

const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

export const haversineDistanceKm = (from: Coordinates, to: Coordinates): number => {
  const deltaLatitude = toRadians(to.latitude - from.latitude);
  const deltaLongitude = toRadians(to.longitude - from.longitude);
  const intermediateResult =
    Math.sin(deltaLatitude / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      Math.sin(deltaLongitude / 2) ** 2;

  const centralAngle =
    2 * Math.atan2(Math.sqrt(intermediateResult), Math.sqrt(1 - intermediateResult));
  return EARTH_RADIUS_KM * centralAngle;
};

export const roundDistanceKm = (distanceKm: number): number =>
  Math.round(distanceKm * 100) / 100;

export const hasCoordinates = <T extends { latitude: number | null; longitude: number | null }>(
  value: T
): value is T & Coordinates => value.latitude !== null && value.longitude !== null;
