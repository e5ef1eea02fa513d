export type Coordinates = {
  readonly latitude: number;
  readonly longitude: number;
};

export const DEFAULT_COORDINATES: Coordinates = { latitude: 51.29, longitude: 22.82 };

const parseDegrees = (raw: string, limit: number): number | null => {
  const trimmed = raw.trim();
  if (trimmed === "") {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) && Math.abs(value) <= limit ? value : null;
};

/** Parses `"lat, lon"`; `null` when the text is not exactly two numbers in range. */
export const parseCoordinates = (raw: string): Coordinates | null => {
  const parts = raw.split(",");
  if (parts.length !== 2) {
    return null;
  }

  const latitude = parseDegrees(parts[0] ?? "", 90);
  const longitude = parseDegrees(parts[1] ?? "", 180);

  if (latitude === null || longitude === null) {
    return null;
  }

  return { latitude, longitude };
};
