import type { SolarWindow, SunTimes } from "./types.js";

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const dayOfYear = (date: Date): number =>
  Math.floor((date.getTime() - Date.UTC(date.getUTCFullYear(), 0, 1)) / MS_PER_DAY);

export const calculateSunTimes = (date: Date, latitude: number, longitude: number): SunTimes => {
  // Solar declination angle (in radians)
  const declinationRad =
    (23.45 * Math.PI) /
    180 *
    Math.sin((2 * Math.PI * (284 + dayOfYear(date))) / 365);

  const latRad = (latitude * Math.PI) / 180;

  // cos(hourAngle) = -tan(lat) * tan(declination)
  const cosHourAngle = -Math.tan(latRad) * Math.tan(declinationRad);

  // The sun crosses the local meridian 4 minutes earlier per degree east.
  const solarNoon = 12 - longitude / 15;

  // Polar night - no sunrise/sunset
  if (cosHourAngle >= 1) {
    return { sunrise: solarNoon, sunset: solarNoon, solarNoon };
  }
  // Polar day - sun always up
  if (cosHourAngle <= -1) {
    return { sunrise: solarNoon - 12, sunset: solarNoon + 12, solarNoon };
  }

  // Hour angle increases by 15 degrees per hour
  const halfDaylight = (Math.acos(cosHourAngle) * 180) / Math.PI / 15;

  return {
    sunrise: solarNoon - halfDaylight,
    sunset: solarNoon + halfDaylight,
    solarNoon,
  };
};

export const solarWindowAt = (at: Date, latitude: number, longitude: number): SolarWindow => {
  const { sunrise, sunset, solarNoon } = calculateSunTimes(at, latitude, longitude);
  const halfDaylight = (sunset - sunrise) / 2;

  const utcHour = at.getUTCHours() + at.getUTCMinutes() / 60 + at.getUTCSeconds() / 3600;
  // Signed distance from solar noon in [-12, 12)
  const hoursFromNoon = ((((utcHour - solarNoon + 12) % 24) + 24) % 24) - 12;

  if (halfDaylight > 0 && Math.abs(hoursFromNoon) <= halfDaylight) {
    return "solar";
  }

  return hoursFromNoon < 0 ? "pre_solar" : "post_solar";
};
