const FEET_PER_MILE = 5280;
const KM_PER_MILE = 1.60934;

export function formatDistance(feet: number, forceFeet = false): string {
  if (feet >= FEET_PER_MILE && !forceFeet) {
    return `${(feet / FEET_PER_MILE).toFixed(1)} mi`;
  }
  return `${feet.toFixed(1)} ft`;
}

/** Pace in min/mile as M'SS", truncating partial seconds */
export function formatPace(minutesPerMile: number): string {
  const totalSeconds = Math.trunc(minutesPerMile * 60);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}'${String(seconds).padStart(2, '0')}"`;
}

export function kphToMinPerMile(kph: number): number {
  const milesPerHour = kph / KM_PER_MILE;
  return milesPerHour !== 0 ? 60 / milesPerHour : 0;
}
