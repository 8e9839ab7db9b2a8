interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClock(at: Date, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(at);

  const map: Record<string, number> = {};
  for (const part of parts) {
    if (part.type !== 'literal') {
      map[part.type] = Number(part.value);
    }
  }
  return {
    year: map.year,
    month: map.month,
    day: map.day,
    hour: map.hour,
    minute: map.minute,
    second: map.second,
  };
}

/** Milliseconds the zone's wall clock runs ahead of UTC at `at`. */
function zoneOffsetMs(at: Date, timeZone: string): number {
  const wall = wallClock(at, timeZone);
  const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return wallAsUtc - Math.floor(at.getTime() / 1000) * 1000;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format(new Date());
    return true;
  } catch {
    return false;
  }
}

/**
 * Midnight of the day `now` falls on in `timeZone`, or in the server's own
 * zone when none is given.
 */
export function startOfDay(now: Date, timeZone?: string): Date {
  if (!timeZone) {
    return new Date(now.getFullYear(), now.getMonth(), now.getDate());
  }

  const { year, month, day } = wallClock(now, timeZone);
  const midnightAsUtc = Date.UTC(year, month - 1, day);
  // The offset at midnight differs from the current one across a DST change
  const estimate = new Date(midnightAsUtc - zoneOffsetMs(now, timeZone));
  return new Date(midnightAsUtc - zoneOffsetMs(estimate, timeZone));
}
