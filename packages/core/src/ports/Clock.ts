export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(instant: Date | number): Clock {
  const ms = typeof instant === "number" ? instant : instant.getTime();
  return { now: () => new Date(ms) };
}
