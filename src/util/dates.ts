// src/util/dates.ts
import type { Faker } from "@faker-js/faker";

const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * `YYYY-MM-DD HH:MM:SS+00`. The offset is written out so TIMESTAMPTZ columns
 * store the same instant whatever the session's TimeZone is.
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")}+00`;
}

/** `YYYY-MM-DD`, UTC */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Random instant between `now + fromDays` and `now + toDays`.
 */
export function dateBetween(
  faker: Faker,
  now: Date,
  fromDays: number,
  toDays: number,
): Date {
  return faker.date.between({
    from: addDays(now, fromDays),
    to: addDays(now, toDays),
  });
}
