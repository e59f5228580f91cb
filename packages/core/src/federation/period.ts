import type { CalendarObject } from './types.js'

/**
 * Whether an object's time bounds intersect [start, end], both ends inclusive.
 * An object with only one bound is treated as an instant; one with none never
 * matches.
 */
export function overlapsPeriod(object: CalendarObject, start: Date, end: Date): boolean {
  const from = object.start ?? object.end
  const to = object.end ?? object.start
  if (!from || !to) return false
  return from.getTime() <= end.getTime() && to.getTime() >= start.getTime()
}

export function filterByPeriod<T extends CalendarObject>(objects: T[], start: Date, end: Date): T[] {
  return objects.filter((object) => overlapsPeriod(object, start, end))
}
