/**
 * Hidden calendars and objects: still stored by their backend, no longer
 * listed by the federation. Used when a backend cannot delete.
 *
 * @module federation/visibility
 */

export interface VisibilityStore {
  hideCalendar(calendarId: string): void
  hideObject(objectId: string): void
  isCalendarHidden(calendarId: string): boolean
  isObjectHidden(objectId: string): boolean
}

export class MemoryVisibilityStore implements VisibilityStore {
  private calendars = new Set<string>()
  private objects = new Set<string>()

  hideCalendar(calendarId: string): void {
    this.calendars.add(calendarId)
  }

  hideObject(objectId: string): void {
    this.objects.add(objectId)
  }

  isCalendarHidden(calendarId: string): boolean {
    return this.calendars.has(calendarId)
  }

  isObjectHidden(objectId: string): boolean {
    return this.objects.has(objectId)
  }
}
