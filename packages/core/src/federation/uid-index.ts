/**
 * Maps bare UIDs to the composite identifier they were last seen under.
 * Filled as objects are observed; entries are never invalidated, so a lookup
 * is best-effort.
 */
export class UidIndex {
  private map = new Map<string, string>()

  record(uid: string, objectId: string): void {
    this.map.set(uid, objectId)
  }

  resolve(uid: string): string | undefined {
    return this.map.get(uid)
  }

  get size(): number {
    return this.map.size
  }
}
