/**
 * Location Tracker
 *
 * Diagnostic side table from a declaration-site tag (e.g. "Database#port")
 * to the settings declared there. Resolution never consults it.
 */

export class LocationTracker<S extends object = object> {
  private readonly byLocation = new Map<string, Set<S>>()
  private readonly bySetting = new WeakMap<S, Set<string>>()

  record(location: string, setting: S): void {
    let settings = this.byLocation.get(location)
    if (!settings) {
      settings = new Set()
      this.byLocation.set(location, settings)
    }
    settings.add(setting)

    let locations = this.bySetting.get(setting)
    if (!locations) {
      locations = new Set()
      this.bySetting.set(setting, locations)
    }
    locations.add(location)
  }

  settingsAt(location: string): S[] {
    return Array.from(this.byLocation.get(location) ?? [])
  }

  locationsOf(setting: S): string[] {
    return Array.from(this.bySetting.get(setting) ?? [])
  }

  /** All recorded location tags, in first-recorded order */
  locations(): string[] {
    return Array.from(this.byLocation.keys())
  }

  /** Drop setting from every location it was recorded at */
  forget(setting: S): void {
    for (const location of this.bySetting.get(setting) ?? []) {
      const settings = this.byLocation.get(location)
      settings?.delete(setting)
      if (settings?.size === 0) this.byLocation.delete(location)
    }
    this.bySetting.delete(setting)
  }

  clear(): void {
    for (const [location, settings] of this.byLocation) {
      for (const setting of settings) {
        this.bySetting.get(setting)?.delete(location)
      }
    }
    this.byLocation.clear()
  }
}
