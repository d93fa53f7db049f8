/**
 * Registry of configured template sources
 */

import type { RegistryEntry } from '../types/template.js';
import { ConfigurationError } from '../errors.js';

export class Registry {
  private readonly ordered: readonly RegistryEntry[];

  constructor(readonly entries: readonly RegistryEntry[]) {
    const names = new Set<string>();
    for (const entry of entries) {
      if (names.has(entry.name)) {
        throw new ConfigurationError(`Duplicate registry name "${entry.name}"`, { name: entry.name });
      }
      names.add(entry.name);
    }

    // Array.prototype.sort is stable, so config order breaks priority ties
    this.ordered = Object.freeze(
      entries.filter(entry => entry.enabled).sort((a, b) => a.priority - b.priority)
    );
  }

  /**
   * Enabled entries in ascending priority order
   */
  enabledEntries(): readonly RegistryEntry[] {
    return this.ordered;
  }
}
