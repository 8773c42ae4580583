/**
 * Environment variable access.
 *
 * Use Env.get() instead of process.env throughout the codebase so tests can
 * override variables without touching the real environment.
 */

import process from 'node:process';

export class Env {
  private static overrides = new Map<string, string | undefined>();

  /**
   * Get env var value (fresh value each call).
   * Returns undefined if the var is unset.
   */
  static get(name: string): string | undefined {
    if (this.overrides.has(name)) {
      return this.overrides.get(name);
    }
    return process.env[name];
  }

  /**
   * Check if env var exists.
   */
  static has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Names of the TOAD_* variables currently set.
   */
  static toadKeys(): string[] {
    const names = new Set(Object.keys(process.env).filter(name => name.startsWith('TOAD_')));
    for (const [name, value] of this.overrides) {
      if (!name.startsWith('TOAD_')) continue;
      if (value === undefined) names.delete(name);
      else names.add(name);
    }
    return [...names].sort();
  }

  /** Shadow a variable; `undefined` hides a real one. */
  static override(name: string, value: string | undefined): void {
    this.overrides.set(name, value);
  }

  /** Drop every override (for testing) */
  static resetOverrides(): void {
    this.overrides.clear();
  }
}
