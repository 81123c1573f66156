import { type MorphConfig, type MorphConfigUpdate, defaultConfig } from '../types/config.js';
import { setLogLevel } from '../logger.js';

/**
 * Process-wide configuration singleton.
 * Holds the defaults every morph falls back to when no per-element or per-segment override is given.
 */
export class SettingsClass {
  private static _instance: SettingsClass | null = null;

  private _config: MorphConfig = defaultConfig();

  /** Path of the last config file loaded or saved, if any. */
  public sourcePath: string | null = null;

  private constructor() {
    // Singleton; use SettingsClass.instance()
  }

  /**
   * Returns the singleton SettingsClass instance.
   */
  static instance(): SettingsClass {
    if (SettingsClass._instance === null) {
      SettingsClass._instance = new SettingsClass();
    }
    return SettingsClass._instance;
  }

  /**
   * Resets the singleton for testing. Restores defaults and the default log level.
   */
  static reset(): void {
    SettingsClass._instance = null;
    setLogLevel(defaultConfig().logging.level);
  }

  get config(): Readonly<MorphConfig> {
    return this._config;
  }

  /**
   * Deep-merges a partial config over the current one and applies the log level.
   */
  update(update: MorphConfigUpdate): MorphConfig {
    const current = this._config;
    this._config = {
      morphing: {
        ...current.morphing,
        ...update.morphing,
        clustering: {
          ...current.morphing.clustering,
          ...update.morphing?.clustering,
        },
      },
      state: { ...current.state, ...update.state },
      logging: { ...current.logging, ...update.logging },
    };
    setLogLevel(this._config.logging.level);
    return this.toJSON();
  }

  toJSON(): MorphConfig {
    return structuredClone(this._config);
  }
}

/**
 * Convenience accessor for the settings singleton.
 */
export function getSettings(): SettingsClass {
  return SettingsClass.instance();
}
