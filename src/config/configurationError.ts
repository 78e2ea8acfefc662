/**
 * ConfigurationError — raised when required settings are missing or unusable
 *
 * Thrown at construction time, before any network call.
 */
export class ConfigurationError extends Error {
  /** Name of the setting at fault (env var or option), when known */
  public readonly setting?: string;

  constructor(message: string, setting?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.setting = setting;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
