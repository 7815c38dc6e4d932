/** Error used for invalid or unreadable tolerance configuration. */
export class ConfigError extends Error {
  override name = "ConfigError";
}
