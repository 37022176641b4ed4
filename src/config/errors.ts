export type ConfigurationIssue =
  | "invalid_option"
  | "invalid_url_template"
  | "invalid_profile";

/**
 * Raised before any page task starts. Nothing else in a run is allowed to
 * escape as an exception.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issue: ConfigurationIssue,
    readonly detail?: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}
