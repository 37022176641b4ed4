export { getEnv, isProduction, LOG_LEVELS, parseEnv, type RuntimeEnv } from "./env.js";
export { ConfigurationError, type ConfigurationIssue } from "./errors.js";
export {
  resolveRunOptions,
  runOverridesSchema,
  type RunOptions,
  type RunOverrides,
} from "./run-options.js";
export {
  DEFAULT_PROFILE_PATH,
  loadSiteProfile,
  parseSiteProfile,
  siteProfileSchema,
  type FieldSelector,
  type SiteProfile,
} from "./site-profile.js";
