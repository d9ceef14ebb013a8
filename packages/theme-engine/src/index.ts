/**
 * Library exports for @apisite/theme-engine
 */

// Theme resolution
export {
  loadTheme,
  getThemesDirectory,
  templateNameOf,
  ThemeAccumulator,
  BUILTIN_THEMES_DIR,
  type Theme,
  type LoadThemeOptions,
} from "./theme.js";

// Theme declarations
export {
  readThemeConfig,
  parseThemeConfig,
  createThemeConfigSchema,
  formatIssue,
  themeMetadataSchema,
  THEME_FILE_NAME,
  DEFAULT_SCRIPT_TARGET,
  DEFAULT_STYLE_TARGET,
  type ThemeConfig,
  type ThemeMetadata,
  type BundleDeclaration,
} from "./theme-config.js";

// Parameters
export {
  validateParameter,
  validateParameterValue,
  defineThemeParameter,
  parameterValidators,
  describeValueKind,
  isPlainObject,
  isUriReference,
  THEME_PARAMETER_TYPE,
  type ThemeParameter,
  type ThemeParameterType,
  type ParameterValue,
  type ParameterResult,
  type ThemeParameterResult,
} from "./parameter.js";

// Per-build settings
export { resolveThemeVariables, type Logger, type ThemeSettingsOptions } from "./settings.js";

export { summarizeTheme, formatThemeParameters, type ThemeSummary } from "./theme-summary.js";

// File matching
export { findMatchingFiles, addExtensionIfMissing, splitPatterns } from "./glob-filter.js";

export { CaseInsensitiveMap, type ReadonlyCaseInsensitiveMap } from "./case-insensitive-map.js";

export {
  SiteError,
  ThemeNotFoundError,
  ThemeValidationError,
  CircularThemeError,
  ParameterFormatError,
} from "./errors.js";
