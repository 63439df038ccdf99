export { LocalisationError, isLocalisationError } from "./common/errors.js";
export type { LocalisationErrorKind, LocalisationErrorOptions } from "./common/errors.js";
export { parseLocaleId, tryParseLocaleId, tryParseLocaleTag, localeFromEnv } from "./common/langid.js";
export type { LocaleId } from "./common/langid.js";
export { LocaleRegistry } from "./loader/registry.js";
export type { ResourceBundle, SkippedEntry, SkipReason, RegistrySnapshot } from "./loader/registry.js";
export { loadLocales, DEFAULT_EXTENSION } from "./loader/resourceLoader.js";
export type { LoadOptions, LoadResult } from "./loader/resourceLoader.js";
export { Localiser, Language, tl } from "./localiser/localiser.js";
export type { LocaliserOptions, MessageArgs } from "./localiser/localiser.js";
export { resolveConfig, loadConfigFile, loadEnvConfig, mergeConfig, defaultConfig } from "./utils/config.js";
export type { LocaliserConfig, ResolveConfigOptions } from "./utils/config.js";
export { Logger } from "./utils/logger.js";
export type { LogLevel, LoggerOptions, LogSink } from "./utils/logger.js";
