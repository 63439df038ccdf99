import { readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import yaml from "js-yaml";
import { LocalisationError, describeError, errnoCode } from "../common/errors.js";
import { tryParseLocaleId } from "../common/langid.js";
import { parseLevel, type LogLevel } from "./logger.js";

export type LocaliserConfig = {
  locales_dir: string;
  default_language: string;
  use_isolating: boolean;
  extension: string;
  log_level: LogLevel;
};

export const CONFIG_FILE_NAME = "fluently.yml";

export type ResolveConfigOptions = {
  /** 默认取 FLUENTLY_CONFIG，其次为 <cwd>/fluently.yml */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  overrides?: Partial<LocaliserConfig>;
};

export function defaultConfig(cwd: string = process.cwd()): LocaliserConfig {
  return {
    locales_dir: join(cwd, "locales"),
    default_language: "en-US",
    use_isolating: false,
    extension: ".ftl",
    log_level: "INFO"
  };
}

export function parseBool(value: string): boolean | null {
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function validLanguage(value: unknown): string | undefined {
  const s = nonEmpty(value);
  return s !== undefined ? tryParseLocaleId(s) ?? undefined : undefined;
}

function validLevel(value: unknown): LogLevel | undefined {
  const s = nonEmpty(value);
  if (s === undefined) return undefined;
  const level = parseLevel(s, "INFO");
  return level === s.toUpperCase() ? level : undefined;
}

/** 读取 YAML 配置；文件不存在时返回空对象，相对路径以配置文件所在目录为基准 */
export function loadConfigFile(configPath: string): Partial<LocaliserConfig> {
  let text: string;
  try {
    text = readFileSync(configPath, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") return {};
    throw new LocalisationError("io", `无法读取配置文件 ${configPath}：${describeError(e)}`, { path: configPath, cause: e });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new LocalisationError("io", `配置文件格式错误 ${configPath}：${describeError(e)}`, { path: configPath, cause: e });
  }
  if (!isRecord(raw)) return {};
  const doc = raw;

  const read = (keys: readonly string[]): unknown => {
    for (const k of keys) {
      if (Object.prototype.hasOwnProperty.call(doc, k)) return doc[k];
    }
    return undefined;
  };

  const out: Partial<LocaliserConfig> = {};

  const dir = nonEmpty(read(["locales_dir", "LOCALES_DIR"]));
  if (dir) out.locales_dir = isAbsolute(dir) ? dir : resolve(dirname(configPath), dir);

  const lang = validLanguage(read(["default_language", "DEFAULT_LANGUAGE"]));
  if (lang) out.default_language = lang;

  const isolating = read(["use_isolating", "USE_ISOLATING"]);
  if (typeof isolating === "boolean") out.use_isolating = isolating;

  const ext = nonEmpty(read(["extension", "EXTENSION"]));
  if (ext) out.extension = ext;

  const level = validLevel(read(["log_level", "LOG_LEVEL"]));
  if (level) out.log_level = level;

  return out;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Partial<LocaliserConfig> {
  const out: Partial<LocaliserConfig> = {};

  const dir = nonEmpty(env.FLUENTLY_LOCALES_DIR);
  if (dir) out.locales_dir = resolve(cwd, dir);

  const lang = validLanguage(env.FLUENTLY_DEFAULT_LANG);
  if (lang) out.default_language = lang;

  const isolating = env.FLUENTLY_USE_ISOLATING !== undefined ? parseBool(env.FLUENTLY_USE_ISOLATING) : null;
  if (isolating !== null) out.use_isolating = isolating;

  const ext = nonEmpty(env.FLUENTLY_EXTENSION);
  if (ext) out.extension = ext;

  const level = validLevel(env.LOG_LEVEL);
  if (level) out.log_level = level;

  return out;
}

export function mergeConfig(base: LocaliserConfig, override: Partial<LocaliserConfig>): LocaliserConfig {
  return {
    locales_dir: override.locales_dir ?? base.locales_dir,
    default_language: override.default_language ?? base.default_language,
    use_isolating: override.use_isolating ?? base.use_isolating,
    extension: override.extension ?? base.extension,
    log_level: override.log_level ?? base.log_level
  };
}

/** 默认值 < 配置文件 < 环境变量 < 显式覆盖 */
export function resolveConfig(options: ResolveConfigOptions = {}): LocaliserConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolve(cwd, options.configPath ?? nonEmpty(env.FLUENTLY_CONFIG) ?? CONFIG_FILE_NAME);

  const fileCfg = loadConfigFile(configPath);
  const envCfg = loadEnvConfig(env, cwd);
  return mergeConfig(mergeConfig(mergeConfig(defaultConfig(cwd), fileCfg), envCfg), options.overrides ?? {});
}
