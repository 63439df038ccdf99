import { LocalisationError } from "./errors.js";

/** 规范化后的 BCP-47 标签，例如 "en-US"、"zh-Hans-CN" */
export type LocaleId = string;

// en_US.UTF-8@euro -> en_US
function stripPosixSuffix(input: string): string {
  const at = input.indexOf("@");
  const noModifier = at >= 0 ? input.slice(0, at) : input;
  const dot = noModifier.indexOf(".");
  return dot >= 0 ? noModifier.slice(0, dot) : noModifier;
}

export function tryParseLocaleId(input: string): LocaleId | null {
  return tryParseLocaleTag(stripPosixSuffix(input.trim()));
}

/** 不去除 POSIX 后缀，"en-US.bak" 视为无效；用于文件与目录名 */
export function tryParseLocaleTag(input: string): LocaleId | null {
  const tag = input.trim().replace(/_/g, "-");
  if (!tag) return null;
  try {
    const [canonical] = Intl.getCanonicalLocales(tag);
    return canonical ?? null;
  } catch {
    return null;
  }
}

export function parseLocaleId(input: string): LocaleId {
  const id = tryParseLocaleId(input);
  if (id === null) {
    throw new LocalisationError("language-identifier", `无效的语言标识：${JSON.stringify(input)}`);
  }
  return id;
}

const ENV_LANG_KEYS = ["FLUENTLY_LANG", "LC_ALL", "LANG"] as const;

/** 按 FLUENTLY_LANG、LC_ALL、LANG 的顺序取第一个可用的语言；C / POSIX 视为未设置 */
export function localeFromEnv(env: NodeJS.ProcessEnv = process.env): LocaleId | null {
  for (const key of ENV_LANG_KEYS) {
    const raw = env[key]?.trim();
    if (!raw) continue;
    const base = stripPosixSuffix(raw);
    if (base === "C" || base === "POSIX") continue;
    const id = tryParseLocaleId(raw);
    if (id) return id;
  }
  return null;
}
