import { readdirSync, readFileSync, realpathSync, statSync, type Stats } from "node:fs";
import { join, resolve } from "node:path";
import { LocalisationError, describeError } from "../common/errors.js";
import { tryParseLocaleTag, type LocaleId } from "../common/langid.js";
import type { Logger } from "../utils/logger.js";
import { LocaleRegistry, type ResourceBundle, type SkippedEntry } from "./registry.js";

export const DEFAULT_EXTENSION = ".ftl";

export type LoadOptions = {
  /** 资源文件扩展名，默认 ".ftl" */
  extension?: string;
  logger?: Logger;
};

export type LoadResult = {
  registry: LocaleRegistry;
  skipped: SkippedEntry[];
};

type LoadContext = {
  extension: string;
  logger?: Logger;
  bundles: Map<LocaleId, ResourceBundle[]>;
  skipped: SkippedEntry[];
};

export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

function relPath(...parts: string[]): string {
  return parts.join("/");
}

function skip(ctx: LoadContext, entry: SkippedEntry): void {
  ctx.skipped.push(entry);
  const text = `跳过 ${entry.path}（${entry.reason}）：${entry.message}`;
  if (entry.reason === "language-identifier") ctx.logger?.debug(text);
  else ctx.logger?.warn(text);
}

function statOrSkip(ctx: LoadContext, full: string, path: string, locale?: LocaleId): Stats | null {
  try {
    return statSync(full);
  } catch (e) {
    skip(ctx, { path, reason: "io", message: describeError(e), ...(locale ? { locale } : {}) });
    return null;
  }
}

/** 不带扩展名的条目只有是目录时才有意义，stat 失败不记入诊断 */
function statEntry(ctx: LoadContext, full: string, path: string, isResource: boolean, locale?: LocaleId): Stats | null {
  if (isResource) return statOrSkip(ctx, full, path, locale);
  try {
    return statSync(full);
  } catch {
    return null;
  }
}

function readResource(ctx: LoadContext, full: string, path: string, locale: LocaleId): void {
  let source: string;
  try {
    source = readFileSync(full, "utf8");
  } catch (e) {
    skip(ctx, { path, reason: "io", message: describeError(e), locale });
    return;
  }
  if (source.charCodeAt(0) === 0xfeff) source = source.slice(1);
  if (source.trim().length === 0) {
    skip(ctx, { path, reason: "empty", message: "文件内容为空", locale });
    return;
  }

  const list = ctx.bundles.get(locale);
  const bundle: ResourceBundle = { locale, path, source };
  if (list) list.push(bundle);
  else ctx.bundles.set(locale, [bundle]);
}

function sortedNames(dir: string): string[] {
  return readdirSync(dir)
    .filter((name) => !name.startsWith("."))
    .sort();
}

/** 递归读取语言目录下的所有资源文件；跟随符号链接，按真实路径去重以避免环 */
function walkLocaleDir(ctx: LoadContext, dir: string, path: string, locale: LocaleId, visited: Set<string>): void {
  let names: string[];
  try {
    const real = realpathSync(dir);
    if (visited.has(real)) return;
    visited.add(real);
    names = sortedNames(dir);
  } catch (e) {
    skip(ctx, { path, reason: "io", message: describeError(e), locale });
    return;
  }

  for (const name of names) {
    const full = join(dir, name);
    const childPath = relPath(path, name);
    const isResource = name.endsWith(ctx.extension);
    const st = statEntry(ctx, full, childPath, isResource, locale);
    if (!st) continue;
    if (st.isDirectory()) walkLocaleDir(ctx, full, childPath, locale, visited);
    else if (st.isFile() && isResource) readResource(ctx, full, childPath, locale);
  }
}

function readRootNames(rootDir: string): string[] {
  let st: Stats;
  try {
    st = statSync(rootDir);
  } catch (e) {
    throw new LocalisationError("io", `无法访问语言资源目录 ${rootDir}：${describeError(e)}`, { path: rootDir, cause: e });
  }
  if (!st.isDirectory()) {
    throw new LocalisationError("io", `语言资源路径不是目录：${rootDir}`, { path: rootDir });
  }
  try {
    return sortedNames(rootDir);
  } catch (e) {
    throw new LocalisationError("io", `无法读取语言资源目录 ${rootDir}：${describeError(e)}`, { path: rootDir, cause: e });
  }
}

/**
 * 读取根目录下的语言资源。
 *
 * 根目录的直接子项中，目录和带资源扩展名的文件会被视为候选；其名称（文件去掉扩展名）必须是合法的语言标识。
 * 目录会被递归读取，其中所有资源文件归入同一语言。单个条目读取失败只会记入 `skipped`，
 * 只有根目录本身不可读时才会抛出 `io` 错误。
 */
export function loadLocales(root: string, options: LoadOptions = {}): LoadResult {
  const rootDir = resolve(root);
  const ctx: LoadContext = {
    extension: normalizeExtension(options.extension ?? DEFAULT_EXTENSION),
    logger: options.logger,
    bundles: new Map(),
    skipped: []
  };

  for (const name of readRootNames(rootDir)) {
    const full = join(rootDir, name);
    const isResource = name.endsWith(ctx.extension);
    const st = statEntry(ctx, full, name, isResource);
    if (!st) continue;

    const isDir = st.isDirectory();
    if (!isDir && !(st.isFile() && isResource)) continue;

    const stem = isDir ? name : name.slice(0, -ctx.extension.length);
    const locale = tryParseLocaleTag(stem);
    if (locale === null) {
      skip(ctx, { path: name, reason: "language-identifier", message: `无效的语言标识：${JSON.stringify(stem)}` });
      continue;
    }

    if (isDir) walkLocaleDir(ctx, full, name, locale, new Set());
    else readResource(ctx, full, name, locale);
  }

  const registry = new LocaleRegistry(ctx.bundles);
  ctx.logger?.info(`已从 ${rootDir} 加载 ${registry.size} 种语言，跳过 ${ctx.skipped.length} 项`);
  return { registry, skipped: ctx.skipped };
}
