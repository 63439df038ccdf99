import { FluentBundle, FluentResource, type FluentVariable } from "@fluent/bundle";
import { negotiateLanguages } from "@fluent/langneg";
import { FluentParser, Junk } from "@fluent/syntax";
import { resolve } from "node:path";
import { LocalisationError } from "../common/errors.js";
import { parseLocaleId, tryParseLocaleId, type LocaleId } from "../common/langid.js";
import type { LocaleRegistry, SkippedEntry } from "../loader/registry.js";
import { loadLocales, type LoadOptions, type LoadResult } from "../loader/resourceLoader.js";
import type { LocaliserConfig } from "../utils/config.js";
import { Logger } from "../utils/logger.js";

export type MessageArgs = Record<string, FluentVariable>;

export type LocaliserOptions = LoadOptions & {
  /** 是否在占位符两侧插入 Unicode 隔离符，默认 false */
  useIsolating?: boolean;
};

type LocaliserState = {
  registry: LocaleRegistry;
  skipped: readonly SkippedEntry[];
  bundles: ReadonlyMap<LocaleId, FluentBundle>;
};

function splitKey(key: string): { id: string; attribute: string | null } {
  const dot = key.indexOf(".");
  if (dot < 0) return { id: key, attribute: null };
  return { id: key.slice(0, dot), attribute: key.slice(dot + 1) };
}

function buildState(root: string, defaultLanguage: LocaleId, options: LocaliserOptions): LocaliserState {
  const { registry, skipped } = loadLocales(root, options);
  const allSkipped: SkippedEntry[] = [...skipped];
  const bundles = new Map<LocaleId, FluentBundle>();
  const parser = new FluentParser({ withSpans: false });
  const report = (path: string, locale: LocaleId, message: string) => {
    allSkipped.push({ path, reason: "fluent", message, locale });
    options.logger?.warn(`${path}（${locale}）：${message}`);
  };

  for (const [locale, resources] of registry.entries()) {
    const bundle = new FluentBundle(locale, { useIsolating: options.useIsolating ?? false });
    for (const res of resources) {
      // FluentResource 会直接丢弃语法错误的条目，这里单独解析一遍取出错误
      for (const entry of parser.parse(res.source).body) {
        if (!(entry instanceof Junk)) continue;
        for (const annotation of entry.annotations) report(res.path, locale, annotation.message);
      }
      for (const err of bundle.addResource(new FluentResource(res.source))) {
        report(res.path, locale, err.message);
      }
    }
    bundles.set(locale, bundle);
  }

  if (!bundles.has(defaultLanguage)) {
    options.logger?.warn(`默认语言 ${defaultLanguage} 没有可用的资源`);
  }

  return { registry, skipped: allSkipped, bundles };
}

/**
 * 从目录加载的全部语言资源，以及按语言构建好的 FluentBundle。
 *
 * 请求的语言不存在时回退到默认语言；某条消息在请求语言中缺失时，同样会在默认语言中查找。
 */
export class Localiser {
  readonly root: string;
  readonly defaultLanguage: LocaleId;
  private readonly options: LocaliserOptions;
  private state: LocaliserState;

  private constructor(root: string, defaultLanguage: LocaleId, options: LocaliserOptions, state: LocaliserState) {
    this.root = root;
    this.defaultLanguage = defaultLanguage;
    this.options = options;
    this.state = state;
  }

  static load(root: string, defaultLanguage: string, options: LocaliserOptions = {}): Localiser {
    const lang = parseLocaleId(defaultLanguage);
    const dir = resolve(root);
    return new Localiser(dir, lang, options, buildState(dir, lang, options));
  }

  /** options 中显式给出的值优先于配置 */
  static fromConfig(config: LocaliserConfig, options: LocaliserOptions = {}): Localiser {
    return Localiser.load(config.locales_dir, config.default_language, {
      extension: options.extension ?? config.extension,
      useIsolating: options.useIsolating ?? config.use_isolating,
      logger: options.logger ?? new Logger({ minLevel: config.log_level })
    });
  }

  get registry(): LocaleRegistry {
    return this.state.registry;
  }

  get skipped(): readonly SkippedEntry[] {
    return this.state.skipped;
  }

  availableLanguages(): LocaleId[] {
    return [...this.state.bundles.keys()];
  }

  /** 重新读取目录并整体替换；读取失败时保留原状态并抛出 */
  reload(): LoadResult {
    this.state = buildState(this.root, this.defaultLanguage, this.options);
    this.options.logger?.info(`已重新加载语言资源：${this.root}`);
    return { registry: this.state.registry, skipped: [...this.state.skipped] };
  }

  resolveLanguage(requested: string): LocaleId {
    const canonical = tryParseLocaleId(requested);
    if (canonical === null) return this.defaultLanguage;
    if (this.state.bundles.has(canonical)) return canonical;
    const resolved = negotiateLanguages([canonical], this.availableLanguages(), { defaultLocale: this.defaultLanguage });
    return resolved[0] ?? this.defaultLanguage;
  }

  language(requested: string): Language {
    return new Language(this, requested);
  }

  hasMessage(key: string, lang: string = this.defaultLanguage): boolean {
    const { id, attribute } = splitKey(key);
    return this.chain(lang).some(([, bundle]) => {
      const msg = bundle.getMessage(id);
      if (!msg) return false;
      return attribute === null ? msg.value !== null : Object.prototype.hasOwnProperty.call(msg.attributes, attribute);
    });
  }

  /**
   * 格式化一条消息。`key` 可写作 `message.attribute` 取属性。
   * 格式化过程中出现任何错误（例如缺少变量）都会抛出 `fluent` 错误。
   */
  getMessage(key: string, lang: string, args?: MessageArgs): string {
    const chain = this.chain(lang);
    if (chain.length === 0) {
      throw new LocalisationError("generic", `语言 ${lang} 与默认语言 ${this.defaultLanguage} 均不可用`, { locale: lang });
    }

    const { id, attribute } = splitKey(key);
    for (const [locale, bundle] of chain) {
      const msg = bundle.getMessage(id);
      if (!msg) continue;
      const pattern = attribute === null ? msg.value : msg.attributes[attribute];
      if (!pattern) continue;

      const errors: Error[] = [];
      const out = bundle.formatPattern(pattern, args ?? null, errors);
      if (errors.length > 0) {
        const detail = errors.map((e) => e.message).join("; ");
        throw new LocalisationError("fluent", `格式化 ${key}（lang=${locale}）失败：${detail}`, { locale, errors });
      }
      return out;
    }

    throw new LocalisationError("missing-message", `缺少翻译：${key}（lang=${lang}）`, { locale: lang });
  }

  private chain(lang: string): Array<[LocaleId, FluentBundle]> {
    const out: Array<[LocaleId, FluentBundle]> = [];
    for (const locale of new Set([this.resolveLanguage(lang), this.defaultLanguage])) {
      const bundle = this.state.bundles.get(locale);
      if (bundle) out.push([locale, bundle]);
    }
    return out;
  }
}

/** 绑定到某个已协商语言的句柄 */
export class Language {
  readonly lang: LocaleId;
  private readonly localiser: Localiser;

  constructor(localiser: Localiser, lang: string) {
    this.localiser = localiser;
    this.lang = localiser.resolveLanguage(lang);
  }

  format(key: string, args?: MessageArgs): string {
    return this.localiser.getMessage(key, this.lang, args);
  }
}

export function tl(lang: Language, key: string, args?: MessageArgs): string {
  return lang.format(key, args);
}
