import { tryParseLocaleId, type LocaleId } from "../common/langid.js";

/** 单个 .ftl 文件的原始文本，交给 @fluent/bundle 之前的形态 */
export type ResourceBundle = {
  readonly locale: LocaleId;
  /** 相对于根目录，使用 "/" 分隔 */
  readonly path: string;
  readonly source: string;
};

export type SkipReason = "io" | "language-identifier" | "empty" | "fluent";

/** 加载时被跳过的条目，供调用方展示诊断信息 */
export type SkippedEntry = {
  readonly path: string;
  readonly reason: SkipReason;
  readonly message: string;
  readonly locale?: LocaleId;
};

export type RegistrySnapshot = Record<LocaleId, Array<{ path: string; source: string }>>;

/**
 * 语言 → 资源列表的只读映射。
 * 构造后不可修改；每个语言至少对应一个非空资源，语言与资源均按名称排序。
 */
export class LocaleRegistry {
  private readonly bundles: ReadonlyMap<LocaleId, readonly ResourceBundle[]>;

  constructor(entries: Iterable<readonly [LocaleId, readonly ResourceBundle[]]>) {
    const sorted = [...entries]
      .filter(([, list]) => list.length > 0)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    this.bundles = new Map(
      sorted.map(([locale, list]): [LocaleId, readonly ResourceBundle[]] => [locale, Object.freeze(list.map((b) => Object.freeze({ ...b })))])
    );
    Object.freeze(this);
  }

  get size(): number {
    return this.bundles.size;
  }

  locales(): LocaleId[] {
    return [...this.bundles.keys()];
  }

  has(locale: string): boolean {
    return this.get(locale) !== undefined;
  }

  get(locale: string): readonly ResourceBundle[] | undefined {
    const direct = this.bundles.get(locale);
    if (direct) return direct;
    const canonical = tryParseLocaleId(locale);
    return canonical === null ? undefined : this.bundles.get(canonical);
  }

  /** 同一语言的所有资源文本，以换行拼接 */
  sourceOf(locale: string): string | undefined {
    return this.get(locale)?.map((b) => b.source).join("\n");
  }

  entries(): Array<[LocaleId, readonly ResourceBundle[]]> {
    return [...this.bundles.entries()];
  }

  toJSON(): RegistrySnapshot {
    const out: RegistrySnapshot = {};
    for (const [locale, list] of this.bundles) {
      out[locale] = list.map((b) => ({ path: b.path, source: b.source }));
    }
    return out;
  }
}
