import { afterEach, describe, expect, test } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Localiser, tl } from "../src/localiser/localiser.js";
import { LocalisationError, isLocalisationError } from "../src/common/errors.js";
import { Logger } from "../src/utils/logger.js";
import { defaultConfig } from "../src/utils/config.js";
import { makeTree, removeTree } from "./helpers.js";

const EN = `hello = Hello, { $name }!
emails =
    { $count ->
        [one] You have one email.
       *[other] You have { $count } emails.
    }
login = Log in
    .title = Sign in to your account
only-en = Only in English
-brand = Fluently
about = About { -brand }
`;

const IT_MAIN = `hello = Ciao, { $name }!
login = Accedi
    .title = Accedi al tuo account
`;

const roots: string[] = [];

function fixture(extra: Record<string, string> = {}): string {
  const root = makeTree({ "en-US.ftl": EN, "it/main.ftl": IT_MAIN, "it/extra.ftl": "emails = { $count } email\n", ...extra });
  roots.push(root);
  return root;
}

function catchError(fn: () => unknown): LocalisationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof LocalisationError) return e;
    throw e;
  }
  throw new Error("expected LocalisationError");
}

afterEach(() => {
  for (const root of roots.splice(0)) removeTree(root);
});

describe("Localiser 格式化", () => {
  test("按请求语言格式化，带变量", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(loc.availableLanguages()).toEqual(["en-US", "it"]);
    expect(loc.getMessage("hello", "it", { name: "Anna" })).toBe("Ciao, Anna!");
    expect(loc.getMessage("hello", "en-US", { name: "Anna" })).toBe("Hello, Anna!");
  });

  test("复数选择、属性与术语引用", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(loc.getMessage("emails", "en-US", { count: 1 })).toBe("You have one email.");
    expect(loc.getMessage("emails", "en-US", { count: 3 })).toBe("You have 3 emails.");
    expect(loc.getMessage("login.title", "en-US")).toBe("Sign in to your account");
    expect(loc.getMessage("login.title", "it")).toBe("Accedi al tuo account");
    expect(loc.getMessage("about", "en-US")).toBe("About Fluently");
  });

  test("目录中的多个文件属于同一语言", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(loc.getMessage("emails", "it", { count: 2 })).toBe("2 email");
  });

  test("useIsolating 为 true 时在占位符两侧插入隔离符", () => {
    const loc = Localiser.load(fixture(), "en-US", { useIsolating: true });
    expect(loc.getMessage("hello", "en-US", { name: "Anna" })).toBe("Hello, \u2068Anna\u2069!");
  });
});

describe("语言回退", () => {
  test("请求的语言不存在时回退到默认语言", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(loc.resolveLanguage("ja")).toBe("en-US");
    expect(loc.resolveLanguage("")).toBe("en-US");
    expect(loc.getMessage("hello", "ja", { name: "Anna" })).toBe("Hello, Anna!");
  });

  test("地区变体协商到可用的语言", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(loc.resolveLanguage("it-IT")).toBe("it");
    expect(loc.resolveLanguage("it_it")).toBe("it");
    expect(loc.getMessage("hello", "it-IT", { name: "Anna" })).toBe("Ciao, Anna!");
  });

  test("消息在请求语言中缺失时在默认语言中查找", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(loc.getMessage("only-en", "it")).toBe("Only in English");
    expect(loc.hasMessage("only-en", "it")).toBe(true);
    expect(loc.hasMessage("login.title")).toBe(true);
    expect(loc.hasMessage("login.subtitle")).toBe(false);
    expect(loc.hasMessage("nope", "it")).toBe(false);
  });

  test("fromConfig 使用配置中的目录与默认语言", () => {
    const root = fixture();
    const loc = Localiser.fromConfig({ ...defaultConfig(root), locales_dir: root, default_language: "it", log_level: "ERROR" });
    expect(loc.defaultLanguage).toBe("it");
    expect(loc.getMessage("hello", "ja", { name: "Anna" })).toBe("Ciao, Anna!");
  });

  test("fromConfig 的显式选项优先于配置", () => {
    const root = fixture();
    const warnings: string[] = [];
    const logger = new Logger({ console: false, minLevel: "WARN", sink: (_level, message) => warnings.push(message) });
    const loc = Localiser.fromConfig(
      { ...defaultConfig(root), locales_dir: root, default_language: "fr", use_isolating: false, log_level: "ERROR" },
      { logger, useIsolating: true }
    );
    expect(warnings).toEqual(["默认语言 fr 没有可用的资源"]);
    expect(loc.getMessage("hello", "en-US", { name: "Anna" })).toBe("Hello, \u2068Anna\u2069!");
  });

  test("Language 句柄与 tl", () => {
    const loc = Localiser.load(fixture(), "en-US");
    const lang = loc.language("it_IT.UTF-8");
    expect(lang.lang).toBe("it");
    expect(tl(lang, "hello", { name: "Anna" })).toBe("Ciao, Anna!");
    expect(lang.format("only-en")).toBe("Only in English");
  });
});

describe("错误", () => {
  test("缺少消息或属性时抛出 missing-message", () => {
    const loc = Localiser.load(fixture(), "en-US");
    expect(catchError(() => loc.getMessage("nope", "it")).kind).toBe("missing-message");
    expect(catchError(() => loc.getMessage("login.subtitle", "en-US")).kind).toBe("missing-message");
  });

  test("格式化报错时抛出 fluent 并附带原始错误", () => {
    const loc = Localiser.load(fixture(), "en-US");
    const err = catchError(() => loc.getMessage("hello", "en-US"));
    expect(err.kind).toBe("fluent");
    expect(err.locale).toBe("en-US");
    expect(err.errors).toHaveLength(1);
  });

  test("默认语言无效时在读取目录之前失败", () => {
    const root = fixture();
    const err = catchError(() => Localiser.load(join(root, "missing"), "not a locale"));
    expect(err.kind).toBe("language-identifier");
  });

  test("根目录不存在时抛出 io", () => {
    const root = fixture();
    expect(isLocalisationError(catchError(() => Localiser.load(join(root, "missing"), "en-US")), "io")).toBe(true);
  });

  test("默认语言没有资源时记录警告，查找不到任何语言时抛出 generic", () => {
    const warnings: string[] = [];
    const logger = new Logger({
      console: false,
      minLevel: "WARN",
      sink: (_level, message) => warnings.push(message)
    });
    const loc = Localiser.load(fixture(), "fr", { logger });
    expect(warnings).toEqual(["默认语言 fr 没有可用的资源"]);
    expect(loc.getMessage("hello", "it", { name: "Anna" })).toBe("Ciao, Anna!");
    expect(catchError(() => loc.getMessage("hello", "fr")).kind).toBe("generic");
  });

  test("重复的消息 ID 记为 fluent 诊断，先加载的保留", () => {
    const loc = Localiser.load(fixture({ "it/zz.ftl": "hello = Salve\n" }), "en-US");
    const fluentSkips = loc.skipped.filter((s) => s.reason === "fluent");
    expect(fluentSkips).toHaveLength(1);
    expect(fluentSkips[0]).toMatchObject({ path: "it/zz.ftl", locale: "it" });
    expect(fluentSkips[0]?.message).toMatch(/hello/);
    expect(loc.getMessage("hello", "it", { name: "Anna" })).toBe("Ciao, Anna!");
  });
});

describe("语法错误", () => {
  test("无法解析的条目记为 fluent 诊断，其余消息照常可用", () => {
    const warnings: string[] = [];
    const logger = new Logger({ console: false, minLevel: "WARN", sink: (_level, message) => warnings.push(message) });
    const root = makeTree({ "en-US.ftl": "hello = Hello\nbroken = { $\n!!! junk\n" });
    roots.push(root);
    const loc = Localiser.load(root, "en-US", { logger });

    expect(loc.skipped.length).toBeGreaterThan(0);
    for (const entry of loc.skipped) {
      expect(entry).toMatchObject({ path: "en-US.ftl", reason: "fluent", locale: "en-US" });
      expect(entry.message.length).toBeGreaterThan(0);
    }
    expect(warnings).toHaveLength(loc.skipped.length);
    expect(warnings[0]?.startsWith("en-US.ftl（en-US）：")).toBe(true);
    expect(loc.hasMessage("broken")).toBe(false);
    expect(loc.getMessage("hello", "en-US")).toBe("Hello");
  });

  test("语法正确的资源没有诊断", () => {
    expect(Localiser.load(fixture(), "en-US").skipped).toEqual([]);
  });
});

describe("重新加载", () => {
  test("reload 读取新增文件", () => {
    const root = fixture();
    const loc = Localiser.load(root, "en-US");
    expect(loc.availableLanguages()).toEqual(["en-US", "it"]);

    writeFileSync(join(root, "de.ftl"), "hello = Hallo, { $name }!\n", "utf8");
    const { registry, skipped } = loc.reload();

    expect(registry.locales()).toEqual(["de", "en-US", "it"]);
    expect(skipped).toEqual([]);
    expect(loc.registry).toBe(registry);
    expect(loc.getMessage("hello", "de", { name: "Anna" })).toBe("Hallo, Anna!");
  });

  test("reload 失败时保留原有状态", () => {
    const root = fixture();
    const loc = Localiser.load(root, "en-US");
    const before = loc.registry;
    rmSync(root, { recursive: true, force: true });

    expect(catchError(() => loc.reload()).kind).toBe("io");
    expect(loc.registry).toBe(before);
    expect(loc.getMessage("hello", "it", { name: "Anna" })).toBe("Ciao, Anna!");
  });

  test("两次加载得到结构相同的注册表", () => {
    const root = fixture();
    const a = Localiser.load(root, "en-US");
    const b = Localiser.load(root, "en-US");
    expect(b.registry.toJSON()).toEqual(a.registry.toJSON());
  });
});
