import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { describeError, isLocalisationError } from "../common/errors.js";
import { localeFromEnv, tryParseLocaleId } from "../common/langid.js";
import { Localiser, tl, type Language, type MessageArgs } from "../localiser/localiser.js";
import { resolveConfig } from "../utils/config.js";
import { Logger } from "../utils/logger.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

// 源码（src/cli）与构建产物（dist/cli）都位于包根目录下两层
const CLI_LOCALES_DIR = fileURLToPath(new URL("../../locales", import.meta.url));

export function defaultIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    env: process.env,
    cwd: process.cwd()
  };
}

/** 解析 --arg name=value；纯数字的值按数字传入，以便复数选择生效 */
export function parseMessageArgs(raw: readonly string[]): MessageArgs | string {
  const out: MessageArgs = {};
  for (const item of raw) {
    const eq = item.indexOf("=");
    if (eq <= 0) return item;
    const name = item.slice(0, eq).trim();
    const value = item.slice(eq + 1);
    out[name] = /^-?\d+(\.\d+)?$/.test(value) ? Number(value) : value;
  }
  return out;
}

function cliLanguage(io: CliIo): Language {
  const localiser = Localiser.load(CLI_LOCALES_DIR, "en-US");
  return localiser.language(localeFromEnv(io.env) ?? "en-US");
}

type CheckOptions = {
  dir: string;
  defaultLanguage: string;
  strict: boolean;
  extension: string;
  useIsolating: boolean;
  logger: Logger;
};

function runCheck(io: CliIo, lang: Language, opts: CheckOptions): number {
  const localiser = Localiser.load(opts.dir, opts.defaultLanguage, {
    extension: opts.extension,
    useIsolating: opts.useIsolating,
    logger: opts.logger
  });

  for (const [locale, bundles] of localiser.registry.entries()) {
    const key = locale === localiser.defaultLanguage ? "cli-check-locale-default" : "cli-check-locale";
    io.stdout(tl(lang, key, { locale, count: bundles.length }));
  }
  for (const entry of localiser.skipped) {
    io.stdout(tl(lang, "cli-check-skipped", { path: entry.path, reason: entry.reason, message: entry.message }));
  }
  if (!localiser.registry.has(localiser.defaultLanguage)) {
    io.stdout(tl(lang, "cli-check-no-default", { lang: localiser.defaultLanguage }));
  }
  io.stdout(tl(lang, "cli-check-summary", { locales: localiser.registry.size, skipped: localiser.skipped.length }));

  return opts.strict && localiser.skipped.length > 0 ? EXIT_FAILURE : EXIT_OK;
}

type FormatOptions = {
  dir: string;
  defaultLanguage: string;
  requested: string;
  key: string;
  args: MessageArgs;
  extension: string;
  useIsolating: boolean;
  logger: Logger;
};

function runFormat(io: CliIo, lang: Language, opts: FormatOptions): number {
  const localiser = Localiser.load(opts.dir, opts.defaultLanguage, {
    extension: opts.extension,
    useIsolating: opts.useIsolating,
    logger: opts.logger
  });
  try {
    io.stdout(localiser.getMessage(opts.key, opts.requested, opts.args));
    return EXIT_OK;
  } catch (e) {
    if (isLocalisationError(e, "missing-message")) {
      io.stderr(tl(lang, "cli-missing-message", { key: opts.key }));
      return EXIT_FAILURE;
    }
    if (isLocalisationError(e)) {
      io.stderr(tl(lang, "cli-format-failed", { key: opts.key, reason: e.message }));
      return EXIT_FAILURE;
    }
    throw e;
  }
}

export function runCli(argv: readonly string[], io: CliIo = defaultIo()): number {
  const lang = cliLanguage(io);

  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (e) {
    io.stderr(describeError(e));
    io.stderr(tl(lang, "cli-usage"));
    return EXIT_USAGE;
  }
  const { values, positionals } = parsed;
  const [command, target] = positionals;

  if (values.help || command === undefined) {
    io.stdout(tl(lang, "cli-usage"));
    return values.help ? EXIT_OK : EXIT_USAGE;
  }
  if (command !== "check" && command !== "format") {
    io.stderr(tl(lang, "cli-unknown-command", { command }));
    io.stderr(tl(lang, "cli-usage"));
    return EXIT_USAGE;
  }

  if (values.default !== undefined && tryParseLocaleId(values.default) === null) {
    io.stderr(tl(lang, "cli-invalid-language", { lang: values.default }));
    return EXIT_USAGE;
  }

  try {
    const config = resolveConfig({
      configPath: values.config,
      env: io.env,
      cwd: io.cwd,
      overrides: {
        ...(values.default !== undefined ? { default_language: values.default } : {})
      }
    });
    const logger = new Logger({ minLevel: config.log_level, console: values.verbose === true });
    const common = {
      defaultLanguage: config.default_language,
      extension: config.extension,
      useIsolating: config.use_isolating,
      logger
    };

    if (command === "check") {
      const dir = target !== undefined ? resolve(io.cwd, target) : config.locales_dir;
      return runCheck(io, lang, { ...common, dir, strict: values.strict === true });
    }

    if (target === undefined) {
      io.stderr(tl(lang, "cli-missing-key"));
      return EXIT_USAGE;
    }
    const args = parseMessageArgs(values.arg ?? []);
    if (typeof args === "string") {
      io.stderr(tl(lang, "cli-invalid-arg", { arg: args }));
      return EXIT_USAGE;
    }
    const dir = values.dir !== undefined ? resolve(io.cwd, values.dir) : config.locales_dir;
    const requested = values.lang ?? localeFromEnv(io.env) ?? config.default_language;
    return runFormat(io, lang, { ...common, dir, requested, key: target, args });
  } catch (e) {
    if (isLocalisationError(e, "io")) {
      io.stderr(tl(lang, "cli-load-failed", { reason: e.message }));
      return EXIT_USAGE;
    }
    throw e;
  }
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      dir: { type: "string" },
      default: { type: "string" },
      lang: { type: "string" },
      arg: { type: "string", multiple: true },
      config: { type: "string" },
      strict: { type: "boolean" },
      verbose: { type: "boolean" },
      help: { type: "boolean", short: "h" }
    },
    allowPositionals: true
  });
}
