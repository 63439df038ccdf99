import { mkdirSync, createWriteStream, type WriteStream } from "node:fs";
import { join } from "node:path";

export type LogLevel = "DEBUG" | "INFO" | "MARK" | "WARN" | "ERROR";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  DEBUG: 5,
  INFO: 10,
  MARK: 20,
  WARN: 30,
  ERROR: 40
};

export type LogSink = (level: LogLevel, message: string, timestamp: Date) => void;

export type LoggerOptions = {
  /** 日志目录；未设置时不写文件，只输出到控制台 */
  logsDir?: string;
  minLevel?: LogLevel;
  consoleMinLevel?: LogLevel;
  /** 关闭控制台输出（测试或嵌入时使用） */
  console?: boolean;
  /** 每条通过 minLevel 的日志都会回调，用于收集诊断信息 */
  sink?: LogSink;
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function pad3(n: number): string {
  return String(n).padStart(3, "0");
}

export function formatLocalDateKey(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

export function formatLocalTimestamp(d: Date): string {
  return `${formatLocalDateKey(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}.${pad3(d.getMilliseconds())}`;
}

export function parseLevel(input: string | undefined, fallback: LogLevel): LogLevel {
  if (!input) return fallback;
  const v = input.trim().toUpperCase();
  if (v === "DEBUG" || v === "INFO" || v === "MARK" || v === "WARN" || v === "ERROR") return v;
  return fallback;
}

function shouldUseColor(): boolean {
  if (!process.stdout.isTTY) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === "dumb") return false;
  return true;
}

function colorForLevel(level: LogLevel): string {
  if (level === "DEBUG") return "\x1b[34m";
  if (level === "INFO") return "\x1b[32m";
  if (level === "MARK") return "\x1b[90m";
  if (level === "WARN") return "\x1b[33m";
  return "\x1b[31m";
}

export class Logger {
  private readonly logsDir: string | null;
  private readonly minLevel: LogLevel;
  private readonly consoleMinLevel: LogLevel;
  private readonly consoleEnabled: boolean;
  private readonly useColor: boolean;
  private readonly sink?: LogSink;

  private currentDateKey: string | null = null;
  private stream: WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logsDir = options.logsDir ?? null;
    this.minLevel = options.minLevel ?? parseLevel(process.env.LOG_LEVEL, "INFO");
    this.consoleMinLevel = options.consoleMinLevel ?? parseLevel(process.env.CONSOLE_LOG_LEVEL, "INFO");
    this.consoleEnabled = options.console ?? true;
    this.useColor = shouldUseColor();
    this.sink = options.sink;

    if (this.logsDir) mkdirSync(this.logsDir, { recursive: true });
  }

  debug(message: string): void {
    this.write("DEBUG", message);
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  mark(message: string): void {
    this.write("MARK", message);
  }

  warn(message: string): void {
    this.write("WARN", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  log(level: LogLevel, message: string): void {
    this.write(level, message);
  }

  /** 关闭文件流；写入完成后 resolve */
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    this.currentDateKey = null;
    if (!stream) return Promise.resolve();
    return new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) return;

    const now = new Date();
    const line = this.formatLine(now, level, message);

    if (this.logsDir) {
      const dateKey = formatLocalDateKey(now);
      if (this.currentDateKey !== dateKey) this.rotate(this.logsDir, dateKey);
      this.stream?.write(line);
    }

    if (this.consoleEnabled && LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.consoleMinLevel]) {
      const consoleLine = this.formatConsoleLine(line, level);
      if (level === "WARN" || level === "ERROR") process.stderr.write(consoleLine);
      else process.stdout.write(consoleLine);
    }

    this.sink?.(level, message, now);
  }

  private rotate(logsDir: string, dateKey: string): void {
    this.stream?.end();
    this.currentDateKey = dateKey;
    this.stream = createWriteStream(join(logsDir, `${dateKey}.log`), { flags: "a" });
  }

  private formatLine(now: Date, level: LogLevel, message: string): string {
    return `[${formatLocalTimestamp(now)}] [${level}] ${message}\n`;
  }

  private formatConsoleLine(line: string, level: LogLevel): string {
    if (!this.useColor) return line;
    const c = colorForLevel(level);
    return `${c}${line.slice(0, -1)}\x1b[0m\n`;
  }
}
