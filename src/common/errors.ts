export type LocalisationErrorKind = "io" | "language-identifier" | "fluent" | "missing-message" | "generic";

export type LocalisationErrorOptions = {
  path?: string;
  locale?: string;
  /** formatPattern / addResource 返回的错误 */
  errors?: readonly Error[];
  cause?: unknown;
};

export class LocalisationError extends Error {
  readonly kind: LocalisationErrorKind;
  readonly path?: string;
  readonly locale?: string;
  readonly errors: readonly Error[];

  constructor(kind: LocalisationErrorKind, message: string, options: LocalisationErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LocalisationError";
    this.kind = kind;
    this.path = options.path;
    this.locale = options.locale;
    this.errors = options.errors ?? [];
  }
}

export function isLocalisationError(value: unknown, kind?: LocalisationErrorKind): value is LocalisationError {
  if (!(value instanceof LocalisationError)) return false;
  return kind === undefined || value.kind === kind;
}

/** fs 错误的 message 已以错误码开头（"ENOENT: ..."），其余错误补上错误码 */
export function describeError(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  const code = errnoCode(e);
  return code && !e.message.startsWith(code) ? `${code}: ${e.message}` : e.message;
}

export function errnoCode(e: unknown): string | undefined {
  if (e && typeof e === "object" && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}
