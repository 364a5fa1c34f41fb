export const EXTERNAL_FAILURE_NOTE =
  "(The cause of this error lies outside of this application)";

export class KeyNotFoundError extends Error {
  name = "KeyNotFoundError";
  readonly key: unknown;

  constructor(key: unknown) {
    super(`Key not found: ${describeKey(key)}.`);
    this.key = key;
  }
}

/**
 * Raised when something outside our control (an unavailable display, a
 * missing service) keeps a resource from initializing.
 */
export class ExternalFailure extends Error {
  name = "ExternalFailure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  override toString(): string {
    return `${this.message}\n\t${EXTERNAL_FAILURE_NOTE}`;
  }
}

export function describeKey(key: unknown): string {
  if (typeof key === "string") {
    return JSON.stringify(key);
  }
  if (typeof key === "bigint") {
    return `${key}n`;
  }
  if (typeof key === "symbol") {
    return key.toString();
  }
  if (key === null || key === undefined || typeof key !== "object") {
    return String(key);
  }
  const ctor: unknown = Reflect.get(key, "constructor");
  const toString: unknown = Reflect.get(key, "toString");
  const text =
    typeof toString === "function" ? String(key) : Object.prototype.toString.call(key);
  return typeof ctor === "function" && ctor.name ? `${ctor.name}(${text})` : text;
}
