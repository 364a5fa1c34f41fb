export type PrimitiveKeyType =
  | "string"
  | "number"
  | "bigint"
  | "boolean"
  | "symbol"
  | "undefined"
  | "null";

/** A primitive's `typeof` tag, or an object key's prototype. */
export type KeyType = PrimitiveKeyType | object;

const NULL_PROTOTYPE: object = Object.freeze({});

export function typeOfKey(key: unknown): KeyType {
  if (key === null) {
    return "null";
  }

  const tag = typeof key;
  switch (tag) {
    case "object":
    case "function": {
      const prototype: unknown = Object.getPrototypeOf(key);
      return isObject(prototype) ? prototype : NULL_PROTOTYPE;
    }
    default:
      return tag;
  }
}

function isObject(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}
