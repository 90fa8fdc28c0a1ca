import { MalformedInputError } from "./errors.js";

declare const brandExternalId: unique symbol;

/**
 * Canonical text form of a source identifier. Two source values are the
 * same identifier exactly when their ExternalIds are equal.
 */
export type ExternalId = string & { readonly [brandExternalId]: "ExternalId" };

/**
 * Values a query collaborator may hand back in an identifier column.
 */
export type IdentifierValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array;

function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

/**
 * Renders `value` to its canonical form. Text is kept as-is and every
 * other type is rendered to text, so the integer 100 and the string "100"
 * name the same node.
 */
export function toExternalId(value: IdentifierValue): ExternalId {
  return uncheckedAsExternalId(renderIdentifier(value));
}

function renderIdentifier(value: IdentifierValue): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new MalformedInputError(
        `Identifier must be a finite number, got ${value}`,
      );
    }
    return String(value);
  }
  if (typeof value === "bigint") {
    return value.toString(10);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MalformedInputError("Identifier is an invalid Date");
    }
    return value.toISOString();
  }
  return `\\x${toHex(value)}`;
}

function uncheckedAsExternalId(value: string): ExternalId {
  return value as ExternalId;
}

export function isIdentifierValue(value: unknown): value is IdentifierValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    value instanceof Date ||
    value instanceof Uint8Array
  );
}
