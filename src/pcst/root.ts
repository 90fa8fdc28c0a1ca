import { AUTO_ROOT_SENTINEL } from "../config/constants.js";
import { UnknownIdentifierError } from "./errors.js";
import { toExternalId, type IdentifierValue } from "./ids.js";
import type { IdentifierRegistry } from "./registry.js";

export type RootInput = IdentifierValue | null | undefined;

export type RootSpec = { kind: "auto" } | { kind: "index"; index: number };

export const AUTO_ROOT: RootSpec = Object.freeze({ kind: "auto" });

/**
 * Maps an external root to a dense index. An auto root never touches the
 * registry; a named root that no edge mentions is an error, never a
 * silent switch to auto.
 */
export function resolveRoot(
  registry: Pick<IdentifierRegistry, "lookup">,
  root: RootInput,
): RootSpec {
  if (root === null || root === undefined || root === AUTO_ROOT_SENTINEL) {
    return AUTO_ROOT;
  }
  const id = toExternalId(root);
  const index = registry.lookup(id);
  if (index === undefined) {
    throw new UnknownIdentifierError("root", id);
  }
  return { kind: "index", index };
}

export function rootToIndex(root: RootSpec): number | null {
  return root.kind === "index" ? root.index : null;
}
