import { describe, it } from "node:test";
import assert from "node:assert";
import { resolveRoot, rootToIndex, AUTO_ROOT } from "../../src/pcst/root.js";
import { IdentifierRegistry } from "../../src/pcst/registry.js";
import { UnknownIdentifierError } from "../../src/pcst/errors.js";
import { toExternalId, type ExternalId } from "../../src/pcst/ids.js";

function registryOf(...ids: string[]): IdentifierRegistry {
  const registry = new IdentifierRegistry();
  for (const id of ids) registry.intern(toExternalId(id));
  registry.seal();
  return registry;
}

describe("resolveRoot", () => {
  it("treats auto, null and undefined as no root without a lookup", () => {
    let lookups = 0;
    const registry = {
      lookup(_id: ExternalId): number | undefined {
        lookups += 1;
        return 0;
      },
    };
    assert.strictEqual(resolveRoot(registry, "auto"), AUTO_ROOT);
    assert.strictEqual(resolveRoot(registry, null), AUTO_ROOT);
    assert.strictEqual(resolveRoot(registry, undefined), AUTO_ROOT);
    assert.strictEqual(lookups, 0);
  });

  it("matches the sentinel case-sensitively", () => {
    const registry = registryOf("A", "AUTO");
    assert.deepStrictEqual(resolveRoot(registry, "AUTO"), { kind: "index", index: 1 });
  });

  it("resolves a known id, including its integer form", () => {
    const registry = registryOf("A", "7");
    assert.deepStrictEqual(resolveRoot(registry, "A"), { kind: "index", index: 0 });
    assert.deepStrictEqual(resolveRoot(registry, 7), { kind: "index", index: 1 });
  });

  it("fails on an id no edge mentions", () => {
    const registry = registryOf("A", "B");
    assert.throws(
      () => resolveRoot(registry, "Z"),
      (err: Error) =>
        err instanceof UnknownIdentifierError &&
        err.role === "root" &&
        err.id === "Z",
    );
  });
});

describe("rootToIndex", () => {
  it("maps auto to null and an index to itself", () => {
    assert.strictEqual(rootToIndex(AUTO_ROOT), null);
    assert.strictEqual(rootToIndex({ kind: "index", index: 3 }), 3);
  });
});
