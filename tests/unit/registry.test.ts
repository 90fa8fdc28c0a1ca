import { describe, it } from "node:test";
import assert from "node:assert";
import { IdentifierRegistry } from "../../src/pcst/registry.js";
import { toExternalId } from "../../src/pcst/ids.js";

describe("IdentifierRegistry", () => {
  it("assigns dense indices in first-seen order", () => {
    const registry = new IdentifierRegistry();
    assert.strictEqual(registry.intern(toExternalId("B")), 0);
    assert.strictEqual(registry.intern(toExternalId("A")), 1);
    assert.strictEqual(registry.intern(toExternalId("B")), 0);
    assert.strictEqual(registry.size, 2);
    assert.deepStrictEqual(registry.entries(), ["B", "A"]);
  });

  it("maps text and integer forms of the same id to one index", () => {
    const registry = new IdentifierRegistry();
    const first = registry.intern(toExternalId(100));
    const second = registry.intern(toExternalId("100"));
    assert.strictEqual(first, second);
    assert.strictEqual(registry.size, 1);
  });

  it("resolves indices back to ids", () => {
    const registry = new IdentifierRegistry();
    registry.intern(toExternalId("x"));
    registry.intern(toExternalId("y"));
    assert.strictEqual(registry.resolve(1), "y");
    assert.throws(() => registry.resolve(2), RangeError);
    assert.throws(() => registry.resolve(-1), RangeError);
  });

  it("rejects new ids once sealed but still answers lookups", () => {
    const registry = new IdentifierRegistry();
    registry.intern(toExternalId("x"));
    registry.seal();
    assert.strictEqual(registry.isSealed, true);
    assert.strictEqual(registry.intern(toExternalId("x")), 0);
    assert.throws(() => registry.intern(toExternalId("y")), /registry is sealed/);
    assert.strictEqual(registry.lookup(toExternalId("x")), 0);
    assert.strictEqual(registry.lookup(toExternalId("y")), undefined);
  });
});
