import { describe, it } from "node:test";
import assert from "node:assert";
import {
  isPruningStrategy,
  resolvePruningStrategy,
  PRUNING_STRATEGIES,
} from "../../src/pcst/pruning.js";
import { Logger } from "../../src/util/logger.js";

describe("resolvePruningStrategy", () => {
  it("keeps every known strategy", () => {
    for (const strategy of PRUNING_STRATEGIES) {
      assert.strictEqual(resolvePruningStrategy(strategy), strategy);
    }
  });

  it("defaults to gw when no name is given", () => {
    assert.strictEqual(resolvePruningStrategy(undefined), "gw");
  });

  it("falls back to gw for an unknown name and warns", () => {
    const lines: string[] = [];
    const log = new Logger("warn", "pretty", (line) => lines.push(line));
    assert.strictEqual(resolvePruningStrategy("aggressive", log), "gw");
    assert.deepStrictEqual(lines, [
      '[WARN] Unknown pruning strategy, falling back to default {"requested":"aggressive","fallback":"gw"}',
    ]);
  });

  it("is case-sensitive", () => {
    assert.strictEqual(isPruningStrategy("GW"), false);
    assert.strictEqual(resolvePruningStrategy("Strong"), "gw");
  });
});
