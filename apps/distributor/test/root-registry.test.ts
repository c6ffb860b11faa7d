/**
 * Root registry: insert-only, rollback-aware.
 */

import { describe, it, expect } from "vitest";
import { ZERO_HASH } from "@rootdrop/primitives";
import { RootRegistry } from "../src/state/root-registry.js";
import { Journal } from "../src/state/journal.js";
import { DistributorError } from "../src/errors.js";

const ROOT_1 = `0x${"11".repeat(32)}`;
const ROOT_2 = `0x${"22".repeat(32)}`;

describe("RootRegistry", () => {
  it("unset periods read as the zero hash", () => {
    const registry = new RootRegistry(new Journal());
    expect(registry.rootOf(0n)).toBe(ZERO_HASH);
    expect(registry.has(0n)).toBe(false);
  });

  it("stores a root once and refuses a second insert", () => {
    const registry = new RootRegistry(new Journal());
    registry.insert(5n, ROOT_1);

    let caught: unknown;
    try {
      registry.insert(5n, ROOT_2);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DistributorError);
    expect(caught).toMatchObject({ code: "ROOT_ALREADY_SET" });
    expect(registry.rootOf(5n)).toBe(ROOT_1);
  });

  it("normalizes root case", () => {
    const registry = new RootRegistry(new Journal());
    registry.insert(1n, `0x${"AB".repeat(32)}`);
    expect(registry.rootOf(1n)).toBe(`0x${"ab".repeat(32)}`);
  });

  it("rollback removes an uncommitted insert", () => {
    const journal = new Journal();
    const registry = new RootRegistry(journal);
    registry.insert(1n, ROOT_1);
    journal.commit();

    const savepoint = journal.savepoint();
    registry.insert(2n, ROOT_2);
    journal.rollbackTo(savepoint);

    expect(registry.entries()).toEqual([{ period: 1n, root: ROOT_1 }]);
  });
});
