import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RootContext, type RootStore } from "../root-context";
import { isRootError } from "../errors";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isRootError(err) ? err.code : "unexpected";
  }
  return undefined;
}

describe("RootContext", () => {
  let base: string;
  let store: RootStore;

  beforeEach(() => {
    base = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "rootstake-context-")));
    store = {};
  });

  afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  it("starts unset under the default key", () => {
    const context = new RootContext(store);
    expect(context.key).toBe("GROOT");
    expect(context.get()).toBe("");
    expect(context.isSet()).toBe(false);
  });

  it("commits, replaces and clears the root", () => {
    const context = new RootContext(store);
    const other = path.join(base, "other");
    fs.mkdirSync(other);

    expect(context.commit(base)).toBe(base);
    expect(store.GROOT).toBe(base);
    context.commit(other);
    expect(context.get()).toBe(other);
    context.clear();
    expect(context.isSet()).toBe(false);
    expect("GROOT" in store).toBe(false);
  });

  it("makes relative directories absolute", () => {
    const context = new RootContext(store);
    expect(context.commit(".")).toBe(process.cwd());
  });

  it("refuses missing paths and files", () => {
    const context = new RootContext(store);
    const file = path.join(base, "file.txt");
    fs.writeFileSync(file, "");

    expect(codeOf(() => context.commit(path.join(base, "missing")))).toBe("NotADirectory");
    expect(codeOf(() => context.commit(file))).toBe("NotADirectory");
    expect(context.isSet()).toBe(false);
  });

  it("trims keys and rejects blank ones", () => {
    const context = new RootContext(store, "  APP_ROOT ");
    expect(context.key).toBe("APP_ROOT");
    expect(codeOf(() => context.setKey("   "))).toBe("EmptyInput");
    expect(context.key).toBe("APP_ROOT");
    expect(codeOf(() => new RootContext(store, ""))).toBe("EmptyInput");
  });

  it("leaves the old key's value in place when the key changes", () => {
    const context = new RootContext(store);
    context.commit(base);
    context.setKey("APP_ROOT");

    expect(context.get()).toBe("");
    expect(store.GROOT).toBe(base);
  });
});
