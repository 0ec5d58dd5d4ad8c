import { describe, test, expect } from "vitest";
import { SyncCore } from "../sync-core";
import { LockOrderError } from "../errors";

describe("SyncCore", () => {
  test("stamps writes with the injected clock", () => {
    let clock = 100;
    const core = new SyncCore(3, () => clock);

    core.exclusive(() => core.markWrite(1));
    clock = 250;
    core.exclusive(() => core.markWrite(2));

    expect(core.lastWrite(0)).toBe(0);
    expect(core.lastWrite(1)).toBe(100);
    expect(core.lastWrite(2)).toBe(250);
    expect(core.globalLastWrite).toBe(250);
    expect(core.hasAnyData).toBe(true);
  });

  test("nests shared sections", () => {
    const core = new SyncCore(1, () => 0);
    const result = core.shared(() => core.shared(() => core.locked));
    expect(result).toBe("shared");
    expect(core.locked).toBe(false);
  });

  test("refuses an exclusive section inside a shared one", () => {
    const core = new SyncCore(1, () => 0);
    expect(() => core.shared(() => core.exclusive(() => 1))).toThrow(
      LockOrderError,
    );
    expect(() => core.shared(() => core.exclusive(() => 1))).toThrow(
      "Exclusive section requested while a shared section is open",
    );
    // The failed attempt leaves the lock released
    expect(core.locked).toBe(false);
    expect(core.exclusive(() => "ok")).toBe("ok");
  });

  test("refuses nested exclusive sections", () => {
    const core = new SyncCore(1, () => 0);
    expect(() => core.exclusive(() => core.exclusive(() => 1))).toThrow(
      "Exclusive section requested inside another exclusive section",
    );
  });

  test("refuses a shared section inside an exclusive one", () => {
    const core = new SyncCore(1, () => 0);
    expect(() => core.exclusive(() => core.shared(() => 1))).toThrow(
      "Shared section requested inside an exclusive section",
    );
    expect(core.locked).toBe(false);
  });

  test("releases the lock when a section throws", () => {
    const core = new SyncCore(1, () => 0);
    expect(() =>
      core.exclusive(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(core.locked).toBe(false);
  });

  test("reset clears bookkeeping", () => {
    const core = new SyncCore(2, () => 42);
    core.exclusive(() => core.markWrite(0));
    core.reset();

    expect(core.hasAnyData).toBe(false);
    expect(core.globalLastWrite).toBe(0);
  });
});
