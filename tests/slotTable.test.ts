// tests/slotTable.test.ts
import SlotTable, { Handle } from "../src/core/SlotTable";

describe("Handle", () => {
  test("the invalid handle never resolves and prints as invalid", () => {
    const invalid = Handle.invalid("mesh");
    expect(invalid.isValid()).toBe(false);
    expect(invalid.toString()).toBe("mesh#invalid");
    expect(new Handle("mesh", 3, 2).toString()).toBe("mesh#3@2");
  });

  test("equality and ordering use index then generation", () => {
    const a = new Handle("object", 1, 0);
    const b = new Handle("object", 1, 1);
    const c = new Handle("object", 2, 0);

    expect(a.equals(new Handle("object", 1, 0))).toBe(true);
    expect(a.equals(b)).toBe(false);
    expect(a.compare(b)).toBeLessThan(0);
    expect(c.compare(b)).toBeGreaterThan(0);
    expect(a.compare(new Handle("object", 1, 0))).toBe(0);
  });
});

describe("SlotTable", () => {
  test("insert fills the first free slot", () => {
    const table = new SlotTable<string, "mesh">("mesh", 3);
    const a = table.insert("a");
    const b = table.insert("b");

    expect(a.index).toBe(0);
    expect(b.index).toBe(1);
    expect(table.size).toBe(2);
    expect(table.get(a)).toBe("a");
    expect(table.get(b)).toBe("b");
  });

  test("a removed handle goes stale even after its slot is reused", () => {
    const table = new SlotTable<string, "mesh">("mesh", 2);
    const first = table.insert("first");

    expect(table.remove(first)).toBe("first");
    const second = table.insert("second");

    expect(second.index).toBe(first.index);
    expect(second.generation).toBe(first.generation + 1);
    expect(table.has(first)).toBe(false);
    expect(table.get(first)).toBeUndefined();
    expect(table.get(second)).toBe("second");
  });

  test("removing twice returns nothing the second time", () => {
    const table = new SlotTable<number, "object">("object", 2);
    const handle = table.insert(7);

    expect(table.remove(handle)).toBe(7);
    expect(table.remove(handle)).toBeUndefined();
    expect(table.size).toBe(0);
  });

  test("a full table returns the invalid handle and warns", () => {
    const table = new SlotTable<number, "material">("material", 2);
    table.insert(1);
    table.insert(2);

    const overflow = table.insert(3);

    expect(table.isFull).toBe(true);
    expect(overflow.isValid()).toBe(false);
    expect(table.size).toBe(2);
    expect(console.warn).toHaveBeenCalledWith("⚠️ material table full (2 slots)");
  });

  test("access calls back once for live handles and never otherwise", () => {
    const table = new SlotTable<{ hits: number }, "object">("object", 2);
    const handle = table.insert({ hits: 0 });
    const fn = jest.fn((value: { hits: number }) => {
      value.hits++;
    });

    expect(table.access(handle, fn)).toBe(true);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(table.get(handle)?.hits).toBe(1);

    table.remove(handle);
    expect(table.access(handle, fn)).toBe(false);
    expect(table.access(Handle.invalid("object"), fn)).toBe(false);
    expect(table.access(new Handle("object", 9, 0), fn)).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test("entries lists occupied slots in slot order", () => {
    const table = new SlotTable<string, "object">("object", 4);
    const a = table.insert("a");
    table.insert("b");
    table.insert("c");
    table.remove(a);

    const listed = Array.from(table.entries(), ([handle, value]) => [handle.toString(), value]);

    expect(listed).toEqual([
      ["object#1@0", "b"],
      ["object#2@0", "c"],
    ]);
  });

  test("rejects a capacity below one", () => {
    expect(() => new SlotTable<number, "mesh">("mesh", 0)).toThrow(
      "mesh table capacity must be a positive integer, got 0"
    );
  });
});
