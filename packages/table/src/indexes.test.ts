/**
 * Unit tests for SecondaryIndex
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Column } from "./column.js";
import { MissingDataError } from "./errors.js";
import { SecondaryIndex } from "./indexes.js";

describe("SecondaryIndex", () => {
  let index: SecondaryIndex;

  beforeEach(() => {
    const primary = new Column({ name: "id", type: "integer", primaryKey: true });
    const status = new Column({ name: "status", type: "string", indexed: true, nullable: true });
    index = new SecondaryIndex(status, primary);
  });

  it("should group primary keys by value", () => {
    index.add("open", 1);
    index.add("closed", 2);
    index.add("open", 3);

    expect(index.column).toBe("status");
    expect(index.lookup("open")).toEqual([1, 3]);
    expect(index.lookup("closed")).toEqual([2]);
    expect(index.lookup("missing")).toEqual([]);
    expect(index.size).toBe(2);
  });

  it("should prune a bucket when its last key leaves", () => {
    index.add("open", 1);
    index.add("open", 2);

    index.remove("open", 1);
    expect(index.has("open")).toBe(true);

    index.remove("open", 2);
    expect(index.has("open")).toBe(false);
    expect(index.size).toBe(0);
  });

  it("should index null values", () => {
    index.add(null, 1);
    expect(index.lookup(null)).toEqual([1]);
    expect(index.has("null")).toBe(false);
  });

  it("should move keys between buckets", () => {
    index.add("open", 1);
    index.move("open", "closed", 1);

    expect(index.has("open")).toBe(false);
    expect(index.lookup("closed")).toEqual([1]);
  });

  it("should fail to remove an unregistered key", () => {
    index.add("open", 1);
    expect(() => index.remove("open", 2)).toThrow(MissingDataError);
    expect(() => index.remove("closed", 1)).toThrow(MissingDataError);
    expect(index.lookup("open")).toEqual([1]);
  });

  it("should check registration without mutating", () => {
    index.add("open", 1);

    expect(() => index.assertRegistered("open", 1)).not.toThrow();
    expect(() => index.assertRegistered("open", 2)).toThrow(MissingDataError);
    expect(() => index.assertRegistered("closed", 1)).toThrow(
      'Index on "status" has no entry for primary key 1 under value closed'
    );
    expect(index.lookup("open")).toEqual([1]);
  });

  it("should hand out copies of stored values", () => {
    const primary = new Column({ name: "id", type: "list", primaryKey: true });
    const labels = new Column({ name: "labels", type: "list", indexed: true });
    const byLabels = new SecondaryIndex(labels, primary);
    const value = ["a"];
    const key = ["k"];
    byLabels.add(value, key);

    const [[storedValue, [storedKey]]] = byLabels.entries();
    expect(storedValue).toEqual(["a"]);
    expect(storedValue).not.toBe(value);
    expect(storedKey).not.toBe(key);
    expect(byLabels.lookup(["a"])[0]).not.toBe(key);
  });

  it("should list entries in bucket creation order", () => {
    index.add("b", 1);
    index.add("a", 2);
    index.add("b", 3);

    expect(index.entries()).toEqual([
      ["b", [1, 3]],
      ["a", [2]],
    ]);
  });
});
