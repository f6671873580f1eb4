import { describe, it, expect } from "vitest";
import { Buffer } from "node:buffer";
import { DATA_TYPE_TAGS, cellKey, describeValue, getDataType, isDataTypeTag } from "./datatypes.js";
import { UnsupportedTypeError } from "./errors.js";

describe("getDataType", () => {
  it("should resolve every supported tag", () => {
    for (const tag of DATA_TYPE_TAGS) {
      expect(getDataType(tag).tag).toBe(tag);
    }
    expect(DATA_TYPE_TAGS).toHaveLength(16);
  });

  it("should reject unknown tags", () => {
    expect(() => getDataType("uuid")).toThrow(UnsupportedTypeError);
    expect(() => getDataType("uuid")).toThrow('Unsupported data type "uuid"');
    expect(isDataTypeTag("uuid")).toBe(false);
    expect(isDataTypeTag("toString")).toBe(false);
  });
});

describe("type guards", () => {
  it("should separate integers from floats", () => {
    expect(getDataType("integer").is(3)).toBe(true);
    expect(getDataType("integer").is(3.5)).toBe(false);
    expect(getDataType("float").is(3)).toBe(true);
    expect(getDataType("float").is(Number.NaN)).toBe(true);
    expect(getDataType("float").is("3")).toBe(false);
  });

  it("should separate lists from tuples by frozenness", () => {
    const list = getDataType("list");
    const tuple = getDataType("tuple");
    expect(list.is([1, "a"])).toBe(true);
    expect(tuple.is([1, "a"])).toBe(false);
    expect(tuple.is(Object.freeze([1, "a"]))).toBe(true);
    expect(list.is(Object.freeze([1]))).toBe(false);
    expect(list.is([new Date()])).toBe(false);
  });

  it("should accept only plain objects as mappings", () => {
    const mapping = getDataType("mapping");
    expect(mapping.is({ a: 1, b: [true] })).toBe(true);
    expect(mapping.is(new Date())).toBe(false);
    expect(mapping.is(new Map())).toBe(false);
    expect(mapping.is([])).toBe(false);
  });

  it("should validate calendar dates", () => {
    const date = getDataType("date");
    expect(date.is("2024-02-29")).toBe(true);
    expect(date.is("2023-02-29")).toBe(false);
    expect(date.is("0050-01-01")).toBe(true);
    expect(date.is("0000-01-01")).toBe(false);
    expect(date.is("2024-2-1")).toBe(false);
  });

  it("should validate times and decimals", () => {
    expect(getDataType("time").is("23:59")).toBe(true);
    expect(getDataType("time").is("23:59:60")).toBe(false);
    expect(getDataType("time").is("07:05:09.123")).toBe(true);
    expect(getDataType("decimal").is("-12.50")).toBe(true);
    expect(getDataType("decimal").is(".5e3")).toBe(true);
    expect(getDataType("decimal").is(".")).toBe(false);
    expect(getDataType("decimal").is("1,5")).toBe(false);
  });

  it("should separate Buffers from plain Uint8Arrays", () => {
    expect(getDataType("bytes").is(Buffer.from("ab"))).toBe(true);
    expect(getDataType("bytes").is(new Uint8Array([1]))).toBe(false);
    expect(getDataType("bytearray").is(new Uint8Array([1]))).toBe(true);
    expect(getDataType("bytearray").is(Buffer.from("ab"))).toBe(false);
  });

  it("should check counter and ordered mapping contents", () => {
    expect(getDataType("counter").is(new Map([["a", 2]]))).toBe(true);
    expect(getDataType("counter").is(new Map([["a", 1.5]]))).toBe(false);
    expect(getDataType("ordered_mapping").is(new Map([["a", { b: 1 }]]))).toBe(true);
    expect(getDataType("ordered_mapping").is(new Map([[1, "a"]]))).toBe(false);
  });

  it("should reject invalid dates", () => {
    expect(getDataType("datetime").is(new Date("not a date"))).toBe(false);
    expect(getDataType("datetime").is("2024-01-01T00:00:00Z")).toBe(false);
  });
});

describe("identity keys", () => {
  it("should treat -0 and 0 as the same number", () => {
    const float = getDataType("float");
    expect(float.key(-0)).toBe(float.key(0));
  });

  it("should ignore key order for mappings but not ordered mappings", () => {
    const mapping = getDataType("mapping");
    expect(mapping.key({ a: 1, b: 2 })).toBe(mapping.key({ b: 2, a: 1 }));

    const ordered = getDataType("ordered_mapping");
    const ab = new Map([["a", 1], ["b", 2]]);
    const ba = new Map([["b", 2], ["a", 1]]);
    expect(ordered.key(ab)).not.toBe(ordered.key(ba));
  });

  it("should compare decimals by value", () => {
    const decimal = getDataType("decimal");
    expect(decimal.key("1.0")).toBe("1e0");
    expect(decimal.key("1.00")).toBe("1e0");
    expect(decimal.key("0.1e1")).toBe("1e0");
    expect(decimal.key("100")).toBe("1e2");
    expect(decimal.key("-0.0")).toBe("0");
    expect(decimal.key("-2.50")).toBe("-25e-1");
  });

  it("should normalise times", () => {
    const time = getDataType("time");
    expect(time.key("12:00")).toBe("12:00:00.000000");
    expect(time.key("12:00:00.5")).toBe("12:00:00.500000");
  });

  it("should keep null apart from the string 'null'", () => {
    const string = getDataType("string");
    expect(cellKey(string, null)).not.toBe(cellKey(string, "null"));
  });
});

describe("JSON codec", () => {
  it("should encode non-finite floats as strings", () => {
    const float = getDataType("float");
    expect(float.encode(Number.POSITIVE_INFINITY)).toBe("Infinity");
    expect(float.decode("-Infinity")).toBe(Number.NEGATIVE_INFINITY);
    expect(Number.isNaN(float.decode("NaN"))).toBe(true);
    expect(float.decode("constructor")).toBe("constructor");
  });

  it("should keep the sign of negative zero floats", () => {
    const float = getDataType("float");
    expect(float.encode(-0)).toBe("-0");
    expect(float.encode(0)).toBe(0);
    expect(Object.is(float.decode("-0"), -0)).toBe(true);
  });

  it("should round-trip datetimes through ISO strings", () => {
    const datetime = getDataType("datetime");
    const value = new Date("2024-05-06T07:08:09.010Z");
    expect(datetime.encode(value)).toBe("2024-05-06T07:08:09.010Z");
    expect(datetime.decode("2024-05-06T07:08:09.010Z")).toEqual(value);
    expect(datetime.decode("yesterday")).toBe("yesterday");
  });

  it("should round-trip binaries through base64", () => {
    const bytes = getDataType("bytes");
    expect(bytes.encode(Buffer.from([1, 2, 3]))).toBe("AQID");
    expect(bytes.decode("AQID")).toEqual(Buffer.from([1, 2, 3]));

    const bytearray = getDataType("bytearray");
    const decoded = bytearray.decode("AQID");
    expect(decoded).toBeInstanceOf(Uint8Array);
    expect(Buffer.isBuffer(decoded)).toBe(false);
    expect(bytearray.is(decoded)).toBe(true);
  });

  it("should freeze decoded tuples", () => {
    const decoded = getDataType("tuple").decode([1, 2]);
    expect(Object.isFrozen(decoded)).toBe(true);
    expect(decoded).toEqual([1, 2]);
  });

  it("should encode ordered mappings as entry pairs", () => {
    const ordered = getDataType("ordered_mapping");
    const value = new Map([["z", 1], ["a", 2]]);
    expect(ordered.encode(value)).toEqual([["z", 1], ["a", 2]]);
    expect(ordered.decode([["z", 1], ["a", 2]])).toEqual(value);
    expect(ordered.decode([["z"]])).toEqual([["z"]]);
  });

  it("should encode counters as objects", () => {
    const counter = getDataType("counter");
    expect(counter.encode(new Map([["a", 2]]))).toEqual({ a: 2 });
    expect(counter.decode({ a: 2 })).toEqual(new Map([["a", 2]]));
    expect(counter.decode({ a: "x" })).toEqual({ a: "x" });
  });
});

describe("clone", () => {
  it("should copy structured values deeply", () => {
    const inner = [2];
    const list = [1, inner];
    const copy = getDataType("list").clone(list);
    inner.push(3);
    expect(copy).not.toBe(list);
    expect(copy).toEqual([1, [2]]);

    const nested = { b: 1 };
    const mappingCopy = getDataType("mapping").clone({ a: nested });
    nested.b = 2;
    expect(mappingCopy).toEqual({ a: { b: 1 } });
  });

  it("should keep tuples frozen but detach nested arrays", () => {
    const inner = [1];
    const tuple = getDataType("tuple");
    const copy = tuple.clone(Object.freeze([inner, 2]));
    inner.push(9);

    expect(Object.isFrozen(copy)).toBe(true);
    expect(tuple.is(copy)).toBe(true);
    expect(copy).toEqual([[1], 2]);
  });

  it("should copy dates, binaries and maps into the same kinds", () => {
    const date = new Date(1000);
    const dateCopy = getDataType("datetime").clone(date);
    date.setTime(0);
    expect(dateCopy).toEqual(new Date(1000));

    const buffer = Buffer.from([1, 2]);
    const bufferCopy = getDataType("bytes").clone(buffer);
    buffer[0] = 9;
    expect(Buffer.isBuffer(bufferCopy)).toBe(true);
    expect(bufferCopy).toEqual(Buffer.from([1, 2]));

    const bytearray = getDataType("bytearray");
    const array = new Uint8Array([3]);
    const arrayCopy = bytearray.clone(array);
    array[0] = 4;
    expect(bytearray.is(arrayCopy)).toBe(true);
    expect(arrayCopy).toEqual(new Uint8Array([3]));

    const counts = new Map([["a", 1]]);
    const countsCopy = getDataType("counter").clone(counts);
    counts.set("a", 5);
    expect(countsCopy).toEqual(new Map([["a", 1]]));

    const inner = [1];
    const orderedCopy = getDataType("ordered_mapping").clone(new Map([["k", inner]]));
    inner.push(2);
    expect(orderedCopy).toEqual(new Map([["k", [1]]]));
  });
});

describe("describeValue", () => {
  it("should name runtime types", () => {
    expect(describeValue(null)).toBe("null");
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue("a")).toBe("string");
    expect(describeValue([1])).toBe("array");
    expect(describeValue(Object.freeze([1]))).toBe("frozen array");
    expect(describeValue({})).toBe("object");
    expect(describeValue(new Date(0))).toBe("Date");
    expect(describeValue(Buffer.from("a"))).toBe("Buffer");
    expect(describeValue(new Map())).toBe("Map");
  });
});
