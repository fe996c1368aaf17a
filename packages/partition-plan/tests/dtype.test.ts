import { describe, expect, it } from "vitest";
import { isDType, isRepresentable, itemSize, parseDType } from "../src/dtype.js";
import { ValidationError } from "../src/errors.js";

describe("parseDType", () => {
  it("accepts canonical names", () => {
    expect(parseDType("float32")).toBe("float32");
    expect(parseDType(" UINT16 ")).toBe("uint16");
  });

  it("accepts array-protocol codes", () => {
    expect(parseDType("<f8")).toBe("float64");
    expect(parseDType("|u1")).toBe("uint8");
    expect(parseDType("i4")).toBe("int32");
    expect(parseDType("=i2")).toBe("int16");
  });

  it("rejects big-endian codes", () => {
    expect(() => parseDType(">f8")).toThrow(ValidationError);
  });

  it("rejects unknown and 64-bit integer types", () => {
    expect(() => parseDType("complex128")).toThrow(ValidationError);
    expect(() => parseDType("int64")).toThrow(/Unrecognized dtype "int64"/);
  });
});

describe("isDType", () => {
  it("only accepts canonical names", () => {
    expect(isDType("float64")).toBe(true);
    expect(isDType("f8")).toBe(false);
    expect(isDType("toString")).toBe(false);
    expect(isDType(4)).toBe(false);
  });
});

describe("itemSize", () => {
  it("reports bytes per element", () => {
    expect(itemSize("uint8")).toBe(1);
    expect(itemSize("int16")).toBe(2);
    expect(itemSize("float32")).toBe(4);
    expect(itemSize("float64")).toBe(8);
  });
});

describe("isRepresentable", () => {
  it("bounds integers by their width and sign", () => {
    expect(isRepresentable(255, "uint8")).toBe(true);
    expect(isRepresentable(256, "uint8")).toBe(false);
    expect(isRepresentable(-1, "uint32")).toBe(false);
    expect(isRepresentable(-32768, "int16")).toBe(true);
    expect(isRepresentable(2.5, "int16")).toBe(false);
  });

  it("accepts fractions for floats but not values past float32's range", () => {
    expect(isRepresentable(2.5, "float32")).toBe(true);
    expect(isRepresentable(1e39, "float32")).toBe(false);
    expect(isRepresentable(1e39, "float64")).toBe(true);
    expect(isRepresentable(Number.POSITIVE_INFINITY, "float64")).toBe(false);
  });
});
