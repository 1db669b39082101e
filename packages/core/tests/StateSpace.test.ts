import { describe, it, expect } from "vitest";
import { FixedBaseSpace, FloatingBaseSpace, ProductSpace } from "../src/StateSpace.js";
import { ConfigurationError } from "../src/ConfigurationError.js";

describe("FloatingBaseSpace", () => {
  it("adds a quaternion + translation to the joint coordinates", () => {
    const space = new FloatingBaseSpace(3);
    expect(space.nq).toBe(10);
    expect(space.nv).toBe(9);
    expect(space.nx).toBe(19);
  });

  it("is a bare rigid body with zero joints", () => {
    const space = new FloatingBaseSpace(0);
    expect(space.nq).toBe(7);
    expect(space.nv).toBe(6);
  });

  it("rejects a negative joint count", () => {
    expect(() => new FloatingBaseSpace(-1)).toThrow(ConfigurationError);
  });
});

describe("FixedBaseSpace", () => {
  it("has equal position and velocity dimensions", () => {
    const space = new FixedBaseSpace(4);
    expect(space.nq).toBe(4);
    expect(space.nv).toBe(4);
  });

  it("rejects a fractional joint count", () => {
    expect(() => new FixedBaseSpace(1.5)).toThrow(/non-negative integer/);
  });
});

describe("ProductSpace", () => {
  const space = new ProductSpace([new FixedBaseSpace(0), new FloatingBaseSpace(2), new FixedBaseSpace(3)]);

  it("sums factor dimensions", () => {
    expect(space.nq).toBe(0 + 9 + 3);
    expect(space.nv).toBe(0 + 8 + 3);
    expect(space.nx).toBe(23);
  });

  it("keeps factor order", () => {
    expect(space.factors.map((f) => f.kind)).toEqual(["fixed-base", "floating-base", "fixed-base"]);
  });

  it("reports each factor's slice of the position vector", () => {
    expect(space.positionSlices()).toEqual([
      { start: 0, end: 0 },
      { start: 0, end: 9 },
      { start: 9, end: 12 },
    ]);
  });

  it("reports each factor's slice of the velocity vector", () => {
    expect(space.velocitySlices()).toEqual([
      { start: 0, end: 0 },
      { start: 0, end: 8 },
      { start: 8, end: 11 },
    ]);
  });

  it("does not see later changes to the array it was built from", () => {
    const factors = [new FixedBaseSpace(1)];
    const product = new ProductSpace(factors);
    factors.push(new FixedBaseSpace(5));
    expect(product.nq).toBe(1);
  });
});
