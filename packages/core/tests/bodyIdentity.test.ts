import { describe, it, expect } from "vitest";
import {
  enumerateBodies,
  enumerateInertialBodies,
  inertialBodyIdentifiers,
  uniqueBodyIdentifier,
} from "../src/bodyIdentity.js";
import { StaticTopology } from "../src/StaticTopology.js";
import { ConfigurationError } from "../src/ConfigurationError.js";

function twoModels(): StaticTopology {
  return StaticTopology.fromDescription({
    modelInstances: [
      { name: "WorldModelInstance", bodies: [{ name: "world" }], numVelocities: 0 },
      { name: "cube", bodies: [{ name: "body", freeBase: "quaternion" }], numVelocities: 6 },
      { name: "arm", bodies: [{ name: "base" }, { name: "link1" }], numVelocities: 1 },
    ],
  });
}

describe("uniqueBodyIdentifier", () => {
  it("joins instance and body names with an underscore", () => {
    expect(uniqueBodyIdentifier("cube", "body")).toBe("cube_body");
  });
});

describe("enumerateBodies", () => {
  it("lists bodies in instance order, then intrinsic body order", () => {
    const ids = enumerateBodies(twoModels()).map((b) => b.identifier);
    expect(ids).toEqual(["WorldModelInstance_world", "cube_body", "arm_base", "arm_link1"]);
  });

  it("pairs each identifier with its body", () => {
    const [, cube] = enumerateBodies(twoModels());
    expect(cube.body).toEqual({ name: "body", modelInstance: 1, freeBase: "quaternion" });
  });

  it("is deterministic across calls", () => {
    const topology = twoModels();
    expect(enumerateBodies(topology)).toEqual(enumerateBodies(topology));
  });

  it("restricts to the given instances", () => {
    const ids = enumerateBodies(twoModels(), [2]).map((b) => b.identifier);
    expect(ids).toEqual(["arm_base", "arm_link1"]);
  });

  it("throws on an identifier collision", () => {
    const topology = StaticTopology.fromDescription({
      modelInstances: [
        { name: "WorldModelInstance", bodies: [{ name: "world" }], numVelocities: 0 },
        { name: "a_b", bodies: [{ name: "c" }], numVelocities: 0 },
        { name: "a", bodies: [{ name: "b_c" }], numVelocities: 0 },
      ],
    });
    expect(() => enumerateBodies(topology)).toThrow(ConfigurationError);
    expect(() => enumerateBodies(topology)).toThrow(/"a_b_c"/);
  });
});

describe("enumerateInertialBodies", () => {
  it("excludes the world pseudo-instance", () => {
    const ids = enumerateInertialBodies(twoModels()).map((b) => b.identifier);
    expect(ids).toEqual(["cube_body", "arm_base", "arm_link1"]);
  });

  it("inertialBodyIdentifiers returns the same sequence", () => {
    expect(inertialBodyIdentifiers(twoModels())).toEqual(["cube_body", "arm_base", "arm_link1"]);
  });
});
