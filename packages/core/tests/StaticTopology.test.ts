import { describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StaticTopology } from "../src/StaticTopology.js";
import { LookupError } from "../src/LookupError.js";
import { TopologyDescriptionError, readTopologyDescription } from "../src/topologyDescription.js";

// ── fixtures ──────────────────────────────────────────────────────────────────

const DESCRIPTION = {
  modelInstances: [
    { name: "WorldModelInstance", bodies: [{ name: "world" }], numVelocities: 0 },
    { name: "cube", bodies: [{ name: "body", freeBase: "quaternion" }], numVelocities: 6 },
    { name: "gimbal", bodies: [{ name: "frame", freeBase: "roll-pitch-yaw" }], numVelocities: 6 },
  ],
};

// ── tests ─────────────────────────────────────────────────────────────────────

describe("StaticTopology", () => {
  it("indexes model instances by position, world first", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    expect(topology.worldModelInstance()).toBe(0);
    expect(topology.modelInstances()).toEqual([0, 1, 2]);
    expect(topology.modelInstanceName(1)).toBe("cube");
  });

  it("resolves instances by exact name", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    expect(topology.getModelInstanceByName("gimbal")).toBe(2);
  });

  it("throws LookupError for an unknown name", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    expect(() => topology.getModelInstanceByName("Cube")).toThrow(LookupError);
    expect(() => topology.getModelInstanceByName("Cube")).toThrow('Model instance "Cube" not found.');
  });

  it("throws LookupError for an out-of-range index", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    expect(() => topology.bodies(7)).toThrow(LookupError);
  });

  it("lists free base bodies", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    expect(topology.freeBaseBodies(0)).toEqual([]);
    expect(topology.freeBaseBodies(1).map((b) => b.name)).toEqual(["body"]);
  });

  it("counts one extra position per quaternion free body", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    expect(topology.numPositions(1)).toBe(7);
    expect(topology.numPositions(2)).toBe(6);
  });

  it("toDescription() round-trips through fromDescription()", () => {
    const topology = StaticTopology.fromDescription(DESCRIPTION);
    const copy = StaticTopology.fromDescription(topology.toDescription());
    expect(copy.toDescription()).toEqual(DESCRIPTION);
  });
});

describe("topology description validation", () => {
  it("rejects duplicate model instance names", () => {
    const input = {
      modelInstances: [DESCRIPTION.modelInstances[0], DESCRIPTION.modelInstances[1], DESCRIPTION.modelInstances[1]],
    };
    expect(() => StaticTopology.fromDescription(input)).toThrow(TopologyDescriptionError);
  });

  it("reports the path of each issue", () => {
    try {
      StaticTopology.fromDescription({
        modelInstances: [
          DESCRIPTION.modelInstances[0],
          { name: "w", bodies: [{ name: "a", freeBase: "quaternion" }], numVelocities: 2 },
        ],
      });
      expect.fail("expected a TopologyDescriptionError");
    } catch (err) {
      expect(err).toBeInstanceOf(TopologyDescriptionError);
      if (err instanceof TopologyDescriptionError) {
        expect(err.issues.map((i) => i.path.join("."))).toEqual(["modelInstances.1.numVelocities"]);
        expect(err.format()).toContain("modelInstances.1.numVelocities: 1 free body(ies) need at least 6 velocities");
      }
    }
  });

  it("requires the world model instance first", () => {
    try {
      StaticTopology.fromDescription({
        modelInstances: [{ name: "cube", bodies: [{ name: "body", freeBase: "quaternion" }], numVelocities: 6 }],
      });
      expect.fail("expected a TopologyDescriptionError");
    } catch (err) {
      expect(err).toBeInstanceOf(TopologyDescriptionError);
      if (err instanceof TopologyDescriptionError) {
        expect(err.issues).toEqual([
          { path: ["modelInstances", 0, "name"], message: 'first model instance must be "WorldModelInstance", got "cube"' },
          { path: ["modelInstances", 0, "numVelocities"], message: "the world model instance has no velocities" },
          { path: ["modelInstances", 0, "bodies"], message: "the world model instance has no free bodies" },
        ]);
      }
    }
  });

  it("rejects a world model instance that moves", () => {
    expect(() =>
      StaticTopology.fromDescription({
        modelInstances: [{ name: "WorldModelInstance", bodies: [{ name: "world" }], numVelocities: 1 }],
      }),
    ).toThrow(TopologyDescriptionError);
  });

  it("rejects unknown keys", () => {
    expect(() =>
      StaticTopology.fromDescription({ modelInstances: [], extra: true }),
    ).toThrow(/validation error/);
  });

  it("reads a description from a JSON file", () => {
    const dir = mkdtempSync(join(tmpdir(), "topology-"));
    try {
      const path = join(dir, "topology.json");
      writeFileSync(path, JSON.stringify(DESCRIPTION));
      expect(readTopologyDescription(path)).toEqual(DESCRIPTION);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
