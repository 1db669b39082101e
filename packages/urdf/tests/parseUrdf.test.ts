import { describe, it, expect } from "vitest";
import {
  attrValue,
  childElements,
  elementsByTagName,
  formatFloat,
  formatVector,
  parseTriple,
  parseUrdfDocument,
  replaceAttributes,
  serializeElement,
} from "../src/parseUrdf.js";
import { UrdfParseError } from "../src/UrdfParseError.js";

describe("formatFloat", () => {
  it("keeps a trailing .0 on integral values", () => {
    expect(formatFloat(2)).toBe("2.0");
    expect(formatFloat(-3)).toBe("-3.0");
    expect(formatFloat(0)).toBe("0.0");
  });

  it("uses the shortest round-trip form otherwise", () => {
    expect(formatFloat(5.1)).toBe("5.1");
    expect(formatFloat(0.1 + 0.2)).toBe("0.30000000000000004");
    expect(formatFloat(1e21)).toBe("1e+21");
  });

  it("formatVector() joins with single spaces", () => {
    expect(formatVector([2, 4, 6])).toBe("2.0 4.0 6.0");
  });
});

describe("parseTriple", () => {
  it("parses space-separated numbers", () => {
    expect(parseTriple(" 1.0  0 0.5 ")).toEqual([1, 0, 0.5]);
  });

  it("defaults missing values to 0", () => {
    expect(parseTriple("1")).toEqual([1, 0, 0]);
    expect(parseTriple(undefined)).toEqual([0, 0, 0]);
  });
});

describe("parseUrdfDocument", () => {
  it("returns a document rooted at <robot>", () => {
    const doc = parseUrdfDocument('<robot name="r"><link name="a"/></robot>');
    expect(doc.documentElement.tagName).toBe("robot");
    expect(attrValue(doc.documentElement, "name")).toBe("r");
  });

  it("throws when <robot> is missing", () => {
    expect(() => parseUrdfDocument("<not_a_robot/>")).toThrow(/missing <robot>/);
  });

  it("throws UrdfParseError for an empty source", () => {
    expect(() => parseUrdfDocument("")).toThrow(UrdfParseError);
  });
});

describe("element helpers", () => {
  const xml = '<robot name="r"><link name="a"><visual/><collision/></link><joint name="j"/><link name="b"/></robot>';

  it("childElements() filters direct children by tag", () => {
    const robot = parseUrdfDocument(xml).documentElement;
    expect(childElements(robot).map((e) => e.tagName)).toEqual(["link", "joint", "link"]);
    expect(childElements(robot, "link").map((e) => attrValue(e, "name"))).toEqual(["a", "b"]);
  });

  it("elementsByTagName() walks in document order", () => {
    const links = elementsByTagName(parseUrdfDocument(xml), "link");
    expect(links.map((e) => attrValue(e, "name"))).toEqual(["a", "b"]);
  });

  it("attrValue() is undefined for a missing attribute", () => {
    const joint = childElements(parseUrdfDocument(xml).documentElement, "joint")[0];
    expect(attrValue(joint, "type")).toBeUndefined();
  });

  it("replaceAttributes() drops attributes that are not listed", () => {
    const doc = parseUrdfDocument('<robot name="r"><box size="1 1 1" color="red"/></robot>');
    const [shape] = childElements(doc.documentElement, "box");
    replaceAttributes(shape, { size: "2.0 2.0 2.0" });
    expect(serializeElement(shape)).toBe('<box size="2.0 2.0 2.0"/>');
  });
});
