import { describe, it, expect } from "vitest";
import { fieldOffset, recordLayout, recordSize } from "../../src/foreign/layout.js";

describe("record layout", () => {
  it("lays out Address as three text pointers", () => {
    expect(recordLayout("Address").map((f) => [f.name, f.offset])).toEqual([
      ["street", 0],
      ["city", 4],
      ["postal_code", 8],
    ]);
    expect(recordSize("Address")).toBe(12);
  });

  it("aligns Person.height to 8 bytes after the u32 age", () => {
    expect(fieldOffset("Person", "age")).toBe(0);
    expect(fieldOffset("Person", "height")).toBe(8);
    expect(fieldOffset("Person", "name")).toBe(16);
    expect(fieldOffset("Person", "contact")).toBe(20);
    expect(recordSize("Person")).toBe(24);
  });

  it("pads HealthAnalysis.city_risk_factor after the recommendation pointer", () => {
    expect(fieldOffset("HealthAnalysis", "recommendation")).toBe(16);
    expect(fieldOffset("HealthAnalysis", "city_risk_factor")).toBe(24);
    expect(recordSize("HealthAnalysis")).toBe(32);
  });

  it("keeps PersonInfo fields in declaration order", () => {
    expect(recordLayout("PersonInfo").map((f) => f.name)).toEqual([
      "is_adult", "bmi_category", "name_length", "city",
    ]);
    expect(recordSize("PersonInfo")).toBe(16);
    expect(recordSize("ContactInfo")).toBe(12);
  });
});
