import { describe, it, expect } from "vitest";
import { parseAge, parseModel, parsePerson, parseWeight } from "../../src/cli/options.js";

describe("parseAge", () => {
  it("accepts whole numbers up to the u32 maximum", () => {
    expect(parseAge("0").value).toBe(0);
    expect(parseAge("4294967295").value).toBe(4294967295);
  });

  it("rejects negative, fractional and out-of-range ages", () => {
    for (const raw of ["-1", "2.5", "4294967296", "", "abc"]) {
      const parsed = parseAge(raw);
      expect(parsed.value).toBeUndefined();
      expect(parsed.diagnostics).toEqual([
        { severity: "error", message: "Age must be a non-negative whole number", option: "--age", value: raw, help: undefined },
      ]);
    }
  });

  it("reports a missing age", () => {
    expect(parseAge(undefined).diagnostics[0]?.message).toBe("Missing required option");
  });
});

describe("parseWeight", () => {
  it("rejects negative weights", () => {
    expect(parseWeight("-3").diagnostics[0]?.message).toBe("Weight cannot be negative");
  });

  it("rejects text that is not a number", () => {
    expect(parseWeight("heavy").diagnostics[0]?.message).toBe("Expected a number in kilograms");
  });
});

describe("parseModel", () => {
  it("defaults to handle access", () => {
    expect(parseModel(undefined).value).toBe("handle");
  });

  it("rejects unknown models with the list of valid ones", () => {
    expect(parseModel("shared").diagnostics[0]?.help).toBe("Use one of: handle, value, foreign");
  });
});

describe("parsePerson", () => {
  it("builds a person with empty text for omitted fields", () => {
    expect(parsePerson({ age: "30", height: "1.8", name: "Dana", city: "Boston" }).value).toEqual({
      age: 30,
      height: 1.8,
      name: "Dana",
      contact: {
        email: "",
        phone: "",
        address: { street: "", city: "Boston", postalCode: "" },
      },
    });
  });

  it("collects diagnostics for every bad option", () => {
    const parsed = parsePerson({ age: "old", height: "tall" });
    expect(parsed.value).toBeUndefined();
    expect(parsed.diagnostics.map((d) => d.option)).toEqual(["--age", "--height"]);
  });

  it("accepts a non-positive height with a warning", () => {
    const parsed = parsePerson({ age: "30", height: "0" });
    expect(parsed.value?.height).toBe(0);
    expect(parsed.diagnostics).toEqual([
      { severity: "warning", message: "Height is not positive, BMI will be 0", option: "--height", value: "0", help: undefined },
    ]);
  });
});
