import { describe, it, expect } from "vitest";
import { contactAccess, personAccess, type ContactInfo } from "../../src/bridge/records.js";
import type { PersonAccess } from "../../src/bridge/access.js";
import {
  RECOMMENDATIONS, analyzeHealth, bmiCategory, calculateBmi, cityRiskFactor,
  greetPerson, processPerson, textLength, validateContact,
} from "../../src/compute/health.js";
import { createMemoryLogger } from "../../src/logging/logger.js";
import { BOB, CHARLIE, person } from "../fixtures.js";

function contact(overrides: Partial<Omit<ContactInfo, "address">> & { city?: string; postalCode?: string }): ContactInfo {
  return {
    email: overrides.email ?? "a@b.co",
    phone: overrides.phone ?? "5551234567",
    address: {
      street: "1 Elm St",
      city: overrides.city ?? "Boston",
      postalCode: overrides.postalCode ?? "02134",
    },
  };
}

describe("calculateBmi", () => {
  it("divides weight by height squared", () => {
    expect(calculateBmi(70, 1.75)).toBeCloseTo(22.857, 3);
    expect(calculateBmi(80, 2)).toBe(20);
  });

  it("returns 0 for a height of zero or less", () => {
    expect(calculateBmi(70, 0)).toBe(0);
    expect(calculateBmi(70, -1.8)).toBe(0);
  });
});

describe("bmiCategory", () => {
  it("uses half-open bands", () => {
    expect(bmiCategory(18.49999)).toBe("underweight");
    expect(bmiCategory(18.5)).toBe("normal");
    expect(bmiCategory(24.99999)).toBe("normal");
    expect(bmiCategory(25)).toBe("overweight");
    expect(bmiCategory(0)).toBe("underweight");
  });
});

describe("textLength", () => {
  it("counts code points", () => {
    expect(textLength("")).toBe(0);
    expect(textLength("Zo\u00eb")).toBe(3);
    expect(textLength("Zoe\u0308")).toBe(4);
    expect(textLength("\u{1F44B}\u{1F3FD}")).toBe(2);
  });
});

describe("processPerson", () => {
  it("summarises an adult with a normal BMI", () => {
    expect(processPerson(personAccess(BOB))).toEqual({
      isAdult: true,
      bmiCategory: "normal",
      nameLength: 11,
      city: "New York",
    });
  });

  it("summarises a minor with the assumed weight", () => {
    // 70 / 1.6^2 = 27.34
    expect(processPerson(personAccess(CHARLIE))).toEqual({
      isAdult: false,
      bmiCategory: "overweight",
      nameLength: 13,
      city: "Boston",
    });
  });

  it("treats 18 as adult and 17 as not", () => {
    expect(processPerson(personAccess(person({ age: 18 }))).isAdult).toBe(true);
    expect(processPerson(personAccess(person({ age: 17 }))).isAdult).toBe(false);
  });

  it("maps a non-positive height to underweight", () => {
    expect(processPerson(personAccess(person({ height: 0 }))).bmiCategory).toBe("underweight");
  });

  it("keeps an empty city as is", () => {
    expect(processPerson(personAccess(person({ city: "" }))).city).toBe("");
  });

  it("substitutes sentinels for undecodable text", () => {
    const base = personAccess(BOB);
    const undecodable: PersonAccess = {
      ...base,
      name: () => null,
      contact: () => ({
        ...base.contact(),
        address: () => ({ street: () => null, city: () => null, postalCode: () => null }),
      }),
    };
    const info = processPerson(undecodable);
    expect(info.nameLength).toBe(0);
    expect(info.city).toBe("Unknown");
  });

  it("returns a frozen record", () => {
    expect(Object.isFrozen(processPerson(personAccess(BOB)))).toBe(true);
  });
});

describe("cityRiskFactor", () => {
  it("matches known cities exactly", () => {
    expect(cityRiskFactor("New York")).toBe(1.2);
    expect(cityRiskFactor("Los Angeles")).toBe(1.1);
    expect(cityRiskFactor("new york")).toBe(1.0);
    expect(cityRiskFactor("Boston")).toBe(1.0);
    expect(cityRiskFactor(null)).toBe(1.0);
  });
});

describe("analyzeHealth", () => {
  it("scores a New York adult in the normal band as good", () => {
    const analysis = analyzeHealth(personAccess(BOB), 75);
    expect(analysis.bmi).toBeCloseTo(24.49, 2);
    expect(analysis.riskScore).toBe(1.2);
    expect(analysis.cityRiskFactor).toBe(1.2);
    expect(analysis.recommendation).toBe(RECOMMENDATIONS.good);
  });

  it("scores a minor as elevated", () => {
    const analysis = analyzeHealth(personAccess(CHARLIE), 55);
    expect(analysis.bmi).toBeCloseTo(21.48, 2);
    expect(analysis.riskScore).toBe(1.5);
    expect(analysis.recommendation).toBe(RECOMMENDATIONS.elevated);
  });

  it("multiplies age, BMI and city risk", () => {
    const analysis = analyzeHealth(personAccess(person({ age: 70, height: 2 })), 120);
    expect(analysis.bmi).toBe(30);
    expect(analysis.riskScore).toBeCloseTo(2.34, 9);
    expect(analysis.recommendation).toBe(RECOMMENDATIONS.elevated);
  });

  it("recommends the excellent profile below a risk of 1.2", () => {
    const analysis = analyzeHealth(personAccess(person({ height: 2, city: "Los Angeles" })), 80);
    expect(analysis.riskScore).toBe(1.1);
    expect(analysis.recommendation).toBe(RECOMMENDATIONS.excellent);
  });

  it("does not add BMI risk at exactly 25", () => {
    const analysis = analyzeHealth(personAccess(person({ height: 2, city: "Boston" })), 100);
    expect(analysis.bmi).toBe(25);
    expect(analysis.riskScore).toBe(1);
  });

  it("adds age risk above 65 but not at 65", () => {
    const at65 = analyzeHealth(personAccess(person({ age: 65, height: 2, city: "Boston" })), 80);
    const at66 = analyzeHealth(personAccess(person({ age: 66, height: 2, city: "Boston" })), 80);
    expect(at65.riskScore).toBe(1);
    expect(at66.riskScore).toBe(1.5);
  });

  it("reports a zero BMI as underweight risk when height is zero", () => {
    const analysis = analyzeHealth(personAccess(person({ height: 0, city: "Boston" })), 80);
    expect(analysis.bmi).toBe(0);
    expect(analysis.riskScore).toBe(1.3);
    expect(analysis.recommendation).toBe(RECOMMENDATIONS.good);
  });
});

describe("validateContact", () => {
  it("accepts a complete contact", () => {
    expect(validateContact(contactAccess(contact({})))).toBe(true);
    expect(validateContact(contactAccess(BOB.contact))).toBe(true);
  });

  it("requires an @ and more than three characters in the email", () => {
    expect(validateContact(contactAccess(contact({ email: "bad-email" })))).toBe(false);
    expect(validateContact(contactAccess(contact({ email: "a@b" })))).toBe(false);
    expect(validateContact(contactAccess(contact({ email: "a@bc" })))).toBe(true);
  });

  it("requires at least seven phone characters", () => {
    expect(validateContact(contactAccess(contact({ phone: "555123" })))).toBe(false);
    expect(validateContact(contactAccess(contact({ phone: "5551234" })))).toBe(true);
  });

  it("requires a city", () => {
    expect(validateContact(contactAccess(contact({ city: "" })))).toBe(false);
  });

  it("requires at least five postal code characters", () => {
    expect(validateContact(contactAccess(contact({ postalCode: "1234" })))).toBe(false);
    expect(validateContact(contactAccess(contact({ postalCode: "12345" })))).toBe(true);
  });

  it("treats undecodable text as empty", () => {
    const base = contactAccess(contact({}));
    expect(validateContact({ ...base, email: () => null })).toBe(false);
  });
});

describe("greetPerson", () => {
  it("greets a stranger for an empty name", () => {
    const logger = createMemoryLogger();
    expect(greetPerson("", logger)).toBe(0);
    expect(logger.lines).toEqual(["[INFO] Hello, stranger!"]);
  });

  it("greets by name and returns its length", () => {
    const logger = createMemoryLogger();
    expect(greetPerson("Alice", logger)).toBe(5);
    expect(logger.lines).toEqual(["[INFO] Hello, Alice!"]);
  });

  it("counts a single emoji as one", () => {
    expect(greetPerson("👋", createMemoryLogger())).toBe(1);
  });
});
