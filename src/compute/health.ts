import type { ContactAccess, PersonAccess, Text } from "../bridge/access.js";
import {
  createHealthAnalysis, createPersonInfo,
  type BmiCategory, type HealthAnalysis, type PersonInfo,
} from "../bridge/results.js";
import type { Logger } from "../logging/logger.js";

// Computation entry points. Everything here reads through the access
// capabilities, so the same code serves opaque handles and owned records.
// No function keeps state between calls.

/**
 * Weight used by processPerson, which has no weight input. This is a fixed
 * placeholder, not a per-person value; analyzeHealth takes a real weight.
 */
export const ASSUMED_WEIGHT_KG = 70.0;

export const ADULT_AGE = 18;
export const UNKNOWN_CITY = "Unknown";

export const RECOMMENDATIONS = {
  excellent: "Excellent health profile. Maintain current lifestyle.",
  good: "Good health. Consider minor lifestyle adjustments.",
  elevated: "Elevated risk factors. Recommend consultation with healthcare provider.",
} as const;

const CITY_RISK: ReadonlyMap<string, number> = new Map([
  ["New York", 1.2],
  ["Los Angeles", 1.1],
]);

/**
 * Length in Unicode code points: not UTF-16 units, not UTF-8 bytes.
 * A precomposed "ë" counts 1, a decomposed one counts 2.
 */
export function textLength(text: string): number {
  return Array.from(text).length;
}

export function calculateBmi(weightKg: number, heightM: number): number {
  if (heightM <= 0) return 0.0;
  return weightKg / (heightM * heightM);
}

export function bmiCategory(bmi: number): BmiCategory {
  if (bmi < 18.5) return "underweight";
  if (bmi < 25.0) return "normal";
  return "overweight";
}

export function processPerson(person: PersonAccess): PersonInfo {
  const age = person.age();
  const height = person.height();
  const name = person.name();
  const city = person.contact().address().city();

  // height <= 0 gives bmi 0, which maps to underweight
  const bmi = calculateBmi(ASSUMED_WEIGHT_KG, height);

  return createPersonInfo({
    isAdult: age >= ADULT_AGE,
    bmiCategory: bmiCategory(bmi),
    nameLength: name === null ? 0 : textLength(name),
    city: city ?? UNKNOWN_CITY,
  });
}

// Exact, case-sensitive match; undecodable text matches nothing.
export function cityRiskFactor(city: Text): number {
  if (city === null) return 1.0;
  return CITY_RISK.get(city) ?? 1.0;
}

function recommend(riskScore: number): string {
  if (riskScore < 1.2) return RECOMMENDATIONS.excellent;
  if (riskScore < 1.5) return RECOMMENDATIONS.good;
  return RECOMMENDATIONS.elevated;
}

export function analyzeHealth(person: PersonAccess, weightKg: number): HealthAnalysis {
  const age = person.age();
  const height = person.height();
  const city = person.contact().address().city();

  const bmi = calculateBmi(weightKg, height);

  const ageRisk = age < 18 || age > 65 ? 1.5 : 1.0;
  const bmiRisk = bmi < 18.5 || bmi > 25.0 ? 1.3 : 1.0;
  const cityRisk = cityRiskFactor(city);

  const riskScore = ageRisk * bmiRisk * cityRisk;

  return createHealthAnalysis({
    bmi,
    riskScore,
    recommendation: recommend(riskScore),
    cityRiskFactor: cityRisk,
  });
}

export function validateContact(contact: ContactAccess): boolean {
  const address = contact.address();
  const email = contact.email() ?? "";
  const phone = contact.phone() ?? "";
  const city = address.city() ?? "";
  const postalCode = address.postalCode() ?? "";

  const emailValid = email.includes("@") && textLength(email) > 3;
  const phoneValid = textLength(phone) >= 7;
  const cityValid = city.length > 0;
  const postalValid = textLength(postalCode) >= 5;

  return emailValid && phoneValid && cityValid && postalValid;
}

/** Logs a greeting and returns the name's length in code points. */
export function greetPerson(name: string, logger: Logger): number {
  if (name.length === 0) {
    logger.info("Hello, stranger!");
    return 0;
  }
  logger.info(`Hello, ${name}!`);
  return textLength(name);
}
