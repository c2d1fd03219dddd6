import { error, warning, type Diagnostic } from "../errors/diagnostic.js";
import type { Person } from "../bridge/records.js";

export const ACCESS_MODELS = ["handle", "value", "foreign"] as const;
export type AccessModel = (typeof ACCESS_MODELS)[number];

export interface PersonOptions {
  name?: string;
  age?: string;
  height?: string;
  email?: string;
  phone?: string;
  street?: string;
  city?: string;
  postalCode?: string;
}

export interface Parsed<T> {
  value?: T;
  diagnostics: Diagnostic[];
}

const U32_MAX = 0xffffffff;

export function parseAge(raw: string | undefined, option = "--age"): Parsed<number> {
  if (raw === undefined) {
    return { diagnostics: [error("Missing required option", option, undefined, "Pass the age in whole years, e.g. --age 30")] };
  }
  const age = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(age) || age < 0 || age > U32_MAX) {
    return { diagnostics: [error("Age must be a non-negative whole number", option, raw)] };
  }
  return { value: age, diagnostics: [] };
}

export function parseMeasure(raw: string | undefined, option: string, unit: string): Parsed<number> {
  if (raw === undefined) {
    return { diagnostics: [error("Missing required option", option, undefined, `Pass a value in ${unit}`)] };
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    return { diagnostics: [error(`Expected a number in ${unit}`, option, raw)] };
  }
  return { value, diagnostics: [] };
}

export function parseWeight(raw: string | undefined, option = "--weight"): Parsed<number> {
  const parsed = parseMeasure(raw, option, "kilograms");
  if (parsed.value !== undefined && parsed.value < 0) {
    return { diagnostics: [error("Weight cannot be negative", option, raw)] };
  }
  return parsed;
}

export function parseModel(raw: string | undefined): Parsed<AccessModel> {
  const value = raw ?? "handle";
  const model = ACCESS_MODELS.find((m) => m === value);
  if (!model) {
    return {
      diagnostics: [error("Unknown access model", "--model", value, `Use one of: ${ACCESS_MODELS.join(", ")}`)],
    };
  }
  return { value: model, diagnostics: [] };
}

/**
 * Builds a shared Person record from command-line options. Text fields
 * default to "" so validation commands can exercise incomplete contacts.
 * A non-positive height is accepted with a warning.
 */
export function parsePerson(opts: PersonOptions): Parsed<Person> {
  const age = parseAge(opts.age);
  const height = parseMeasure(opts.height, "--height", "metres");
  const diagnostics = [...age.diagnostics, ...height.diagnostics];
  if (age.value === undefined || height.value === undefined) {
    return { diagnostics };
  }
  if (height.value <= 0) {
    diagnostics.push(warning("Height is not positive, BMI will be 0", "--height", opts.height));
  }
  return {
    value: {
      age: age.value,
      height: height.value,
      name: opts.name ?? "",
      contact: {
        email: opts.email ?? "",
        phone: opts.phone ?? "",
        address: {
          street: opts.street ?? "",
          city: opts.city ?? "",
          postalCode: opts.postalCode ?? "",
        },
      },
    },
    diagnostics,
  };
}
