import { personAccess, contactAccess, type Person } from "../bridge/records.js";
import type { HealthAnalysis, PersonInfo } from "../bridge/results.js";
import { analyzeHealth, processPerson, validateContact } from "../compute/health.js";
import type { ForeignRuntime } from "../foreign/runtime.js";
import type { AccessModel } from "./options.js";

// The person is always constructed by the foreign module first; the model
// decides how the Computation Layer then reaches it:
//   handle   opaque handle, one foreign getter call per field read
//   value    deep copy out of foreign memory, then plain field reads
//   foreign  the foreign module calls the entry point itself

// Each run destroys the person it created.

export function runProcess(runtime: ForeignRuntime, person: Person, model: AccessModel): PersonInfo {
  const handle = runtime.createPerson(person);
  try {
    switch (model) {
      case "handle": return processPerson(handle);
      case "value": return processPerson(personAccess(runtime.importPerson(handle)));
      case "foreign": return runtime.callProcessPerson(handle);
    }
  } finally {
    runtime.destroyPerson(handle);
  }
}

export function runAnalyze(
  runtime: ForeignRuntime,
  person: Person,
  weightKg: number,
  model: AccessModel,
): HealthAnalysis {
  const handle = runtime.createPerson(person);
  try {
    switch (model) {
      case "handle": return analyzeHealth(handle, weightKg);
      case "value": return analyzeHealth(personAccess(runtime.importPerson(handle)), weightKg);
      case "foreign": return runtime.callAnalyzeHealth(handle, weightKg);
    }
  } finally {
    runtime.destroyPerson(handle);
  }
}

export function runValidate(runtime: ForeignRuntime, person: Person, model: AccessModel): boolean {
  const handle = runtime.createPerson(person);
  try {
    switch (model) {
      case "handle": return validateContact(handle.contact());
      case "value": return validateContact(contactAccess(runtime.importPerson(handle).contact));
      case "foreign": return runtime.callValidateContact(handle.contact());
    }
  } finally {
    runtime.destroyPerson(handle);
  }
}

const BMI_CATEGORY_LABELS: Record<PersonInfo["bmiCategory"], string> = {
  underweight: "Underweight",
  normal: "Normal",
  overweight: "Overweight",
};

export function formatPersonInfo(info: PersonInfo, name: string): string[] {
  return [
    "=== Person Information ===",
    `Name: ${name}`,
    `Name length: ${info.nameLength}`,
    `City: ${info.city}`,
    `Is adult: ${info.isAdult ? "Yes" : "No"}`,
    `BMI category: ${BMI_CATEGORY_LABELS[info.bmiCategory]}`,
  ];
}

export function formatHealthAnalysis(analysis: HealthAnalysis, name: string): string[] {
  return [
    `=== Health Analysis for ${name} ===`,
    `BMI: ${analysis.bmi.toFixed(2)}`,
    `Risk Score: ${analysis.riskScore.toFixed(2)}`,
    `City Risk Factor: ${analysis.cityRiskFactor.toFixed(1)}`,
    `Recommendation: ${analysis.recommendation}`,
  ];
}
