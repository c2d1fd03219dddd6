import type { Person } from "../bridge/records.js";
import {
  analyzeHealth, calculateBmi, greetPerson, processPerson, validateContact,
} from "../compute/health.js";
import type { ForeignRuntime } from "../foreign/runtime.js";
import { formatHealthAnalysis, formatPersonInfo } from "./run.js";

const BOB: Person = {
  age: 25,
  height: 1.75,
  name: "Bob Johnson",
  contact: {
    email: "bob@example.com",
    phone: "555-1234",
    address: { street: "123 Main St", city: "New York", postalCode: "10001" },
  },
};

const CHARLIE: Person = {
  age: 16,
  height: 1.6,
  name: "Charlie Smith",
  contact: {
    email: "charlie@example.com",
    phone: "555-5678",
    address: { street: "456 Oak Ave", city: "Boston", postalCode: "02101" },
  },
};

const INCOMPLETE: Person = {
  age: 30,
  height: 1.8,
  name: "Invalid User",
  contact: {
    email: "bademail",
    phone: "123",
    address: { street: "", city: "", postalCode: "123" },
  },
};

function validity(valid: boolean): string {
  return valid ? "VALID" : "INVALID";
}

/**
 * Walks through every entry point against objects the foreign module owns.
 * Lines go to `print`; the greeting goes to the runtime's logger.
 */
export function runDemo(runtime: ForeignRuntime, print: (line: string) => void): void {
  print("--- Greeting ---");
  const length = greetPerson("Alice", runtime.logger);
  print(`Returned name length: ${length}`);
  print("");

  print("--- Foreign objects, consumer processing ---");
  const bob = runtime.createPerson(BOB);
  print(`Created foreign Person: ${BOB.name} (age ${bob.age()}, height ${bob.height()}m, city ${bob.contact().address().city() ?? ""})`);
  formatPersonInfo(processPerson(bob), BOB.name).forEach(print);
  print("");

  print("--- Health analysis ---");
  formatHealthAnalysis(analyzeHealth(bob, 75.0), BOB.name).forEach(print);
  print("");

  print("--- Minor, by value transfer ---");
  const charlie = runtime.createPerson(CHARLIE);
  const charlieCopy = runtime.importPerson(charlie);
  const exported = runtime.exportPerson(charlieCopy);
  formatPersonInfo(runtime.callProcessPerson(exported), CHARLIE.name).forEach(print);
  runtime.destroyPerson(exported);
  formatHealthAnalysis(runtime.callAnalyzeHealth(charlie, 55.0), CHARLIE.name).forEach(print);
  print("");

  print("--- Contact validation ---");
  print(`${BOB.name}'s contact is ${validity(validateContact(bob.contact()))}`);
  print(`${CHARLIE.name}'s contact is ${validity(runtime.callValidateContact(charlie.contact()))}`);
  const incomplete = runtime.createPerson(INCOMPLETE);
  print(`${INCOMPLETE.name}'s contact is ${validity(validateContact(incomplete.contact()))}`);
  runtime.destroyPerson(incomplete);
  print("");

  print("--- Direct BMI ---");
  print(`BMI for 70kg, 1.75m: ${calculateBmi(70.0, 1.75).toFixed(2)}`);
  print("");

  print("--- Foreign methods alongside consumer functions ---");
  print(`${BOB.name} is adult (foreign method): ${runtime.isAdult(bob) ? "Yes" : "No"}`);
  print(`BMI from foreign method: ${runtime.calculateBmi(bob, 75.0).toFixed(2)}`);
  print(`BMI from consumer function: ${calculateBmi(75.0, bob.height()).toFixed(2)}`);
}
