import {
  analyzeHealth, calculateBmi, greetPerson, processPerson, validateContact,
} from "../compute/health.js";
import type { Logger } from "../logging/logger.js";
import { writeHealthAnalysis, writePersonInfo } from "./codec.js";
import { ContactHandle, PersonHandle, type ForeignContext } from "./handles.js";

export interface BridgeImports {
  process_person(person: number): number;
  analyze_health(person: number, weightKg: number): number;
  calculate_bmi(weightKg: number, heightM: number): number;
  validate_contact(contact: number): number;
  greet_person(name: number): number;
}

/**
 * Host implementations of the `bridge` import namespace. Arguments are
 * addresses in foreign memory, wrapped in handles for the duration of the
 * call only; results are written back into foreign memory as new records,
 * owned by the caller (see `freePersonInfo`, `freeHealthAnalysis`).
 *
 * `context` is resolved per call because the exports it needs only exist
 * once the module that imports these functions has been instantiated.
 */
export function createBridgeImports(context: () => ForeignContext, logger: Logger): BridgeImports {
  return {
    process_person(person: number): number {
      const foreign = context();
      const info = processPerson(new PersonHandle(foreign, person));
      return writePersonInfo(foreign.heap, info);
    },

    analyze_health(person: number, weightKg: number): number {
      const foreign = context();
      const analysis = analyzeHealth(new PersonHandle(foreign, person), weightKg);
      return writeHealthAnalysis(foreign.heap, analysis);
    },

    calculate_bmi(weightKg: number, heightM: number): number {
      return calculateBmi(weightKg, heightM);
    },

    validate_contact(contact: number): number {
      return validateContact(new ContactHandle(context(), contact)) ? 1 : 0;
    },

    greet_person(name: number): number {
      const text = context().heap.readText(name);
      if (text === null) logger.warn(`greet_person: name at ${name} is not valid UTF-8`);
      return greetPerson(text ?? "", logger);
    },
  };
}
