export type { AddressAccess, ContactAccess, PersonAccess, Text } from "./bridge/access.js";
export {
  addressAccess, contactAccess, personAccess,
  cloneAddress, cloneContactInfo, clonePerson,
  type Address, type ContactInfo, type Person,
} from "./bridge/records.js";
export {
  BMI_CATEGORY_CODES, bmiCategoryFromCode, createHealthAnalysis, createPersonInfo,
  type BmiCategory, type HealthAnalysis, type PersonInfo,
} from "./bridge/results.js";
export { AddressHandle, ContactHandle, PersonHandle, type ForeignContext } from "./bridge/handles.js";
export {
  freeHealthAnalysis, freePersonInfo, readAddress, readContactInfo, readHealthAnalysis, readPerson, readPersonInfo,
  writeAddress, writeContactInfo, writeHealthAnalysis, writePerson, writePersonInfo,
} from "./bridge/codec.js";
export { createBridgeImports, type BridgeImports } from "./bridge/entry-points.js";
export {
  ASSUMED_WEIGHT_KG, RECOMMENDATIONS, UNKNOWN_CITY,
  analyzeHealth, bmiCategory, calculateBmi, cityRiskFactor, greetPerson, processPerson,
  textLength, validateContact,
} from "./compute/health.js";
export { ForeignRuntime, instantiateForeign } from "./foreign/runtime.js";
export { ForeignModuleBuilder, buildForeignModule, emitForeignText, type ForeignModuleOptions } from "./foreign/module-builder.js";
export { createForeignHeap, type ForeignHeap } from "./foreign/heap.js";
export { RECORD_FIELDS, fieldOffset, recordLayout, recordSize, type RecordName } from "./foreign/layout.js";
export { loadConfigFromEnv, resolveConfig, type BridgeConfig, type MemoryConfig } from "./config/config.js";
export { createLogger, createMemoryLogger, silentLogger, type Logger, type LogLevel } from "./logging/logger.js";
