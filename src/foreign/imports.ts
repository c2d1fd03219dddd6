import binaryen from "binaryen";

export interface BridgeImportDef {
  name: string;
  importModule: string;
  importName: string;
  params: binaryen.Type[];
  result: binaryen.Type;
}

// Computation entry points the foreign module imports from the host.
// Pointer arguments address records in the module's own memory; pointer
// results address result records the host writes into that memory.
export function getBridgeImports(): BridgeImportDef[] {
  const i32 = binaryen.i32;
  const f64 = binaryen.f64;

  return [
    { name: "process_person", importModule: "bridge", importName: "process_person", params: [i32], result: i32 },
    { name: "analyze_health", importModule: "bridge", importName: "analyze_health", params: [i32, f64], result: i32 },
    { name: "calculate_bmi", importModule: "bridge", importName: "calculate_bmi", params: [f64, f64], result: f64 },
    { name: "validate_contact", importModule: "bridge", importName: "validate_contact", params: [i32], result: i32 },
    { name: "greet_person", importModule: "bridge", importName: "greet_person", params: [i32], result: i32 },
  ];
}
