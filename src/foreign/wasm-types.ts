import binaryen from "binaryen";
import type { FieldKind } from "./layout.js";

export function fieldKindToWasm(kind: FieldKind): binaryen.Type {
  switch (kind) {
    case "f64": return binaryen.f64;
    // u32, bool and enum codes are i32 values; text and nested records are
    // i32 pointers into linear memory
    case "u32":
    case "bool":
    case "enum":
    case "text":
    case "record":
      return binaryen.i32;
  }
}

export function isF64(kind: FieldKind): boolean {
  return kind === "f64";
}
