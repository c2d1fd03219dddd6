import { describe, it, expect } from "vitest";
import {
  ForeignModuleBuilder, buildForeignModule, emitForeignText,
} from "../../src/foreign/module-builder.js";

function compiled(bytes: Uint8Array): WebAssembly.Module {
  return new WebAssembly.Module(Uint8Array.from(bytes));
}

describe("foreign module builder", () => {
  it("emits a valid module", () => {
    const wasm = new ForeignModuleBuilder().generate();
    expect(WebAssembly.validate(Uint8Array.from(wasm))).toBe(true);
  });

  it("exports memory, heap base, factories, getters, setters and callers", () => {
    const names = WebAssembly.Module.exports(compiled(buildForeignModule())).map((e) => e.name);
    for (const name of [
      "memory", "__heap_base",
      "create_address", "create_contact_info", "create_person",
      "get_person_age", "get_person_height", "get_person_name", "get_person_contact",
      "get_contact_email", "get_contact_phone", "get_contact_address",
      "get_address_street", "get_address_city", "get_address_postal_code",
      "set_person_age", "set_address_city",
      "person_is_adult", "person_calculate_bmi",
      "destroy_address", "destroy_contact_info", "destroy_person",
      "call_process_person", "call_analyze_health", "call_calculate_bmi",
      "call_validate_contact", "call_greet_person",
    ]) {
      expect(names).toContain(name);
    }
  });

  it("imports the allocator and the bridge entry points", () => {
    const imports = WebAssembly.Module.imports(compiled(buildForeignModule()))
      .map((i) => `${i.module}.${i.name}`);
    expect(imports).toEqual(expect.arrayContaining([
      "env.__alloc",
      "env.__free",
      "bridge.process_person",
      "bridge.analyze_health",
      "bridge.calculate_bmi",
      "bridge.validate_contact",
      "bridge.greet_person",
    ]));
    expect(imports).toHaveLength(7);
  });

  it("reuses the binary for identical options", () => {
    expect(buildForeignModule({ initialPages: 2 })).toBe(buildForeignModule({ initialPages: 2 }));
  });

  it("prints the text format", () => {
    const wat = emitForeignText();
    expect(wat).toContain("(module");
    expect(wat).toContain("\"get_address_city\"");
    expect(wat).toContain("\"__alloc\"");
  });

  it("rejects a maximum above the 32768-page limit", () => {
    expect(() => new ForeignModuleBuilder().generate({ maximumPages: 32769 }))
      .toThrow("Maximum memory (32769 pages) exceeds the 32768-page limit");
  });

  it("rejects an initial memory larger than the maximum", () => {
    expect(() => new ForeignModuleBuilder().generate({ initialPages: 3, maximumPages: 2 }))
      .toThrow("Initial memory (3 pages) exceeds maximum (2 pages)");
  });
});
