import binaryen from "binaryen";
import {
  fieldOffset, recordLayout, recordSize,
  type FieldKind, type FieldName, type RecordName,
} from "./layout.js";
import { fieldKindToWasm, isF64 } from "./wasm-types.js";
import { getBridgeImports } from "./imports.js";

export interface ForeignModuleOptions {
  initialPages?: number;
  maximumPages?: number;
}

export const DEFAULT_INITIAL_PAGES = 1;
export const DEFAULT_MAXIMUM_PAGES = 256;
/** Pointers are kept below 2^31 so they survive as positive i32 values. */
export const MAX_MEMORY_PAGES = 32768;
const HEAP_BASE = 1024;

/**
 * Emits the foreign module: it owns Person, ContactInfo and Address records
 * in its linear memory and is the only code that reads or writes their
 * fields. The host reaches them through the exported getters.
 */
export class ForeignModuleBuilder {
  private mod!: binaryen.Module;

  generate(options: ForeignModuleOptions = {}): Uint8Array {
    this.mod = new binaryen.Module();
    try {
      this.setupModule(options);

      if (!this.mod.validate()) {
        throw new Error("Generated invalid WASM module");
      }

      this.mod.optimize();
      return this.mod.emitBinary();
    } finally {
      this.mod.dispose();
    }
  }

  generateText(options: ForeignModuleOptions = {}): string {
    this.mod = new binaryen.Module();
    try {
      this.setupModule(options);
      this.mod.validate();
      return this.mod.emitText();
    } finally {
      this.mod.dispose();
    }
  }

  private setupModule(options: ForeignModuleOptions): void {
    const initial = options.initialPages ?? DEFAULT_INITIAL_PAGES;
    const maximum = options.maximumPages ?? DEFAULT_MAXIMUM_PAGES;
    if (initial > maximum) {
      throw new Error(`Initial memory (${initial} pages) exceeds maximum (${maximum} pages)`);
    }
    if (maximum > MAX_MEMORY_PAGES) {
      throw new Error(`Maximum memory (${maximum} pages) exceeds the ${MAX_MEMORY_PAGES}-page limit`);
    }

    // Memory is owned by the module and exported. It must exist before any
    // load/store instruction is created.
    this.mod.setMemory(initial, maximum, "memory", []);

    // Records are allocated and released by the host heap
    this.mod.addFunctionImport("__alloc", "env", "__alloc", binaryen.i32, binaryen.i32);
    this.mod.addFunctionImport("__free", "env", "__free", binaryen.i32, binaryen.none);

    for (const def of getBridgeImports()) {
      this.mod.addFunctionImport(
        def.name,
        def.importModule,
        def.importName,
        binaryen.createType(def.params),
        def.result,
      );
      this.addCaller(def.name, def.params, def.result);
    }

    this.addFactory("create_address", "Address");
    this.addFactory("create_contact_info", "ContactInfo");
    this.addFactory("create_person", "Person");

    this.addGetter("get_person_age", "Person", "age");
    this.addGetter("get_person_height", "Person", "height");
    this.addGetter("get_person_name", "Person", "name");
    this.addGetter("get_person_contact", "Person", "contact");
    this.addGetter("get_contact_email", "ContactInfo", "email");
    this.addGetter("get_contact_phone", "ContactInfo", "phone");
    this.addGetter("get_contact_address", "ContactInfo", "address");
    this.addGetter("get_address_street", "Address", "street");
    this.addGetter("get_address_city", "Address", "city");
    this.addGetter("get_address_postal_code", "Address", "postal_code");

    this.addSetter("set_person_age", "Person", "age");
    this.addSetter("set_person_height", "Person", "height");
    this.addSetter("set_person_name", "Person", "name");
    this.addSetter("set_contact_email", "ContactInfo", "email");
    this.addSetter("set_contact_phone", "ContactInfo", "phone");
    this.addSetter("set_address_street", "Address", "street");
    this.addSetter("set_address_city", "Address", "city");
    this.addSetter("set_address_postal_code", "Address", "postal_code");

    this.addDestructor("destroy_address", "Address");
    this.addDestructor("destroy_contact_info", "ContactInfo", "destroy_address");
    this.addDestructor("destroy_person", "Person", "destroy_contact_info");

    this.addPersonMethods();

    // Export the heap base so the host knows where dynamic allocation starts
    this.mod.addGlobal("__heap_base", binaryen.i32, false, this.mod.i32.const(HEAP_BASE));
    this.mod.addGlobalExport("__heap_base", "__heap_base");
  }

  // ============================================================
  // Record construction and field access
  // ============================================================

  // create_<record>(field0, field1, ...) -> ptr, one parameter per field in layout order
  private addFactory(exportName: string, record: RecordName): void {
    const layout = recordLayout(record);
    const paramTypes = layout.map((f) => fieldKindToWasm(f.kind));
    const ptrLocal = layout.length;
    const getPtr = () => this.mod.local.get(ptrLocal, binaryen.i32);

    const stmts: binaryen.ExpressionRef[] = [
      this.mod.local.set(ptrLocal,
        this.mod.call("__alloc", [this.mod.i32.const(recordSize(record))], binaryen.i32),
      ),
    ];
    layout.forEach((field, i) => {
      stmts.push(this.storeField(getPtr(), field.offset, this.mod.local.get(i, paramTypes[i]), field.kind));
    });
    stmts.push(getPtr());

    this.mod.addFunction(
      exportName,
      binaryen.createType(paramTypes),
      binaryen.i32,
      [binaryen.i32],
      this.mod.block(null, stmts, binaryen.i32),
    );
    this.mod.addFunctionExport(exportName, exportName);
  }

  private addGetter<R extends RecordName>(exportName: string, record: R, field: FieldName<R>): void {
    const kind = this.kindOf(record, field);
    const resultType = fieldKindToWasm(kind);
    const body = this.loadField(this.mod.local.get(0, binaryen.i32), fieldOffset(record, field), kind);
    this.mod.addFunction(exportName, binaryen.i32, resultType, [], body);
    this.mod.addFunctionExport(exportName, exportName);
  }

  // A record owns its text: replacing a text field frees the previous one
  private addSetter<R extends RecordName>(exportName: string, record: R, field: FieldName<R>): void {
    const kind = this.kindOf(record, field);
    const valueType = fieldKindToWasm(kind);
    const offset = fieldOffset(record, field);
    const target = () => this.mod.local.get(0, binaryen.i32);
    const store = this.storeField(target(), offset, this.mod.local.get(1, valueType), kind);
    const body = kind === "text"
      ? this.mod.block(null, [
        this.mod.call("__free", [this.loadField(target(), offset, kind)], binaryen.none),
        store,
      ], binaryen.none)
      : store;
    this.mod.addFunction(exportName, binaryen.createType([binaryen.i32, valueType]), binaryen.none, [], body);
    this.mod.addFunctionExport(exportName, exportName);
  }

  // destroy_<record>(ptr): frees every text field, destroys the nested record
  // through `nested`, then frees the record itself
  private addDestructor(exportName: string, record: RecordName, nested?: string): void {
    const ptr = () => this.mod.local.get(0, binaryen.i32);
    const stmts: binaryen.ExpressionRef[] = [];
    for (const field of recordLayout(record)) {
      const release = field.kind === "text" ? "__free" : field.kind === "record" ? nested : undefined;
      if (release) {
        stmts.push(this.mod.call(release, [this.loadField(ptr(), field.offset, field.kind)], binaryen.none));
      }
    }
    stmts.push(this.mod.call("__free", [ptr()], binaryen.none));

    this.mod.addFunction(exportName, binaryen.i32, binaryen.none, [], this.mod.block(null, stmts, binaryen.none));
    this.mod.addFunctionExport(exportName, exportName);
  }

  // Forwarding export so foreign-initiated calls go through the imported entry point
  private addCaller(importName: string, params: binaryen.Type[], result: binaryen.Type): void {
    const exportName = `call_${importName}`;
    const args = params.map((type, i) => this.mod.local.get(i, type));
    this.mod.addFunction(
      exportName,
      binaryen.createType(params),
      result,
      [],
      this.mod.call(importName, args, result),
    );
    this.mod.addFunctionExport(exportName, exportName);
  }

  // ============================================================
  // Foreign business methods on Person
  // ============================================================

  private addPersonMethods(): void {
    const person = () => this.mod.local.get(0, binaryen.i32);

    // person_is_adult(p) -> i32: age >= 18 (age is unsigned)
    this.mod.addFunction(
      "person_is_adult",
      binaryen.i32,
      binaryen.i32,
      [],
      this.mod.i32.ge_u(
        this.loadField(person(), fieldOffset("Person", "age"), "u32"),
        this.mod.i32.const(18),
      ),
    );
    this.mod.addFunctionExport("person_is_adult", "person_is_adult");

    // person_calculate_bmi(p, weight) -> f64: 0 when height <= 0
    const heightLocal = 2;
    const height = () => this.mod.local.get(heightLocal, binaryen.f64);
    this.mod.addFunction(
      "person_calculate_bmi",
      binaryen.createType([binaryen.i32, binaryen.f64]),
      binaryen.f64,
      [binaryen.f64],
      this.mod.block(null, [
        this.mod.local.set(heightLocal, this.loadField(person(), fieldOffset("Person", "height"), "f64")),
        this.mod.if(
          this.mod.f64.le(height(), this.mod.f64.const(0)),
          this.mod.f64.const(0),
          this.mod.f64.div(
            this.mod.local.get(1, binaryen.f64),
            this.mod.f64.mul(height(), height()),
          ),
        ),
      ], binaryen.f64),
    );
    this.mod.addFunctionExport("person_calculate_bmi", "person_calculate_bmi");
  }

  // ============================================================
  // Memory helpers
  // ============================================================

  private kindOf<R extends RecordName>(record: R, field: FieldName<R>): FieldKind {
    const entry = recordLayout(record).find((e) => e.name === field);
    if (!entry) {
      throw new Error(`Record '${record}' has no field '${field}'`);
    }
    return entry.kind;
  }

  private storeField(
    basePtr: binaryen.ExpressionRef,
    offset: number,
    value: binaryen.ExpressionRef,
    kind: FieldKind,
  ): binaryen.ExpressionRef {
    return isF64(kind)
      ? this.mod.f64.store(offset, 8, basePtr, value)
      : this.mod.i32.store(offset, 4, basePtr, value);
  }

  private loadField(basePtr: binaryen.ExpressionRef, offset: number, kind: FieldKind): binaryen.ExpressionRef {
    return isF64(kind)
      ? this.mod.f64.load(offset, 8, basePtr)
      : this.mod.i32.load(offset, 4, basePtr);
  }
}

let cachedKey: string | null = null;
let cachedBinary: Uint8Array | null = null;

/** Builds the foreign module binary. Identical options reuse the last binary. */
export function buildForeignModule(options: ForeignModuleOptions = {}): Uint8Array {
  const key = `${options.initialPages ?? DEFAULT_INITIAL_PAGES}:${options.maximumPages ?? DEFAULT_MAXIMUM_PAGES}`;
  if (cachedBinary && cachedKey === key) return cachedBinary;
  cachedBinary = new ForeignModuleBuilder().generate(options);
  cachedKey = key;
  return cachedBinary;
}

export function emitForeignText(options: ForeignModuleOptions = {}): string {
  return new ForeignModuleBuilder().generateText(options);
}
