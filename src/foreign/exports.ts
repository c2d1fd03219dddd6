// Typed view of the foreign module's exports. Every export is checked once
// at instantiation; a module missing one fails there rather than on first use.

export interface ForeignExports {
  memory: WebAssembly.Memory;
  heapBase: number;

  createAddress(street: number, city: number, postalCode: number): number;
  createContactInfo(email: number, phone: number, address: number): number;
  createPerson(age: number, height: number, name: number, contact: number): number;

  getPersonAge(person: number): number;
  getPersonHeight(person: number): number;
  getPersonName(person: number): number;
  getPersonContact(person: number): number;
  getContactEmail(contact: number): number;
  getContactPhone(contact: number): number;
  getContactAddress(contact: number): number;
  getAddressStreet(address: number): number;
  getAddressCity(address: number): number;
  getAddressPostalCode(address: number): number;

  setPersonAge(person: number, age: number): void;
  setPersonHeight(person: number, height: number): void;
  setPersonName(person: number, name: number): void;
  setContactEmail(contact: number, email: number): void;
  setContactPhone(contact: number, phone: number): void;
  setAddressStreet(address: number, street: number): void;
  setAddressCity(address: number, city: number): void;
  setAddressPostalCode(address: number, postalCode: number): void;

  destroyAddress(address: number): void;
  destroyContactInfo(contact: number): void;
  destroyPerson(person: number): void;

  personIsAdult(person: number): number;
  personCalculateBmi(person: number, weightKg: number): number;

  callProcessPerson(person: number): number;
  callAnalyzeHealth(person: number, weightKg: number): number;
  callCalculateBmi(weightKg: number, heightM: number): number;
  callValidateContact(contact: number): number;
  callGreetPerson(name: number): number;
}

function exportedFunction(exports: WebAssembly.Exports, name: string): Function {
  const value = exports[name];
  if (typeof value !== "function") {
    throw new Error(`Foreign module does not export function '${name}'`);
  }
  return value;
}

function numberFn(exports: WebAssembly.Exports, name: string): (...args: number[]) => number {
  const fn = exportedFunction(exports, name);
  return (...args: number[]): number => {
    const result: unknown = fn(...args);
    if (typeof result !== "number") {
      throw new Error(`Foreign export '${name}' returned ${typeof result}, expected number`);
    }
    return result;
  };
}

// i32 results arrive signed; addresses and u32 fields are read back unsigned
function u32Fn(exports: WebAssembly.Exports, name: string): (...args: number[]) => number {
  const fn = numberFn(exports, name);
  return (...args: number[]): number => fn(...args) >>> 0;
}

function voidFn(exports: WebAssembly.Exports, name: string): (...args: number[]) => void {
  const fn = exportedFunction(exports, name);
  return (...args: number[]): void => {
    fn(...args);
  };
}

export function readExports(instance: WebAssembly.Instance): ForeignExports {
  const exports = instance.exports;

  const memory = exports.memory;
  if (!(memory instanceof WebAssembly.Memory)) {
    throw new Error("Foreign module does not export its memory");
  }
  const heapBase = exports.__heap_base;
  if (!(heapBase instanceof WebAssembly.Global) || typeof heapBase.value !== "number") {
    throw new Error("Foreign module does not export an i32 __heap_base");
  }

  return {
    memory,
    heapBase: heapBase.value,

    createAddress: u32Fn(exports, "create_address"),
    createContactInfo: u32Fn(exports, "create_contact_info"),
    createPerson: u32Fn(exports, "create_person"),

    getPersonAge: u32Fn(exports, "get_person_age"),
    getPersonHeight: numberFn(exports, "get_person_height"),
    getPersonName: u32Fn(exports, "get_person_name"),
    getPersonContact: u32Fn(exports, "get_person_contact"),
    getContactEmail: u32Fn(exports, "get_contact_email"),
    getContactPhone: u32Fn(exports, "get_contact_phone"),
    getContactAddress: u32Fn(exports, "get_contact_address"),
    getAddressStreet: u32Fn(exports, "get_address_street"),
    getAddressCity: u32Fn(exports, "get_address_city"),
    getAddressPostalCode: u32Fn(exports, "get_address_postal_code"),

    setPersonAge: voidFn(exports, "set_person_age"),
    setPersonHeight: voidFn(exports, "set_person_height"),
    setPersonName: voidFn(exports, "set_person_name"),
    setContactEmail: voidFn(exports, "set_contact_email"),
    setContactPhone: voidFn(exports, "set_contact_phone"),
    setAddressStreet: voidFn(exports, "set_address_street"),
    setAddressCity: voidFn(exports, "set_address_city"),
    setAddressPostalCode: voidFn(exports, "set_address_postal_code"),

    destroyAddress: voidFn(exports, "destroy_address"),
    destroyContactInfo: voidFn(exports, "destroy_contact_info"),
    destroyPerson: voidFn(exports, "destroy_person"),

    personIsAdult: numberFn(exports, "person_is_adult"),
    personCalculateBmi: numberFn(exports, "person_calculate_bmi"),

    callProcessPerson: u32Fn(exports, "call_process_person"),
    callAnalyzeHealth: u32Fn(exports, "call_analyze_health"),
    callCalculateBmi: numberFn(exports, "call_calculate_bmi"),
    callValidateContact: numberFn(exports, "call_validate_contact"),
    callGreetPerson: u32Fn(exports, "call_greet_person"),
  };
}
