import {
  freeHealthAnalysis, freePersonInfo, readHealthAnalysis, readPerson, readPersonInfo, writePerson,
} from "../bridge/codec.js";
import { createBridgeImports } from "../bridge/entry-points.js";
import { AddressHandle, ContactHandle, PersonHandle, type ForeignContext } from "../bridge/handles.js";
import type { Address, ContactInfo, Person } from "../bridge/records.js";
import type { HealthAnalysis, PersonInfo } from "../bridge/results.js";
import { resolveConfig, type BridgeConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import { readExports, type ForeignExports } from "./exports.js";
import { createForeignHeap, type ForeignHeap } from "./heap.js";
import { buildForeignModule } from "./module-builder.js";

/**
 * One instantiated foreign module together with the host heap bound to its
 * memory. Construction and mutation methods run foreign code: they are the
 * foreign side's own API and are not reachable through the access
 * capabilities the Computation Layer receives.
 */
export class ForeignRuntime implements ForeignContext {
  constructor(
    readonly exports: ForeignExports,
    readonly heap: ForeignHeap,
    readonly logger: Logger,
  ) {}

  // --- Foreign construction (objects owned by the module) ---

  createAddress(address: Address): AddressHandle {
    const street = this.heap.writeString(address.street);
    const city = this.heap.writeString(address.city);
    const postalCode = this.heap.writeString(address.postalCode);
    return new AddressHandle(this, this.exports.createAddress(street, city, postalCode));
  }

  createContactInfo(contact: ContactInfo): ContactHandle {
    const email = this.heap.writeString(contact.email);
    const phone = this.heap.writeString(contact.phone);
    const address = this.createAddress(contact.address);
    return new ContactHandle(this, this.exports.createContactInfo(email, phone, address.ptr));
  }

  createPerson(person: Person): PersonHandle {
    const name = this.heap.writeString(person.name);
    const contact = this.createContactInfo(person.contact);
    return new PersonHandle(this, this.exports.createPerson(person.age, person.height, name, contact.ptr));
  }

  // --- Value transfer ---

  /** Deep-copies a foreign Person out of module memory. */
  importPerson(handle: PersonHandle): Person {
    return readPerson(this.heap, handle.ptr);
  }

  /** Deep-copies a shared record into module memory, written by the host codec. */
  exportPerson(person: Person): PersonHandle {
    return new PersonHandle(this, writePerson(this.heap, person));
  }

  // --- Foreign destruction ---
  // Frees the record, its text and the records it owns. Handles to any of
  // them dangle afterwards. Destroying a contact or address that a person
  // still points to leaves that person dangling too.

  destroyPerson(person: PersonHandle): void {
    this.exports.destroyPerson(person.ptr);
  }

  destroyContactInfo(contact: ContactHandle): void {
    this.exports.destroyContactInfo(contact.ptr);
  }

  destroyAddress(address: AddressHandle): void {
    this.exports.destroyAddress(address.ptr);
  }

  // --- Foreign-side mutation ---

  setPersonAge(person: PersonHandle, age: number): void {
    this.exports.setPersonAge(person.ptr, age);
  }

  setPersonHeight(person: PersonHandle, height: number): void {
    this.exports.setPersonHeight(person.ptr, height);
  }

  setPersonName(person: PersonHandle, name: string): void {
    this.exports.setPersonName(person.ptr, this.heap.writeString(name));
  }

  setContactEmail(contact: ContactHandle, email: string): void {
    this.exports.setContactEmail(contact.ptr, this.heap.writeString(email));
  }

  setContactPhone(contact: ContactHandle, phone: string): void {
    this.exports.setContactPhone(contact.ptr, this.heap.writeString(phone));
  }

  setAddressStreet(address: AddressHandle, street: string): void {
    this.exports.setAddressStreet(address.ptr, this.heap.writeString(street));
  }

  setAddressCity(address: AddressHandle, city: string): void {
    this.exports.setAddressCity(address.ptr, this.heap.writeString(city));
  }

  setAddressPostalCode(address: AddressHandle, postalCode: string): void {
    this.exports.setAddressPostalCode(address.ptr, this.heap.writeString(postalCode));
  }

  // --- Foreign business methods ---

  isAdult(person: PersonHandle): boolean {
    return this.exports.personIsAdult(person.ptr) !== 0;
  }

  calculateBmi(person: PersonHandle, weightKg: number): number {
    return this.exports.personCalculateBmi(person.ptr, weightKg);
  }

  // --- Entry points invoked from the foreign side ---
  // Result records are decoded, then released: nothing from the call stays
  // in foreign memory.

  callProcessPerson(person: PersonHandle): PersonInfo {
    const ptr = this.exports.callProcessPerson(person.ptr);
    try {
      return readPersonInfo(this.heap, ptr);
    } finally {
      freePersonInfo(this.heap, ptr);
    }
  }

  callAnalyzeHealth(person: PersonHandle, weightKg: number): HealthAnalysis {
    const ptr = this.exports.callAnalyzeHealth(person.ptr, weightKg);
    try {
      return readHealthAnalysis(this.heap, ptr);
    } finally {
      freeHealthAnalysis(this.heap, ptr);
    }
  }

  callCalculateBmi(weightKg: number, heightM: number): number {
    return this.exports.callCalculateBmi(weightKg, heightM);
  }

  callValidateContact(contact: ContactHandle): boolean {
    return this.exports.callValidateContact(contact.ptr) !== 0;
  }

  callGreetPerson(name: string): number {
    const namePtr = this.heap.writeString(name);
    try {
      return this.exports.callGreetPerson(namePtr);
    } finally {
      this.heap.free(namePtr);
    }
  }
}

export async function instantiateForeign(config: BridgeConfig = {}): Promise<ForeignRuntime> {
  const { logger, memory } = resolveConfig(config);
  const heap = createForeignHeap();

  let runtime: ForeignRuntime | null = null;
  const context = (): ForeignContext => {
    if (!runtime) {
      throw new Error("Foreign module called into the bridge before instantiation finished");
    }
    return runtime;
  };

  const wasm = buildForeignModule({
    initialPages: memory.initialPages,
    maximumPages: memory.maximumPages,
  });
  const compiled = await WebAssembly.compile(Uint8Array.from(wasm));
  const instance = await WebAssembly.instantiate(compiled, {
    env: heap.imports.env,
    bridge: { ...createBridgeImports(context, logger) },
  });

  const exports = readExports(instance);
  // Bind to the module's exported memory
  heap.bindMemory(exports.memory);
  heap.setHeapBase(exports.heapBase);

  logger.debug(`foreign module instantiated (${memory.initialPages}-${memory.maximumPages} pages, heap base ${exports.heapBase})`);

  runtime = new ForeignRuntime(exports, heap, logger);
  return runtime;
}
