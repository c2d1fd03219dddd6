import type { ForeignHeap } from "../foreign/heap.js";
import { fieldOffset, recordSize } from "../foreign/layout.js";
import type { Address, ContactInfo, Person } from "./records.js";
import {
  BMI_CATEGORY_CODES, bmiCategoryFromCode, createHealthAnalysis, createPersonInfo,
  type HealthAnalysis, type PersonInfo,
} from "./results.js";

// Value transfer across the boundary. Writing copies a record (nested records
// and text included) into foreign memory; reading copies it back out. No
// pointer into foreign memory survives a read.
//
// Text is written before the record that points to it: both allocations may
// grow memory, which detaches any DataView taken earlier.

// Text that is not valid UTF-8 arrives as "".
function readTextField(heap: ForeignHeap, ptr: number): string {
  return heap.readText(ptr) ?? "";
}

export function writeAddress(heap: ForeignHeap, address: Address): number {
  const street = heap.writeString(address.street);
  const city = heap.writeString(address.city);
  const postalCode = heap.writeString(address.postalCode);

  const ptr = heap.alloc(recordSize("Address"));
  const view = heap.view();
  view.setUint32(ptr + fieldOffset("Address", "street"), street, true);
  view.setUint32(ptr + fieldOffset("Address", "city"), city, true);
  view.setUint32(ptr + fieldOffset("Address", "postal_code"), postalCode, true);
  return ptr;
}

export function readAddress(heap: ForeignHeap, ptr: number): Address {
  const view = heap.view();
  const street = view.getUint32(ptr + fieldOffset("Address", "street"), true);
  const city = view.getUint32(ptr + fieldOffset("Address", "city"), true);
  const postalCode = view.getUint32(ptr + fieldOffset("Address", "postal_code"), true);
  return {
    street: readTextField(heap, street),
    city: readTextField(heap, city),
    postalCode: readTextField(heap, postalCode),
  };
}

export function writeContactInfo(heap: ForeignHeap, contact: ContactInfo): number {
  const email = heap.writeString(contact.email);
  const phone = heap.writeString(contact.phone);
  const address = writeAddress(heap, contact.address);

  const ptr = heap.alloc(recordSize("ContactInfo"));
  const view = heap.view();
  view.setUint32(ptr + fieldOffset("ContactInfo", "email"), email, true);
  view.setUint32(ptr + fieldOffset("ContactInfo", "phone"), phone, true);
  view.setUint32(ptr + fieldOffset("ContactInfo", "address"), address, true);
  return ptr;
}

export function readContactInfo(heap: ForeignHeap, ptr: number): ContactInfo {
  const view = heap.view();
  const email = view.getUint32(ptr + fieldOffset("ContactInfo", "email"), true);
  const phone = view.getUint32(ptr + fieldOffset("ContactInfo", "phone"), true);
  const address = view.getUint32(ptr + fieldOffset("ContactInfo", "address"), true);
  return {
    email: readTextField(heap, email),
    phone: readTextField(heap, phone),
    address: readAddress(heap, address),
  };
}

export function writePerson(heap: ForeignHeap, person: Person): number {
  const name = heap.writeString(person.name);
  const contact = writeContactInfo(heap, person.contact);

  const ptr = heap.alloc(recordSize("Person"));
  const view = heap.view();
  view.setUint32(ptr + fieldOffset("Person", "age"), person.age, true);
  view.setFloat64(ptr + fieldOffset("Person", "height"), person.height, true);
  view.setUint32(ptr + fieldOffset("Person", "name"), name, true);
  view.setUint32(ptr + fieldOffset("Person", "contact"), contact, true);
  return ptr;
}

export function readPerson(heap: ForeignHeap, ptr: number): Person {
  const view = heap.view();
  const age = view.getUint32(ptr + fieldOffset("Person", "age"), true);
  const height = view.getFloat64(ptr + fieldOffset("Person", "height"), true);
  const name = view.getUint32(ptr + fieldOffset("Person", "name"), true);
  const contact = view.getUint32(ptr + fieldOffset("Person", "contact"), true);
  return {
    age,
    height,
    name: readTextField(heap, name),
    contact: readContactInfo(heap, contact),
  };
}

// ---------------------------------------------------------------------------
// Result records
// ---------------------------------------------------------------------------

export function writePersonInfo(heap: ForeignHeap, info: PersonInfo): number {
  const city = heap.writeString(info.city);

  const ptr = heap.alloc(recordSize("PersonInfo"));
  const view = heap.view();
  view.setUint32(ptr + fieldOffset("PersonInfo", "is_adult"), info.isAdult ? 1 : 0, true);
  view.setUint32(ptr + fieldOffset("PersonInfo", "bmi_category"), BMI_CATEGORY_CODES[info.bmiCategory], true);
  view.setUint32(ptr + fieldOffset("PersonInfo", "name_length"), info.nameLength, true);
  view.setUint32(ptr + fieldOffset("PersonInfo", "city"), city, true);
  return ptr;
}

export function readPersonInfo(heap: ForeignHeap, ptr: number): PersonInfo {
  const view = heap.view();
  const code = view.getUint32(ptr + fieldOffset("PersonInfo", "bmi_category"), true);
  const bmiCategory = bmiCategoryFromCode(code);
  if (bmiCategory === null) {
    throw new Error(`PersonInfo at ${ptr} has unknown bmi_category code ${code}`);
  }
  return createPersonInfo({
    isAdult: view.getUint32(ptr + fieldOffset("PersonInfo", "is_adult"), true) !== 0,
    bmiCategory,
    nameLength: view.getUint32(ptr + fieldOffset("PersonInfo", "name_length"), true),
    city: readTextField(heap, view.getUint32(ptr + fieldOffset("PersonInfo", "city"), true)),
  });
}

/** Releases a PersonInfo and its city text once it has been read. */
export function freePersonInfo(heap: ForeignHeap, ptr: number): void {
  heap.free(heap.view().getUint32(ptr + fieldOffset("PersonInfo", "city"), true));
  heap.free(ptr);
}

export function writeHealthAnalysis(heap: ForeignHeap, analysis: HealthAnalysis): number {
  const recommendation = heap.writeString(analysis.recommendation);

  const ptr = heap.alloc(recordSize("HealthAnalysis"));
  const view = heap.view();
  view.setFloat64(ptr + fieldOffset("HealthAnalysis", "bmi"), analysis.bmi, true);
  view.setFloat64(ptr + fieldOffset("HealthAnalysis", "risk_score"), analysis.riskScore, true);
  view.setUint32(ptr + fieldOffset("HealthAnalysis", "recommendation"), recommendation, true);
  view.setFloat64(ptr + fieldOffset("HealthAnalysis", "city_risk_factor"), analysis.cityRiskFactor, true);
  return ptr;
}

export function readHealthAnalysis(heap: ForeignHeap, ptr: number): HealthAnalysis {
  const view = heap.view();
  return createHealthAnalysis({
    bmi: view.getFloat64(ptr + fieldOffset("HealthAnalysis", "bmi"), true),
    riskScore: view.getFloat64(ptr + fieldOffset("HealthAnalysis", "risk_score"), true),
    recommendation: readTextField(
      heap,
      view.getUint32(ptr + fieldOffset("HealthAnalysis", "recommendation"), true),
    ),
    cityRiskFactor: view.getFloat64(ptr + fieldOffset("HealthAnalysis", "city_risk_factor"), true),
  });
}

export function freeHealthAnalysis(heap: ForeignHeap, ptr: number): void {
  heap.free(heap.view().getUint32(ptr + fieldOffset("HealthAnalysis", "recommendation"), true));
  heap.free(ptr);
}
