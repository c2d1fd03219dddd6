import type { Person } from "../src/bridge/records.js";
import { instantiateForeign, type ForeignRuntime } from "../src/foreign/runtime.js";
import { createMemoryLogger, type MemoryLogger } from "../src/logging/logger.js";

export const BOB: Person = {
  age: 25,
  height: 1.75,
  name: "Bob Johnson",
  contact: {
    email: "bob@example.com",
    phone: "555-1234",
    address: { street: "123 Main St", city: "New York", postalCode: "10001" },
  },
};

export const CHARLIE: Person = {
  age: 16,
  height: 1.6,
  name: "Charlie Smith",
  contact: {
    email: "charlie@example.com",
    phone: "555-5678",
    address: { street: "456 Oak Ave", city: "Boston", postalCode: "02101" },
  },
};

export function person(overrides: Partial<Omit<Person, "contact">> & { city?: string } = {}): Person {
  return {
    age: overrides.age ?? BOB.age,
    height: overrides.height ?? BOB.height,
    name: overrides.name ?? BOB.name,
    contact: {
      ...BOB.contact,
      address: { ...BOB.contact.address, city: overrides.city ?? BOB.contact.address.city },
    },
  };
}

export async function makeRuntime(): Promise<{ runtime: ForeignRuntime; logger: MemoryLogger }> {
  const logger = createMemoryLogger();
  const runtime = await instantiateForeign({ logger });
  // drop the instantiation debug line
  logger.lines.splice(0);
  return { runtime, logger };
}

// Bytes that are not valid UTF-8
export const INVALID_UTF8 = new Uint8Array([0xc3, 0x28]);
