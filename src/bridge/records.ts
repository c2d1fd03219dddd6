import type { AddressAccess, ContactAccess, PersonAccess } from "./access.js";

// Shared records: plain data with the same field order as the foreign layout.
// Every transfer across the boundary copies them in full.

export interface Address {
  readonly street: string;
  readonly city: string;
  readonly postalCode: string;
}

export interface ContactInfo {
  readonly email: string;
  readonly phone: string;
  readonly address: Address;
}

export interface Person {
  readonly age: number;
  readonly height: number;
  readonly name: string;
  readonly contact: ContactInfo;
}

export function cloneAddress(address: Address): Address {
  return { street: address.street, city: address.city, postalCode: address.postalCode };
}

export function cloneContactInfo(contact: ContactInfo): ContactInfo {
  return { email: contact.email, phone: contact.phone, address: cloneAddress(contact.address) };
}

export function clonePerson(person: Person): Person {
  return {
    age: person.age,
    height: person.height,
    name: person.name,
    contact: cloneContactInfo(person.contact),
  };
}

export function addressAccess(address: Address): AddressAccess {
  return {
    street: () => address.street,
    city: () => address.city,
    postalCode: () => address.postalCode,
  };
}

export function contactAccess(contact: ContactInfo): ContactAccess {
  return {
    email: () => contact.email,
    phone: () => contact.phone,
    address: () => addressAccess(contact.address),
  };
}

export function personAccess(person: Person): PersonAccess {
  return {
    age: () => person.age,
    height: () => person.height,
    name: () => person.name,
    contact: () => contactAccess(person.contact),
  };
}
