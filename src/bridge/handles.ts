import type { ForeignExports } from "../foreign/exports.js";
import type { ForeignHeap } from "../foreign/heap.js";
import type { AddressAccess, ContactAccess, PersonAccess, Text } from "./access.js";

export interface ForeignContext {
  readonly exports: ForeignExports;
  readonly heap: ForeignHeap;
}

// Opaque handles: a non-owning address of a record in foreign memory. Every
// accessor crosses into the foreign module's getter exports; text is decoded
// and copied at the boundary, so no view into foreign memory escapes.
//
// A handle does not keep its record alive and cannot tell whether it still
// addresses one. Using a handle after the foreign side discarded the record,
// or one built from an arbitrary address, is undefined behaviour: the getters
// read whatever bytes are there.

export class AddressHandle implements AddressAccess {
  constructor(private readonly foreign: ForeignContext, readonly ptr: number) {}

  street(): Text {
    return this.foreign.heap.readText(this.foreign.exports.getAddressStreet(this.ptr));
  }

  city(): Text {
    return this.foreign.heap.readText(this.foreign.exports.getAddressCity(this.ptr));
  }

  postalCode(): Text {
    return this.foreign.heap.readText(this.foreign.exports.getAddressPostalCode(this.ptr));
  }
}

export class ContactHandle implements ContactAccess {
  constructor(private readonly foreign: ForeignContext, readonly ptr: number) {}

  email(): Text {
    return this.foreign.heap.readText(this.foreign.exports.getContactEmail(this.ptr));
  }

  phone(): Text {
    return this.foreign.heap.readText(this.foreign.exports.getContactPhone(this.ptr));
  }

  address(): AddressHandle {
    return new AddressHandle(this.foreign, this.foreign.exports.getContactAddress(this.ptr));
  }
}

export class PersonHandle implements PersonAccess {
  constructor(private readonly foreign: ForeignContext, readonly ptr: number) {}

  age(): number {
    return this.foreign.exports.getPersonAge(this.ptr);
  }

  height(): number {
    return this.foreign.exports.getPersonHeight(this.ptr);
  }

  name(): Text {
    return this.foreign.heap.readText(this.foreign.exports.getPersonName(this.ptr));
  }

  contact(): ContactHandle {
    return new ContactHandle(this.foreign, this.foreign.exports.getPersonContact(this.ptr));
  }
}
