// Read-only capabilities over Person, ContactInfo and Address.
//
// The Computation Layer is written against these interfaces only. They are
// implemented by opaque handles (each call crosses into the foreign module)
// and by adapters over owned shared records (plain field reads).

/**
 * Text read across the boundary. `null` means the foreign bytes were not
 * valid UTF-8; callers substitute their own sentinel.
 */
export type Text = string | null;

export interface AddressAccess {
  street(): Text;
  city(): Text;
  postalCode(): Text;
}

export interface ContactAccess {
  email(): Text;
  phone(): Text;
  address(): AddressAccess;
}

export interface PersonAccess {
  /** Unsigned 32-bit integer. */
  age(): number;
  /** Metres. */
  height(): number;
  name(): Text;
  contact(): ContactAccess;
}
