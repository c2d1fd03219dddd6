// Linear-memory layout of every record that crosses the boundary.
//
// The foreign module's load/store offsets and the host codec both come from
// these tables, so the two sides agree on field order, widths and padding.
//
// Text layout: [byteLength: u32][utf8 data]. A text field holds a pointer to
// the length prefix. A record field holds a pointer to the nested record.

export type FieldKind = "u32" | "bool" | "enum" | "f64" | "text" | "record";

export interface FieldSpec {
  readonly name: string;
  readonly kind: FieldKind;
}

export const RECORD_FIELDS = {
  Address: [
    { name: "street", kind: "text" },
    { name: "city", kind: "text" },
    { name: "postal_code", kind: "text" },
  ],
  ContactInfo: [
    { name: "email", kind: "text" },
    { name: "phone", kind: "text" },
    { name: "address", kind: "record" },
  ],
  Person: [
    { name: "age", kind: "u32" },
    { name: "height", kind: "f64" },
    { name: "name", kind: "text" },
    { name: "contact", kind: "record" },
  ],
  PersonInfo: [
    { name: "is_adult", kind: "bool" },
    { name: "bmi_category", kind: "enum" },
    { name: "name_length", kind: "u32" },
    { name: "city", kind: "text" },
  ],
  HealthAnalysis: [
    { name: "bmi", kind: "f64" },
    { name: "risk_score", kind: "f64" },
    { name: "recommendation", kind: "text" },
    { name: "city_risk_factor", kind: "f64" },
  ],
} as const satisfies Record<string, readonly FieldSpec[]>;

export type RecordName = keyof typeof RECORD_FIELDS;
export type FieldName<R extends RecordName> = (typeof RECORD_FIELDS)[R][number]["name"];

export interface LayoutEntry {
  name: string;
  kind: FieldKind;
  offset: number;
}

// Size in bytes of a field when stored in linear memory.
function fieldSize(kind: FieldKind): number {
  return kind === "f64" ? 8 : 4;
}

function fieldAlign(kind: FieldKind): number {
  return kind === "f64" ? 8 : 4;
}

export function recordLayout(record: RecordName): LayoutEntry[] {
  const layout: LayoutEntry[] = [];
  let offset = 0;
  for (const field of RECORD_FIELDS[record]) {
    const align = fieldAlign(field.kind);
    offset = (offset + align - 1) & ~(align - 1); // align up
    layout.push({ name: field.name, kind: field.kind, offset });
    offset += fieldSize(field.kind);
  }
  return layout;
}

/** Total size of a record, padded to a 4-byte boundary. */
export function recordSize(record: RecordName): number {
  let offset = 0;
  for (const field of RECORD_FIELDS[record]) {
    const align = fieldAlign(field.kind);
    offset = (offset + align - 1) & ~(align - 1);
    offset += fieldSize(field.kind);
  }
  return (offset + 3) & ~3;
}

export function fieldOffset<R extends RecordName>(record: R, field: FieldName<R>): number {
  const entry = recordLayout(record).find((e) => e.name === field);
  if (!entry) {
    throw new Error(`Record '${record}' has no field '${field}'`);
  }
  return entry.offset;
}
