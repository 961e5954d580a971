// Tagged optional for derived quantities.
// Downstream weight assembly switches on `present` instead of checking sentinel values.

export type AbsenceReason =
  | "field_missing"
  | "date_unparseable"
  | "zero_denominator"
  | "no_baseline";

export type Maybe<T> =
  | { present: true; value: T }
  | { present: false; reason: AbsenceReason };

export function some<T>(value: T): Maybe<T> {
  return { present: true, value };
}

export function none<T>(reason: AbsenceReason): Maybe<T> {
  return { present: false, reason };
}

export function mapMaybe<T, U>(m: Maybe<T>, fn: (v: T) => U): Maybe<U> {
  return m.present ? some(fn(m.value)) : none<U>(m.reason);
}

export function toNullable<T>(m: Maybe<T>): T | null {
  return m.present ? m.value : null;
}

export function fromOptional<T>(v: T | undefined): Maybe<T> {
  return v === undefined ? none("field_missing") : some(v);
}
