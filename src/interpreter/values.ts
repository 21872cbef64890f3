export type Value =
  | { tag: "Int"; value: number }
  | { tag: "Bool"; value: boolean }
  | { tag: "String"; value: string };

export type ValueTag = Value["tag"];

export function intValue(value: number): Value {
  return { tag: "Int", value: value | 0 };
}

export function boolValue(value: boolean): Value {
  return { tag: "Bool", value };
}

export function stringValue(value: string): Value {
  return { tag: "String", value };
}

export function fromLiteral(value: number | string): Value {
  return typeof value === "number" ? intValue(value) : stringValue(value);
}

export function valuesEqual(a: Value, b: Value): boolean {
  return a.tag === b.tag && a.value === b.value;
}

// ============================================================
// 32-bit integer arithmetic
// ============================================================

export function truncDiv(a: number, b: number): number {
  return Math.trunc(a / b) | 0;
}

export function truncMod(a: number, b: number): number {
  return (a % b) | 0;
}

export function intPow(base: number, exponent: number): number {
  if (exponent < 0) {
    if (base === 1) return 1;
    if (base === -1) return exponent % 2 === 0 ? 1 : -1;
    return 0;
  }
  let result = 1;
  let b = base;
  let e = exponent;
  while (e > 0) {
    if (e & 1) result = Math.imul(result, b);
    b = Math.imul(b, b);
    e >>>= 1;
  }
  return result;
}
