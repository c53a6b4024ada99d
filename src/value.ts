import { add, mul, sub, type Vec } from './vec'

/// Arithmetic a spring needs to animate a value of type `T`.
/// The oscillator is linear, so any vector space works.
export interface ValueKind<T> {
  readonly zero: T
  add(a: T, b: T): T
  sub(a: T, b: T): T
  mul(a: T, n: number): T
}

export const scalar: ValueKind<number> = {
  zero: 0,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, n) => a * n,
}

export const point: ValueKind<Vec> = {
  zero: { x: 0, y: 0 },
  add, sub, mul,
}
