import type { ValueKind } from './value'

const enum C {
  // Fraction of the initial amplitude below which the spring counts as settled.
  Epsilon = 0.001,
  // Fixed-point iterations for the critically damped settling time.
  Iterations = 32,
}

export interface SpringParams {
  /// Stiffness.
  readonly tension: number
  /// Damping.
  readonly friction: number
  readonly mass: number
}

/// Displacement at time `t` is `a * x0 + b * v0`,
/// where `x0` is the initial displacement and `v0` the initial velocity.
export interface Response {
  readonly a: number
  readonly b: number
}

/// False for parameters no physical spring has: a mass that is not positive,
/// negative tension or friction, or a value that is not finite.
export const isValid = ({ tension, friction, mass }: SpringParams): boolean =>
  Number.isFinite(tension) && Number.isFinite(friction) && Number.isFinite(mass) &&
  mass > 0 && tension >= 0 && friction >= 0

/// Undamped angular frequency and damping ratio.
export const characteristics = ({ tension, friction, mass }: SpringParams) => {
  let w0 = Math.sqrt(tension / mass)
  let zeta = friction / (2 * Math.sqrt(tension * mass))
  return { w0, zeta }
}

/// Seconds until the displacement envelope decays below `epsilon` of its
/// starting amplitude. A spring without friction never settles,
/// invalid parameters settle at once.
export const settlingDuration = (params: SpringParams, epsilon: number = C.Epsilon): number => {
  if (!isValid(params)) return 0
  let { w0, zeta } = characteristics(params)
  if (!(params.friction > 0) || w0 == 0) return Infinity
  let k = -Math.log(epsilon)
  if (zeta < 1) {
    return k / (zeta * w0)
  }
  if (zeta == 1) {
    // Solve (1 + w0 t) e^(-w0 t) = epsilon.
    let t = k / w0
    for (let i = 0; i < C.Iterations; i++) {
      t = (k + Math.log(1 + w0 * t)) / w0
    }
    return t
  }
  // The slower of the two real roots dominates.
  let slow = w0 * (zeta - Math.sqrt(zeta * zeta - 1))
  return k / slow
}

/// Closed-form solution of `m x'' + c x' + k x = 0`.
/// Invalid parameters jump straight to the destination.
export const response = (params: SpringParams, t: number): Response => {
  if (!isValid(params)) return { a: 0, b: 0 }
  let { w0, zeta } = characteristics(params)
  if (w0 == 0) {
    // No restoring force: the value drifts with its velocity, slowed by friction.
    let c = params.friction / params.mass
    return { a: 1, b: c > 0 ? (1 - Math.exp(-c * t)) / c : t }
  }
  if (zeta < 1) {
    let wd = w0 * Math.sqrt(1 - zeta * zeta),
        e = Math.exp(-zeta * w0 * t),
        s = Math.sin(wd * t), c = Math.cos(wd * t)
    return { a: e * (c + (zeta * w0 / wd) * s), b: e * s / wd }
  }
  if (zeta == 1) {
    let e = Math.exp(-w0 * t)
    return { a: e * (1 + w0 * t), b: e * t }
  }
  let root = Math.sqrt(zeta * zeta - 1),
      r1 = -w0 * (zeta - root), r2 = -w0 * (zeta + root),
      e1 = Math.exp(r1 * t), e2 = Math.exp(r2 * t), d = r1 - r2
  return { a: (r1 * e2 - r2 * e1) / d, b: (e1 - e2) / d }
}

/// Evaluates a spring travelling from `from` to `to`.
export class Oscillator<T> {
  /// @internal
  readonly _x0: T

  constructor(
    readonly kind: ValueKind<T>,
    readonly params: SpringParams,
    readonly from: T,
    readonly to: T,
    /// Units per second.
    readonly velocity: T = kind.zero,
  ) {
    this._x0 = kind.sub(from, to)
  }

  /// Value at `t` seconds after the start.
  value(t: number): T {
    let { kind } = this, { a, b } = response(this.params, Math.max(t, 0))
    return kind.add(this.to, kind.add(kind.mul(this._x0, a), kind.mul(this.velocity, b)))
  }
}
