import type { KeyPath } from './layer'

/// Everything a compositor needs to run one spring on a key path.
export interface SpringAnimation<T> {
  readonly stiffness: number
  readonly damping: number
  readonly mass: number
  readonly from: T
  readonly to: T
  /// Seconds. May be `Infinity` for a spring that never settles.
  readonly duration: number
}

/// The host animation layer. It owns the timing loop and the physics,
/// callers only describe animations and keep track of their keys.
export interface Compositor {
  /// Start `animation` on `path` under `key`, replacing any animation with the same key.
  /// `onComplete` is called exactly once, when the animation finishes by itself.
  add<T>(path: KeyPath<T>, animation: SpringAnimation<T>, key: string, initialVelocity: T | undefined, onComplete: () => void): void
  /// Cancel synchronously. `onComplete` of a removed animation is never called.
  remove(key: string): void
  has(key: string): boolean
}
