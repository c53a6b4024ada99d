import type { Compositor, SpringAnimation } from './compositor'
import { Property } from './property'
import type { ValueKind } from './value'

/// One animatable property of a layer.
/// `property` holds the model value; `presentation` is what is on screen.
export class KeyPath<T> {
  readonly property: Property<T>
  /// @internal Set by the compositor while an animation drives this path.
  _presentation: { value: T } | undefined

  /// @internal
  constructor(
    readonly layer: Layer,
    readonly name: string,
    readonly kind: ValueKind<T>,
    initial: T,
  ) {
    this.property = new Property(initial)
  }

  /// The animated value if an animation is running, otherwise the model value.
  get presentation(): T {
    return this._presentation ? this._presentation.value : this.property.value
  }

  get animating(): boolean {
    return this._presentation !== undefined
  }

  add(animation: SpringAnimation<T>, key: string, initialVelocity: T | undefined, onComplete: () => void): void {
    this.layer.compositor.add(this, animation, key, initialVelocity, onComplete)
  }

  removeAnimation(key: string): void {
    this.layer.compositor.remove(key)
  }
}

/// A named bag of key paths sharing one compositor.
export class Layer {
  /// @internal
  readonly _paths = new Set<string>()

  constructor(readonly compositor: Compositor) { }

  /// Declare a key path. Declaring the same name twice is a `RangeError`.
  keyPath<T>(name: string, kind: ValueKind<T>, initial: T): KeyPath<T> {
    if (this._paths.has(name))
      throw new RangeError(`Key path '${name}' already exists`)
    this._paths.add(name)
    return new KeyPath(this, name, kind, initial)
  }

  has(name: string): boolean {
    return this._paths.has(name)
  }

  get names(): string[] {
    return Array.from(this._paths)
  }
}
