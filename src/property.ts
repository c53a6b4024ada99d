import { Observable } from './observable'

export interface PropertyEventMap<T> {
  'change': (value: T) => void
}

/// A value cell that reports every write.
export class Property<T> extends Observable<PropertyEventMap<T>> {
  /// @internal
  _value: T

  /// @internal
  constructor(initial: T) {
    super()
    this._value = initial
  }

  get value(): T { return this._value }
  set value(v: T) {
    this._value = v
    this.emit('change', v)
  }

  /// Call `fn` with the current value now and with every later value.
  /// Returns a function that stops the subscription.
  subscribe(fn: (value: T) => void): () => void {
    let off = this.on('change', fn)
    fn(this._value)
    return off
  }
}

export const createProperty = <T>(initial: T) => new Property(initial)
