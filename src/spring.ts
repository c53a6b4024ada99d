import type { SpringAnimation } from './compositor'
import type { KeyPath } from './layer'
import { logger } from './logger'
import { settlingDuration } from './oscillator'
import { createProperty, type Property } from './property'

export const defaultSpringTension = 342
export const defaultSpringFriction = 30
export const defaultSpringMass = 1

export enum MotionState {
  atRest = 'atRest',
  active = 'active',
}

const log = logger.child('spring')

/// Something that can be armed and disarmed.
export interface Interaction {
  enable(): void
  disable(): void
}

export interface SpringInteraction<T> extends Interaction {
  initialVelocity: T | undefined
  destination: T | undefined
  start(): void
  stop(): void
}

export interface Stateful {
  readonly state: Property<MotionState>
}

export interface SpringOptions<T> {
  /// Default is `defaultSpringTension`.
  tension?: number
  /// Default is `defaultSpringFriction`.
  friction?: number
  /// Default is `defaultSpringMass`.
  mass?: number
  /// Seconds, `0` means the natural settling duration is used.
  suggestedDuration?: number
  initialVelocity?: T
}

/// A spring pulls the value of a key path to `destination` with a damped oscillator.
///
/// The model value jumps to the destination as soon as the spring emits,
/// only the presentation value is animated. Every change of `destination`
/// starts a new animation; earlier ones keep running until they finish.
///
/// Parameters are not checked. A spring with a mass that is not positive or
/// with negative tension or friction shows its destination right away and
/// comes to rest on the next frame.
export class Spring<T> implements SpringInteraction<T>, Stateful {
  /// Higher tension means higher initial velocity and more overshoot.
  tension: number
  /// Higher friction means quicker deceleration and less overshoot.
  friction: number
  /// Higher mass means slower acceleration and deceleration.
  mass: number
  /// Seconds. `0` means the natural settling duration is used.
  suggestedDuration: number
  /// Applied to the simulation only when it starts.
  initialVelocity: T | undefined

  /// `atRest` while nothing runs, `active` otherwise.
  readonly state = createProperty<MotionState>(MotionState.atRest)

  /// @internal Keys of animations started by this spring and not yet finished.
  readonly _activeKeys = new Set<string>()
  /// @internal
  _destination: T | undefined
  /// @internal
  _enabled = false
  /// @internal
  _stopped = false
  /// @internal
  readonly _constraints: ((value: T) => T)[] = []

  constructor(readonly path: KeyPath<T>, options: SpringOptions<T> = {}) {
    this.tension = options.tension ?? defaultSpringTension
    this.friction = options.friction ?? defaultSpringFriction
    this.mass = options.mass ?? defaultSpringMass
    this.suggestedDuration = options.suggestedDuration ?? 0
    this.initialVelocity = options.initialVelocity
  }

  /// Changing the destination immediately starts a new simulation.
  get destination(): T | undefined { return this._destination }
  set destination(v: T | undefined) {
    this._destination = v
    this.checkAndEmit()
  }

  get enabled(): boolean { return this._enabled }
  get stopped(): boolean { return this._stopped }

  get activeKeys(): ReadonlySet<string> { return this._activeKeys }

  enable(): void {
    if (this._enabled) return
    this._enabled = true
    this.checkAndEmit()
  }

  disable(): void {
    if (!this._enabled) return
    this._enabled = false
    this._removeAll()
  }

  start(): void {
    if (!this._stopped) return
    this._stopped = false
    this.checkAndEmit()
  }

  stop(): void {
    if (this._stopped) return
    this._stopped = true
    this._removeAll()
  }

  /// Register a transform applied to the destination before each emission.
  /// Returns a function that unregisters it.
  addConstraint(fn: (value: T) => T): () => void {
    this._constraints.push(fn)
    return () => {
      let index = this._constraints.indexOf(fn)
      if (index >= 0) this._constraints.splice(index, 1)
    }
  }

  /// @internal Start a new animation when enabled, started and a destination is set.
  checkAndEmit(): void {
    if (!this._enabled || this._stopped) return
    let destination = this._destination
    if (destination === undefined) return

    for (let fn of this._constraints) destination = fn(destination)

    let key = crypto.randomUUID()
    let params = { tension: this.tension, friction: this.friction, mass: this.mass }
    let animation: SpringAnimation<T> = {
      stiffness: this.tension,
      damping: this.friction,
      mass: this.mass,
      from: this.path.property.value,
      to: destination,
      duration: this.suggestedDuration != 0 ? this.suggestedDuration : settlingDuration(params),
    }

    this.path.property.value = destination
    // A listener of the model value may have disarmed the spring.
    if (!this._enabled || this._stopped) return

    let activeKeys = this._activeKeys, state = this.state
    activeKeys.add(key)
    log.debug(`emit ${key} on '${this.path.name}', ${activeKeys.size} active`)

    this.path.add(animation, key, this.initialVelocity, () => {
      activeKeys.delete(key)
      if (activeKeys.size == 0 && state.value !== MotionState.atRest) {
        state.value = MotionState.atRest
      }
    })

    // Submitted first, so a state listener calling `stop()` can cancel it.
    if (activeKeys.has(key) && state.value !== MotionState.active) state.value = MotionState.active
  }

  /// @internal
  _removeAll(): void {
    if (this._activeKeys.size > 0) log.debug(`cancel ${this._activeKeys.size} on '${this.path.name}'`)
    this._activeKeys.forEach(key => this.path.removeAnimation(key))
    this._activeKeys.clear()
    if (this.state.value !== MotionState.atRest) this.state.value = MotionState.atRest
  }
}
