import type { Compositor, SpringAnimation } from './compositor'
import type { KeyPath } from './layer'
import { logger } from './logger'
import { Observable } from './observable'
import { Oscillator } from './oscillator'

const enum C {
  // Timer fallback when there is no `requestAnimationFrame`, about 60 fps.
  FrameMs = 16,
}

const log = logger.child('compositor')

/// Schedules one callback and returns a function that cancels it.
export interface Scheduler {
  schedule(callback: () => void): () => void
}

export interface FrameLoopOptions {
  /// Milliseconds, default is `performance.now()`.
  now?: () => number
  /// Default is `requestAnimationFrame` in browsers and a 16ms timer elsewhere.
  scheduler?: Scheduler
}

export const timerScheduler: Scheduler = {
  schedule(callback) {
    let id = setTimeout(callback, C.FrameMs)
    return () => clearTimeout(id)
  }
}

export const animationFrameScheduler: Scheduler = {
  schedule(callback) {
    let id = requestAnimationFrame(() => callback())
    return () => cancelAnimationFrame(id)
  }
}

/// At most one pending frame at a time.
export class FrameLoop {
  readonly now: () => number
  readonly scheduler: Scheduler
  /// @internal
  _cancel: (() => void) | undefined

  constructor(options: FrameLoopOptions = {}) {
    this.now = options.now ?? (() => performance.now())
    this.scheduler = options.scheduler ?? (typeof requestAnimationFrame == 'function' ? animationFrameScheduler : timerScheduler)
  }

  get pending(): boolean {
    return this._cancel !== undefined
  }

  request(callback: () => void): void {
    if (this._cancel) return
    this._cancel = this.scheduler.schedule(() => {
      this._cancel = void 0
      callback()
    })
  }

  cancel(): void {
    if (this._cancel) {
      this._cancel()
      this._cancel = void 0
    }
  }
}

export interface FrameCompositorEventMap {
  /// After every tick, with the tick's timestamp.
  'frame': (time: number) => void
  /// An animation finished by itself.
  'complete': (key: string) => void
}

/// @internal
interface Running {
  readonly key: string
  /// The key path this animation drives.
  readonly target: object
  readonly start: number
  readonly duration: number
  readonly sample: (seconds: number) => void
  readonly reset: () => void
  readonly onComplete: () => void
}

/// A compositor that evaluates springs in closed form on every frame and
/// writes the results to the key paths' presentation values.
export class FrameCompositor extends Observable<FrameCompositorEventMap> implements Compositor {
  readonly loop: FrameLoop
  /// @internal Insertion ordered, so the last one per target wins.
  readonly _running = new Map<string, Running>()

  constructor(loop: FrameLoop | FrameLoopOptions = {}) {
    super()
    this.loop = loop instanceof FrameLoop ? loop : new FrameLoop(loop)
  }

  get size(): number {
    return this._running.size
  }

  get keys(): string[] {
    return Array.from(this._running.keys())
  }

  has(key: string): boolean {
    return this._running.has(key)
  }

  add<T>(path: KeyPath<T>, animation: SpringAnimation<T>, key: string, initialVelocity: T | undefined, onComplete: () => void): void {
    if (this._running.has(key)) this.remove(key)
    let oscillator = new Oscillator(path.kind, {
      tension: animation.stiffness,
      friction: animation.damping,
      mass: animation.mass,
    }, animation.from, animation.to, initialVelocity)
    let running: Running = {
      key,
      target: path,
      start: this.loop.now(),
      duration: animation.duration,
      sample: (seconds) => { path._presentation = { value: oscillator.value(seconds) } },
      reset: () => { path._presentation = void 0 },
      onComplete,
    }
    this._running.set(key, running)
    log.debug(`add ${key} on '${path.name}' for ${animation.duration}s`)
    running.sample(0)
    this.loop.request(this.tick)
  }

  remove(key: string): void {
    let running = this._running.get(key)
    if (running) {
      this._running.delete(key)
      log.debug(`remove ${key}`)
      this._render(this.loop.now(), [running])
      if (this._running.size == 0) this.loop.cancel()
    }
  }

  /// Remove every animation without completing them.
  clear(): void {
    let all = Array.from(this._running.values())
    this._running.clear()
    this.loop.cancel()
    for (let running of all) running.reset()
  }

  /// Advance all animations to the loop's current time.
  tick = (): void => {
    let now = this.loop.now(), done: Running[] = []
    for (let running of this._running.values()) {
      if ((now - running.start) / 1000 >= running.duration) done.push(running)
    }
    for (let running of done) this._running.delete(running.key)
    this._render(now, done)
    for (let running of done) {
      running.onComplete()
      this.emit('complete', running.key)
    }
    this.emit('frame', now)
    if (this._running.size > 0) this.loop.request(this.tick)
  }

  /// @internal Sample the newest animation of every target and reset
  /// targets of `ended` that nothing drives anymore.
  _render(now: number, ended: Running[]): void {
    let latest = new Map<object, Running>()
    for (let running of this._running.values()) latest.set(running.target, running)
    latest.forEach(running => running.sample((now - running.start) / 1000))
    for (let running of ended) {
      if (!latest.has(running.target)) running.reset()
    }
  }
}
