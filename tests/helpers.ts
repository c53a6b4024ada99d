import type { Compositor, SpringAnimation } from '../src/compositor'
import { FrameLoop, type Scheduler } from '../src/frame'
import type { KeyPath } from '../src/layer'

/// A scheduler driven by hand, with its own clock in milliseconds.
export class ManualScheduler implements Scheduler {
  time = 0
  readonly pending = new Set<() => void>()

  schedule(callback: () => void): () => void {
    this.pending.add(callback)
    return () => { this.pending.delete(callback) }
  }

  /// Move the clock forward and run the callbacks that were pending.
  advance(ms: number): void {
    this.time += ms
    let callbacks = Array.from(this.pending)
    this.pending.clear()
    callbacks.forEach(f => f())
  }

  /// Advance frame by frame until `ms` have passed.
  run(ms: number, frame = 16): void {
    for (let left = ms; left > 0; left -= frame) this.advance(Math.min(frame, left))
  }

  loop(): FrameLoop {
    return new FrameLoop({ now: () => this.time, scheduler: this })
  }
}

export interface Added {
  readonly path: string
  readonly animation: SpringAnimation<unknown>
  readonly key: string
  readonly initialVelocity: unknown
}

/// Records what a spring submits; completions are fired by the test.
export class RecordingCompositor implements Compositor {
  readonly added: Added[] = []
  readonly removed: string[] = []
  readonly _callbacks = new Map<string, () => void>()

  add<T>(path: KeyPath<T>, animation: SpringAnimation<T>, key: string, initialVelocity: T | undefined, onComplete: () => void): void {
    this.added.push({ path: path.name, animation, key, initialVelocity })
    this._callbacks.set(key, onComplete)
  }

  remove(key: string): void {
    this.removed.push(key)
    this._callbacks.delete(key)
  }

  has(key: string): boolean {
    return this._callbacks.has(key)
  }

  complete(key: string): void {
    let onComplete = this._callbacks.get(key)
    if (!onComplete) throw new Error(`No running animation ${key}`)
    this._callbacks.delete(key)
    onComplete()
  }
}
