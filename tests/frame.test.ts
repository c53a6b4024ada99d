import type { SpringAnimation } from '../src/compositor'
import { FrameCompositor, FrameLoop } from '../src/frame'
import { Layer } from '../src/layer'
import { point, scalar } from '../src/value'
import { vec } from '../src/vec'
import { ManualScheduler } from './helpers'

const animation = (from: number, to: number, duration = 0.5): SpringAnimation<number> => ({
  stiffness: 342,
  damping: 30,
  mass: 1,
  from,
  to,
  duration,
})

function setup() {
  const scheduler = new ManualScheduler()
  const compositor = new FrameCompositor(scheduler.loop())
  const layer = new Layer(compositor)
  const x = layer.keyPath('x', scalar, 0)
  return { scheduler, compositor, layer, x }
}

describe('FrameLoop', () => {
  test('keeps at most one pending frame', () => {
    const scheduler = new ManualScheduler()
    const loop = new FrameLoop({ now: () => scheduler.time, scheduler })
    const calls: number[] = []
    loop.request(() => calls.push(1))
    loop.request(() => calls.push(2))
    expect(loop.pending).toBe(true)
    expect(scheduler.pending.size).toBe(1)

    scheduler.advance(16)
    expect(calls).toEqual([1])
    expect(loop.pending).toBe(false)
  })

  test('cancel drops the pending frame', () => {
    const scheduler = new ManualScheduler()
    const loop = new FrameLoop({ scheduler })
    const callback = jest.fn()
    loop.request(callback)
    loop.cancel()
    scheduler.advance(16)
    expect(callback).not.toHaveBeenCalled()
    expect(loop.pending).toBe(false)
  })

  test('falls back to a timer outside the browser', () => {
    jest.useFakeTimers()
    try {
      const loop = new FrameLoop()
      const callback = jest.fn()
      loop.request(callback)
      jest.advanceTimersByTime(15)
      expect(callback).not.toHaveBeenCalled()
      jest.advanceTimersByTime(1)
      expect(callback).toHaveBeenCalledTimes(1)
    } finally {
      jest.useRealTimers()
    }
  })
})

describe('Layer', () => {
  test('declares key paths once', () => {
    const { layer, x } = setup()
    expect(x.name).toBe('x')
    expect(layer.has('x')).toBe(true)
    expect(layer.names).toEqual(['x'])
    expect(() => layer.keyPath('x', scalar, 1)).toThrow(RangeError)
  })

  test('presentation follows the model value when idle', () => {
    const { x } = setup()
    x.property.value = 42
    expect(x.presentation).toBe(42)
    expect(x.animating).toBe(false)
  })
})

describe('FrameCompositor', () => {
  test('starts at the from value and completes at the duration', () => {
    const { scheduler, compositor, x } = setup()
    const onComplete = jest.fn()
    const completed: string[] = []
    compositor.on('complete', key => completed.push(key))

    x.property.value = 100
    x.add(animation(0, 100), 'a', undefined, onComplete)
    expect(x.presentation).toBe(0)
    expect(x.animating).toBe(true)
    expect(compositor.has('a')).toBe(true)

    scheduler.advance(16)
    expect(x.presentation).toBeGreaterThan(0)
    expect(x.presentation).toBeLessThan(100)

    scheduler.run(468)
    expect(onComplete).not.toHaveBeenCalled()
    scheduler.advance(16)
    expect(onComplete).toHaveBeenCalledTimes(1)
    expect(completed).toEqual(['a'])
    expect(compositor.has('a')).toBe(false)
    expect(x.animating).toBe(false)
    expect(x.presentation).toBe(100)
    expect(scheduler.pending.size).toBe(0)
  })

  test('emits a frame event per tick', () => {
    const { scheduler, compositor, x } = setup()
    const frames: number[] = []
    compositor.on('frame', time => frames.push(time))
    x.add(animation(0, 1, 0.04), 'a', undefined, () => { })
    scheduler.advance(16)
    scheduler.advance(16)
    scheduler.advance(16)
    scheduler.advance(16)
    expect(frames).toEqual([16, 32, 48])
  })

  test('uses the initial velocity', () => {
    const { scheduler, x } = setup()
    x.add(animation(0, 0), 'a', 50, () => { })
    scheduler.advance(16)
    expect(x.presentation).toBeGreaterThan(0)
  })

  test('remove cancels without completing', () => {
    const { scheduler, compositor, x } = setup()
    const onComplete = jest.fn()
    x.property.value = 10
    x.add(animation(0, 10), 'a', undefined, onComplete)
    scheduler.advance(16)

    x.removeAnimation('a')
    expect(compositor.size).toBe(0)
    expect(x.presentation).toBe(10)
    expect(scheduler.pending.size).toBe(0)
    scheduler.run(1000)
    expect(onComplete).not.toHaveBeenCalled()

    x.removeAnimation('a')
    expect(compositor.size).toBe(0)
  })

  test('the newest animation drives the presentation', () => {
    const { compositor, x } = setup()
    x.add(animation(0, 100), 'a', undefined, () => { })
    x.add(animation(50, 200), 'b', undefined, () => { })
    expect(x.presentation).toBe(50)
    expect(compositor.keys).toEqual(['a', 'b'])

    compositor.remove('b')
    expect(x.presentation).toBe(0)
  })

  test('adding under a running key replaces it silently', () => {
    const { scheduler, compositor, x } = setup()
    const first = jest.fn(), second = jest.fn()
    x.add(animation(0, 1, 0.1), 'a', undefined, first)
    x.add(animation(5, 1, 0.1), 'a', undefined, second)
    expect(compositor.size).toBe(1)
    expect(x.presentation).toBe(5)
    scheduler.run(112)
    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
  })

  test('animates points', () => {
    const { scheduler, layer } = setup()
    const position = layer.keyPath('position', point, vec(0, 0))
    position.property.value = vec(10, 20)
    position.add({ stiffness: 342, damping: 30, mass: 1, from: vec(0, 0), to: vec(10, 20), duration: 0.5 }, 'p', undefined, () => { })
    expect(position.presentation).toEqual({ x: 0, y: 0 })
    scheduler.advance(16)
    const { x, y } = position.presentation
    expect(x).toBeGreaterThan(0)
    expect(y).toBeCloseTo(2 * x, 10)
  })

  test('an undamped spring never completes by itself', () => {
    const { scheduler, compositor, x } = setup()
    const onComplete = jest.fn()
    x.add({ ...animation(0, 1), damping: 0, duration: Infinity }, 'a', undefined, onComplete)
    scheduler.run(10000)
    expect(onComplete).not.toHaveBeenCalled()
    expect(compositor.has('a')).toBe(true)
    expect(scheduler.pending.size).toBe(1)
  })

  test('clear removes everything', () => {
    const { scheduler, compositor, x, layer } = setup()
    const y = layer.keyPath('y', scalar, 3)
    x.add(animation(0, 1), 'a', undefined, () => { })
    y.add(animation(0, 3), 'b', undefined, () => { })
    compositor.clear()
    expect(compositor.size).toBe(0)
    expect(x.animating).toBe(false)
    expect(y.presentation).toBe(3)
    expect(scheduler.pending.size).toBe(0)
  })
})
