/// 2D vector
export interface Vec {
  readonly x: number
  readonly y: number
}

export const clamp = (value: number, min: number, max: number) => value < min ? min : value > max ? max : value

export const vec = (x: number, y: number): Vec => ({ x, y })
export const add = (a: Vec, b: Vec): Vec => ({ x: a.x + b.x, y: a.y + b.y })
export const sub = (a: Vec, b: Vec): Vec => ({ x: a.x - b.x, y: a.y - b.y })
export const mul = (a: Vec, n: number): Vec => ({ x: a.x * n, y: a.y * n })
