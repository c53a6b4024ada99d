import { clamp, FrameCompositor, Layer, MotionState, point, Spring, vec } from './src/index'

const enum C {
  // Side length of the square.
  Size = 128,
}

let $root = document.getElementById('app')!
let $square = $root.appendChild(document.createElement('div'))
let $state = document.getElementById('state')!

$root.style.cssText = `position: relative; width: 100%; height: 100%;
touch-action: none; overflow: hidden; overscroll-behavior: none;`

$square.style.cssText = `position: absolute; top: 0; left: 0;
width: ${C.Size}px; height: ${C.Size}px; margin: ${-C.Size / 2}px 0 0 ${-C.Size / 2}px;
border-radius: 8px; background: #f06292; pointer-events: none; will-change: transform;`

let compositor = new FrameCompositor()
let layer = new Layer(compositor)
let position = layer.keyPath('position', point, vec($root.clientWidth / 2, $root.clientHeight / 2))

let render = () => {
  let { x, y } = position.presentation
  $square.style.transform = `translate(${x}px, ${y}px)`
}

compositor.on('frame', render)
render()

let spring = new Spring(position)
spring.friction /= 2
spring.addConstraint(({ x, y }) => vec(
  clamp(x, 0, $root.clientWidth),
  clamp(y, 0, $root.clientHeight),
))
spring.enable()

spring.state.subscribe(state => {
  $state.textContent = state === MotionState.active ? 'active' : 'at rest'
})

$root.onpointerdown = (e) => {
  e.preventDefault()
  e.stopPropagation()
  spring.destination = vec(
    Math.floor(Math.random() * $root.clientWidth),
    Math.floor(Math.random() * $root.clientHeight),
  )
}

$root.ontouchstart = $root.ontouchmove = $root.ontouchend = $root.ontouchcancel = (e) => {
  e.preventDefault()
  e.stopPropagation()
}

Object.assign(globalThis, {
  $root, $square, spring, position, compositor,
})
