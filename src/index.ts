export { Spring, MotionState, defaultSpringTension, defaultSpringFriction, defaultSpringMass } from './spring'
export type { Interaction, SpringInteraction, SpringOptions, Stateful } from './spring'
export type { Compositor, SpringAnimation } from './compositor'
export { FrameCompositor, FrameLoop, animationFrameScheduler, timerScheduler } from './frame'
export type { FrameCompositorEventMap, FrameLoopOptions, Scheduler } from './frame'
export { Layer, KeyPath } from './layer'
export { Property, createProperty, type PropertyEventMap } from './property'
export { Observable } from './observable'
export { Oscillator, settlingDuration, response, characteristics, isValid, type SpringParams, type Response } from './oscillator'
export { scalar, point, type ValueKind } from './value'
export { clamp, vec, type Vec } from './vec'
export { Logger, logger } from './logger'
