/**
 * Machine Module
 *
 * Composes a plugboard, three rotating wheels and a reflector into the
 * double-pass signal path:
 *
 *   plugboard → right → middle → left → reflector → left → middle → right → plugboard
 *
 * Every alphabetic keystroke steps the rotors before translation. The right
 * wheel always steps; carry moves left only when a stepped wheel lands on one
 * of its triggers. With an involutive reflector the whole transform is its
 * own inverse for equal starting positions.
 */

import { indexOf, isAlphabetic, letterAt, parseSetting } from './alphabet'
import { createWheel, createSubstitutionWheel, type Wheel } from './wheel'

// ============================================================================
// Types
// ============================================================================

export type RotorSettings = {
  wiring: string
  offset: number
  ring: number
  triggers?: readonly number[]
}

export type MachineConfig = {
  plugboard: string
  right: RotorSettings
  middle: RotorSettings
  left: RotorSettings
  /** Expected to be a fixed-point-free involution (see isReflectorWiring). */
  reflector: string
  /**
   * Receives errors thrown by event handlers. Without it a handler's error
   * propagates out of transformMessage.
   */
  onHandlerError?: (error: unknown, event: MachineEvent) => void
}

export type RotorPositions = {
  right: number
  middle: number
  left: number
}

export type MachineEvent = 'step' | 'turnover'

export interface Machine {
  transformMessage(text: string): string
  setTriggers(right: readonly number[], middle: readonly number[], left: readonly number[]): void
  setRotorPositions(right: number, middle: number, left: number): void
  getRotorPositions(): RotorPositions
  /**
   * 'step' handlers receive the rotor positions after each keystroke;
   * 'turnover' handlers receive the role whose stepping carried left.
   */
  on(event: MachineEvent, handler: (...args: unknown[]) => void): void
}

// ============================================================================
// Factory
// ============================================================================

function createRotor(settings: RotorSettings): Wheel {
  return createWheel({
    wiring: settings.wiring,
    rotorPosition: settings.offset,
    ringSetting: settings.ring,
    triggers: settings.triggers ?? [],
  })
}

export function createMachine(config: MachineConfig): Machine {
  const plugboard = createSubstitutionWheel(config.plugboard)
  const right = createRotor(config.right)
  const middle = createRotor(config.middle)
  const left = createRotor(config.left)
  const reflector = createSubstitutionWheel(config.reflector)

  const forward: readonly Wheel[] = [plugboard, right, middle, left, reflector]
  const backward: readonly Wheel[] = [left, middle, right, plugboard]

  // Event handlers
  const eventHandlers = new Map<MachineEvent, ((...args: unknown[]) => void)[]>()

  function emit(event: MachineEvent, ...args: unknown[]): void {
    const handlers = eventHandlers.get(event) ?? []
    const onHandlerError = config.onHandlerError
    for (const handler of handlers) {
      if (!onHandlerError) {
        handler(...args)
        continue
      }
      try { handler(...args) } catch (e) { onHandlerError(e, event) }
    }
  }

  function on(event: MachineEvent, handler: (...args: unknown[]) => void) {
    const handlers = eventHandlers.get(event) ?? []
    handlers.push(handler)
    eventHandlers.set(event, handlers)
  }

  function getRotorPositions(): RotorPositions {
    return {
      right: right.rotorPosition,
      middle: middle.rotorPosition,
      left: left.rotorPosition,
    }
  }

  function step(): void {
    if (right.rotate()) {
      emit('turnover', 'right')
      if (middle.rotate()) {
        emit('turnover', 'middle')
        left.rotate()
      }
    }
    emit('step', Object.freeze(getRotorPositions()))
  }

  function transformLetter(letter: string): string {
    step()
    let signal = indexOf(letter)
    for (const wheel of forward) signal = wheel.rightToLeft(signal)
    for (const wheel of backward) signal = wheel.leftToRight(signal)
    return letterAt(signal)
  }

  return {
    transformMessage(text: string): string {
      let out = ''
      for (const ch of text) {
        out += isAlphabetic(ch) ? transformLetter(ch) : ch
      }
      return out
    },

    setTriggers(rightTriggers, middleTriggers, leftTriggers): void {
      right.setTriggers(rightTriggers)
      middle.setTriggers(middleTriggers)
      left.setTriggers(leftTriggers)
    },

    setRotorPositions(rightPosition, middlePosition, leftPosition): void {
      // All three are validated before any rotor moves
      for (const [role, position] of [['Right', rightPosition], ['Middle', middlePosition], ['Left', leftPosition]] as const) {
        const parsed = parseSetting(position, `${role} rotor position`)
        if (!parsed.ok) throw parsed.error
      }
      right.setRotorPosition(rightPosition)
      middle.setRotorPosition(middlePosition)
      left.setRotorPosition(leftPosition)
    },

    getRotorPositions,
    on,
  }
}

/**
 * Positional form of createMachine: plugboard, then wiring/offset/ring for the
 * right, middle and left wheels, then the reflector.
 */
export function createMachineFromWirings(
  plugboard: string,
  rightWiring: string, rightOffset: number, rightRing: number,
  middleWiring: string, middleOffset: number, middleRing: number,
  leftWiring: string, leftOffset: number, leftRing: number,
  reflector: string
): Machine {
  return createMachine({
    plugboard,
    right: { wiring: rightWiring, offset: rightOffset, ring: rightRing },
    middle: { wiring: middleWiring, offset: middleOffset, ring: middleRing },
    left: { wiring: leftWiring, offset: leftOffset, ring: leftRing },
    reflector,
  })
}
