/**
 * Wheel Module
 *
 * A single wheel abstraction covering every role in the machine: a static
 * substitution (plugboard, reflector) or a rotating substitution with rotor
 * position, ring setting and turnover triggers.
 *
 * Character-level operations (encipher/decipher) shift the input backward by
 * the rotor position and the output forward by the ring setting. Position-level
 * operations (rightToLeft/leftToRight) carry the signal between neighbouring
 * components and express their result in the next component's frame. The ring
 * setting only ever acts on the output side: at rotor position 0,
 * rightToLeft(p) is the index of encipher(letterAt(p)).
 *
 * A static wheel may carry a fixed forward offset, a Caesar-style shift of the
 * input before the wiring lookup.
 */

import {
  ALPHABET_SIZE,
  indexOf, isAlphabetic, letterAt, mod26,
  parseWiring, parseSetting,
  type Wiring,
} from './alphabet'
import { InvalidSettingError, InternalConsistencyError } from './errors'
import type { Result } from './result'

// ============================================================================
// Types
// ============================================================================

export type WheelConfig = {
  wiring: string
  /** Static wheels never step; defaults to true. */
  rotating?: boolean
  /** Fixed forward input shift; static wheels only. */
  offset?: number
  rotorPosition?: number
  ringSetting?: number
  triggers?: readonly number[]
}

export interface Wheel {
  readonly wiring: Wiring
  readonly rotating: boolean
  readonly offset: number
  readonly rotorPosition: number
  readonly ringSetting: number
  /** Sorted copy of the turnover positions. */
  readonly triggers: number[]

  encipher(text: string): string
  decipher(text: string): string

  /** Advances one position; true when the new position is a trigger. */
  rotate(): boolean
  setRotorPosition(position: number): void
  setTriggers(positions: readonly number[]): void

  rightToLeft(position: number): number
  leftToRight(position: number): number
}

// ============================================================================
// Helpers
// ============================================================================

function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error
  return result.value
}

function parseTriggers(positions: readonly number[]): Set<number> {
  const triggers = new Set<number>()
  for (const p of positions) {
    triggers.add(unwrap(parseSetting(p, 'Trigger position')))
  }
  return triggers
}

function mapLetters(text: string, fn: (letter: string) => string): string {
  let out = ''
  for (const ch of text) {
    out += isAlphabetic(ch) ? fn(ch) : ch
  }
  return out
}

// ============================================================================
// Factory
// ============================================================================

export function createWheel(config: WheelConfig): Wheel {
  const wiring = unwrap(parseWiring(config.wiring))
  const rotating = config.rotating ?? true

  const offset = unwrap(parseSetting(config.offset ?? 0, 'Offset'))
  let rotorPosition = unwrap(parseSetting(config.rotorPosition ?? 0, 'Rotor position'))
  const ringSetting = unwrap(parseSetting(config.ringSetting ?? 0, 'Ring setting'))
  let triggers = parseTriggers(config.triggers ?? [])

  if (rotating && offset !== 0) {
    throw new InvalidSettingError('A rotating wheel takes no fixed offset')
  }
  if (!rotating && (rotorPosition !== 0 || ringSetting !== 0 || triggers.size > 0)) {
    throw new InvalidSettingError('A static wheel takes no rotor position, ring setting or triggers')
  }

  function inverse(letter: string): number {
    const index = wiring.indexOf(letter)
    if (index < 0) {
      throw new InternalConsistencyError(`Letter '${letter}' not found in wiring '${wiring}'`)
    }
    return index
  }

  function requireRotating(operation: string): void {
    if (!rotating) {
      throw new InvalidSettingError(`Cannot ${operation} on a static wheel`)
    }
  }

  function encipherLetter(letter: string): string {
    const shifted = mod26(indexOf(letter) + offset - rotorPosition)
    return letterAt(indexOf(wiring.charAt(shifted)) + ringSetting)
  }

  function decipherLetter(letter: string): string {
    const unringed = letterAt(indexOf(letter) - ringSetting)
    return letterAt(inverse(unringed) - offset + rotorPosition)
  }

  return {
    wiring,
    rotating,
    offset,
    get rotorPosition() { return rotorPosition },
    ringSetting,
    get triggers() { return [...triggers].sort((a, b) => a - b) },

    encipher(text: string): string {
      return mapLetters(text, encipherLetter)
    },

    decipher(text: string): string {
      return mapLetters(text, decipherLetter)
    },

    rotate(): boolean {
      if (!rotating) return false
      rotorPosition = (rotorPosition + 1) % ALPHABET_SIZE
      return triggers.has(rotorPosition)
    },

    setRotorPosition(position: number): void {
      requireRotating('set rotor position')
      rotorPosition = unwrap(parseSetting(position, 'Rotor position'))
    },

    setTriggers(positions: readonly number[]): void {
      requireRotating('set triggers')
      triggers = parseTriggers(positions)
    },

    rightToLeft(position: number): number {
      const contact = mod26(position + offset + rotorPosition)
      return mod26(indexOf(wiring.charAt(contact)) - rotorPosition + ringSetting)
    },

    leftToRight(position: number): number {
      const unringed = letterAt(position - ringSetting + rotorPosition)
      return mod26(inverse(unringed) - offset - rotorPosition)
    },
  }
}

export function createSubstitutionWheel(wiring: string, offset = 0): Wheel {
  return createWheel({ wiring, rotating: false, offset })
}

export function createRotatingWheel(
  wiring: string,
  rotorPosition: number,
  ringSetting: number,
  triggers: readonly number[] = []
): Wheel {
  return createWheel({ wiring, rotorPosition, ringSetting, triggers })
}
