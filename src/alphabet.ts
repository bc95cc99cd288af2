/**
 * Alphabet Utilities
 *
 * Letter/index conversion and wiring validation for the 26-letter alphabet.
 * Every position in the library is a zero-based index in [0, 26); letters are
 * only produced at the edges (character-level encipherment and the machine's
 * input/output).
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __wiring: unique symbol

/** A permutation of A–Z: position i holds the cipher image of letter i. */
export type Wiring = string & { readonly [__wiring]: true }

// ============================================================================
// Errors
// ============================================================================

export { InvalidWiringError, InvalidSettingError } from './errors'
import { InvalidWiringError, InvalidSettingError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'
export const ALPHABET_SIZE = 26

const CODE_A = 65

// ============================================================================
// Conversion
// ============================================================================

export function isAlphabetic(ch: string): boolean {
  return ch.length === 1 && ch >= 'A' && ch <= 'Z'
}

/** Zero-based index of an alphabetic letter; -1 for anything else. */
export function indexOf(letter: string): number {
  return isAlphabetic(letter) ? letter.charCodeAt(0) - CODE_A : -1
}

export function letterAt(index: number): string {
  return String.fromCharCode(CODE_A + mod26(index))
}

export function mod26(n: number): number {
  return ((n % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE
}

// ============================================================================
// Parsing
// ============================================================================

export function parseWiring(str: string): Result<Wiring, InvalidWiringError> {
  if (str.length !== ALPHABET_SIZE) {
    return Err(new InvalidWiringError(
      `Wiring must have ${ALPHABET_SIZE} letters, got ${str.length}: '${str}'`
    ))
  }

  const seen = new Set<string>()
  for (const ch of str) {
    if (!isAlphabetic(ch)) {
      return Err(new InvalidWiringError(`Invalid character '${ch}' in wiring: '${str}'`))
    }
    if (seen.has(ch)) {
      const missing = [...ALPHABET].filter(l => !str.includes(l)).join('')
      return Err(new InvalidWiringError(
        `Duplicate letter '${ch}' in wiring: '${str}' (missing: ${missing})`
      ))
    }
    seen.add(ch)
  }

  return Ok(str as Wiring)
}

/**
 * Validates a rotor position, ring setting or trigger value and reduces it
 * mod 26. Negative integers are accepted and wrap.
 */
export function parseSetting(value: number, label: string): Result<number, InvalidSettingError> {
  if (!Number.isSafeInteger(value)) {
    return Err(new InvalidSettingError(`${label} must be an integer, got ${value}`))
  }
  return Ok(mod26(value))
}

// ============================================================================
// Wiring Properties
// ============================================================================

/**
 * True when the wiring is a fixed-point-free involution, the shape a
 * reflector is expected to have. Not enforced by the machine.
 */
export function isReflectorWiring(wiring: string): boolean {
  const parsed = parseWiring(wiring)
  if (!parsed.ok) return false

  for (let i = 0; i < ALPHABET_SIZE; i++) {
    const image = indexOf(parsed.value.charAt(i))
    if (image === i) return false
    if (indexOf(parsed.value.charAt(image)) !== i) return false
  }
  return true
}
