/**
 * rotor-machine
 *
 * Public API exports
 */

// Errors: base class, codes and one subclass per code
export {
  RotorMachineError, RotorMachineErrorCode,
  InvalidWiringError, InvalidSettingError, InternalConsistencyError,
} from './errors'
export type { RotorMachineErrorCode as RotorMachineErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Alphabet (branded wiring type + conversions)
export type { Wiring } from './alphabet'
export {
  ALPHABET, ALPHABET_SIZE,
  isAlphabetic, indexOf, letterAt, mod26,
  parseWiring, parseSetting, isReflectorWiring,
} from './alphabet'

// Wheels (static and rotating)
export type { Wheel, WheelConfig } from './wheel'
export { createWheel, createSubstitutionWheel, createRotatingWheel } from './wheel'

// Machine (plugboard, three rotors, reflector)
export type {
  Machine, MachineConfig, MachineEvent,
  RotorSettings, RotorPositions,
} from './machine'
export { createMachine, createMachineFromWirings } from './machine'
