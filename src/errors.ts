/**
 * Consolidated error system for the rotor machine.
 *
 * All error classes extend RotorMachineError, which carries a typed error code.
 * Configuration problems surface at construction; a lookup miss afterwards is
 * an internal-consistency failure, never a user error.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const RotorMachineErrorCode = {
  // Construction
  INVALID_WIRING: 'INVALID_WIRING',
  INVALID_SETTING: 'INVALID_SETTING',

  // Signal path
  INTERNAL_CONSISTENCY: 'INTERNAL_CONSISTENCY',
} as const

export type RotorMachineErrorCode = (typeof RotorMachineErrorCode)[keyof typeof RotorMachineErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class RotorMachineError extends Error {
  readonly code: RotorMachineErrorCode

  constructor(code: RotorMachineErrorCode, message: string) {
    super(message)
    this.name = 'RotorMachineError'
    this.code = code
  }
}

// ============================================================================
// Construction Errors
// ============================================================================

export class InvalidWiringError extends RotorMachineError {
  constructor(message: string) {
    super(RotorMachineErrorCode.INVALID_WIRING, message)
    this.name = 'InvalidWiringError'
  }
}

export class InvalidSettingError extends RotorMachineError {
  constructor(message: string) {
    super(RotorMachineErrorCode.INVALID_SETTING, message)
    this.name = 'InvalidSettingError'
  }
}

// ============================================================================
// Signal Path Errors
// ============================================================================

export class InternalConsistencyError extends RotorMachineError {
  constructor(message: string) {
    super(RotorMachineErrorCode.INTERNAL_CONSISTENCY, message)
    this.name = 'InternalConsistencyError'
  }
}
