/**
 * Consolidated error system for lang-kit.
 *
 * All error classes extend LangKitError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

import type { FieldDescriptor } from './type-descriptor'

// ============================================================================
// Error Codes
// ============================================================================

export const LangKitErrorCode = {
  // Date conversion
  FORMAT: 'FORMAT',

  // Argument validation
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Field resolution
  AMBIGUOUS_MEMBER: 'AMBIGUOUS_MEMBER',
} as const

export type LangKitErrorCode = (typeof LangKitErrorCode)[keyof typeof LangKitErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class LangKitError extends Error {
  readonly code: LangKitErrorCode

  constructor(code: LangKitErrorCode, message: string) {
    super(message)
    this.name = 'LangKitError'
    this.code = code
  }
}

// ============================================================================
// Date Conversion Errors
// ============================================================================

export class FormatError extends LangKitError {
  constructor(message: string) {
    super(LangKitErrorCode.FORMAT, message)
    this.name = 'FormatError'
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class InvalidArgumentError extends LangKitError {
  constructor(message: string) {
    super(LangKitErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Field Resolution Errors
// ============================================================================

export class AmbiguousMemberError extends LangKitError {
  readonly memberName: string
  readonly typeName: string
  readonly candidates: readonly FieldDescriptor[]

  constructor(
    message: string,
    memberName: string,
    typeName: string,
    candidates: readonly FieldDescriptor[]
  ) {
    super(LangKitErrorCode.AMBIGUOUS_MEMBER, message)
    this.name = 'AmbiguousMemberError'
    this.memberName = memberName
    this.typeName = typeName
    this.candidates = candidates
  }
}
