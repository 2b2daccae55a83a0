/**
 * Field Resolution
 *
 * Finds a field by name on a TypeDescriptor, breaking visibility when asked.
 *
 * Lookup priority:
 *   1. fields declared on the type itself, any visibility
 *   2. fields declared on each superclass, nearest first
 *   3. public fields declared on any implemented interface
 *
 * A non-public field is skipped unless access is forced, and the walk carries
 * on to the next superclass. The interface search runs over the whole
 * hierarchy so that a public interface field hidden behind a non-public
 * superclass field can still be found. Two interfaces declaring the same
 * name cannot be ranked against each other and are reported as ambiguous.
 */

import { AmbiguousMemberError } from './errors'
import { getAllInterfaces } from './class-hierarchy'
import { formatMessage } from './strings'
import { describeType, type FieldDescriptor, type TypeDescriptor } from './type-descriptor'
import { notBlank, notNull } from './validate'

export { AmbiguousMemberError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type FieldLookup =
  | { readonly kind: 'found'; readonly field: FieldDescriptor }
  | { readonly kind: 'not-found' }
  | { readonly kind: 'ambiguous'; readonly candidates: readonly FieldDescriptor[] }

const NOT_FOUND: FieldLookup = Object.freeze({ kind: 'not-found' })

// ============================================================================
// Helpers
// ============================================================================

function findDeclared(type: TypeDescriptor, fieldName: string): FieldDescriptor | undefined {
  return type.fields.find((f) => f.name === fieldName)
}

function isPublic(field: FieldDescriptor): boolean {
  return field.visibility === 'public'
}

function withAccess(field: FieldDescriptor): FieldDescriptor {
  return Object.freeze({ ...field, accessible: true })
}

function checkArguments(
  type: TypeDescriptor | null | undefined,
  fieldName: string | null | undefined
): [TypeDescriptor, string] {
  return [
    notNull(type, 'The class must not be null'),
    notBlank(fieldName, 'The field name must not be blank/empty'),
  ]
}

// ============================================================================
// Lookup
// ============================================================================

function search(cls: TypeDescriptor, name: string, forceAccess: boolean): FieldLookup {
  for (let current: TypeDescriptor | null = cls; current; current = current.superclass) {
    const field = findDeclared(current, name)
    if (!field) continue
    if (!isPublic(field)) {
      if (!forceAccess) continue
      return { kind: 'found', field: withAccess(field) }
    }
    return { kind: 'found', field }
  }

  const candidates: FieldDescriptor[] = []
  for (const iface of getAllInterfaces(cls) ?? []) {
    const field = findDeclared(iface, name)
    if (field && isPublic(field)) candidates.push(field)
  }

  const [only] = candidates
  if (!only) return NOT_FOUND
  if (candidates.length === 1) return { kind: 'found', field: only }
  return { kind: 'ambiguous', candidates }
}

export function lookupField(
  type: TypeDescriptor | null | undefined,
  fieldName: string | null | undefined,
  forceAccess: boolean
): FieldLookup {
  const [cls, name] = checkArguments(type, fieldName)
  return search(cls, name, forceAccess)
}

/**
 * Gets a field by name, considering superclasses and then interfaces.
 *
 * @param forceAccess - match non-public fields too; `false` only matches public ones
 * @returns the field, or null when no type in the hierarchy declares it
 * @throws InvalidArgumentError if the type is absent or the name is blank
 * @throws AmbiguousMemberError if two or more implemented interfaces declare the name
 */
export function getField(
  type: TypeDescriptor | null | undefined,
  fieldName: string | null | undefined,
  forceAccess = false
): FieldDescriptor | null {
  const [cls, name] = checkArguments(type, fieldName)
  const lookup = search(cls, name, forceAccess)
  switch (lookup.kind) {
    case 'found':
      return lookup.field
    case 'not-found':
      return null
    case 'ambiguous': {
      const typeName = describeType(cls)
      throw new AmbiguousMemberError(
        formatMessage(
          'Reference to field %s is ambiguous relative to %s; ' +
            'a matching field exists on two or more implemented interfaces.',
          name,
          typeName
        ),
        name,
        typeName,
        lookup.candidates
      )
    }
  }
}

export { getField as resolveField }

/** Gets a field declared on `type` itself, ignoring superclasses and interfaces */
export function getDeclaredField(
  type: TypeDescriptor | null | undefined,
  fieldName: string | null | undefined,
  forceAccess = false
): FieldDescriptor | null {
  const [cls, name] = checkArguments(type, fieldName)
  const field = findDeclared(cls, name)
  if (!field) return null
  if (isPublic(field)) return field
  return forceAccess ? withAccess(field) : null
}

/** Every field declared on `type` and its superclasses, most-derived first */
export function getAllFields(type: TypeDescriptor | null | undefined): FieldDescriptor[] {
  const cls = notNull(type, 'The class must not be null')
  const fields: FieldDescriptor[] = []
  for (let current: TypeDescriptor | null = cls; current; current = current.superclass) {
    fields.push(...current.fields)
  }
  return fields
}

// ============================================================================
// Access
// ============================================================================

function accessibleField(
  type: TypeDescriptor,
  fieldName: string,
  forceAccess: boolean
): FieldDescriptor & { readonly accessor: NonNullable<FieldDescriptor['accessor']> } {
  const field = notNull(
    getField(type, fieldName, forceAccess),
    'Cannot locate field %s on %s',
    fieldName,
    describeType(type)
  )
  const accessor = notNull(
    field.accessor,
    'Field %s on %s has no accessor',
    fieldName,
    describeType(field.declaringType)
  )
  return { ...field, accessor }
}

/** Reads the value of the named field from `target` through its accessor */
export function readField(
  target: object | null | undefined,
  type: TypeDescriptor,
  fieldName: string,
  forceAccess = false
): unknown {
  const instance = notNull(target, 'The target object must not be null')
  return accessibleField(type, fieldName, forceAccess).accessor.get(instance)
}

/** Writes `value` to the named field of `target` through its accessor */
export function writeField(
  target: object | null | undefined,
  type: TypeDescriptor,
  fieldName: string,
  value: unknown,
  forceAccess = false
): void {
  const instance = notNull(target, 'The target object must not be null')
  const field = accessibleField(type, fieldName, forceAccess)
  const set = notNull(
    field.accessor.set,
    'Field %s on %s is read-only',
    fieldName,
    describeType(field.declaringType)
  )
  set.call(field.accessor, instance, value)
}
