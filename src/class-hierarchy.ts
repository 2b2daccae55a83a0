/**
 * Class Hierarchy Inspection
 *
 * Walks superclass links and interface declarations of a TypeDescriptor.
 * Absent input yields null rather than an error.
 */

import type { TypeDescriptor } from './type-descriptor'

/**
 * Gets every interface implemented by `type` and its superclasses.
 *
 * The order follows each declared interface in turn and its own parent
 * interfaces, then moves on to the superclass. A later duplicate is dropped,
 * so each interface keeps the position where it was first reached.
 */
export function getAllInterfaces(type: TypeDescriptor | null | undefined): TypeDescriptor[] | null {
  if (!type) return null

  const found = new Set<TypeDescriptor>()
  collectInterfaces(type, found)
  return [...found]
}

function collectInterfaces(type: TypeDescriptor, found: Set<TypeDescriptor>): void {
  for (let current: TypeDescriptor | null = type; current; current = current.superclass) {
    for (const iface of current.interfaces) {
      if (!found.has(iface)) {
        found.add(iface)
        collectInterfaces(iface, found)
      }
    }
  }
}

/** Superclass chain of `type`, nearest first, excluding `type` itself */
export function getAllSuperclasses(type: TypeDescriptor | null | undefined): TypeDescriptor[] | null {
  if (!type) return null

  const superclasses: TypeDescriptor[] = []
  for (let current = type.superclass; current; current = current.superclass) {
    superclasses.push(current)
  }
  return superclasses
}

/** Whether a value of `type` can be used where `target` is expected */
export function isAssignable(
  type: TypeDescriptor | null | undefined,
  target: TypeDescriptor | null | undefined
): boolean {
  if (!type || !target) return false
  if (type === target) return true
  if (target.kind === 'interface') {
    return getAllInterfaces(type)?.includes(target) ?? false
  }
  return getAllSuperclasses(type)?.includes(target) ?? false
}
