/**
 * Type Model
 *
 * Descriptors for classes, interfaces and their declared fields. The
 * runtime cannot report field visibility or implemented interfaces, so this
 * metadata is declared up front with defineClass / defineInterface and is
 * frozen once built.
 */

import { isTrue, notBlank } from './validate'

// ============================================================================
// Types
// ============================================================================

export type Visibility = 'public' | 'protected' | 'package' | 'private'

export type TypeKind = 'class' | 'interface'

export interface FieldAccessor {
  get(target: object): unknown
  set?(target: object, value: unknown): void
}

export interface FieldDescriptor {
  readonly name: string
  readonly visibility: Visibility
  readonly declaringType: TypeDescriptor
  /** Set on copies returned by a lookup that forced access */
  readonly accessible: boolean
  readonly accessor?: FieldAccessor
}

export interface TypeDescriptor {
  readonly name: string
  readonly kind: TypeKind
  /** Always null for interfaces */
  readonly superclass: TypeDescriptor | null
  /** Implemented interfaces for a class, extended interfaces for an interface */
  readonly interfaces: readonly TypeDescriptor[]
  readonly fields: readonly FieldDescriptor[]
}

export interface FieldSpec {
  name: string
  /** Defaults to 'package' */
  visibility?: Visibility
  accessor?: FieldAccessor
}

export interface ClassSpec {
  name: string
  superclass?: TypeDescriptor | null
  interfaces?: readonly TypeDescriptor[]
  fields?: readonly (string | FieldSpec)[]
}

export interface InterfaceSpec {
  name: string
  extends?: readonly TypeDescriptor[]
  /** Interface fields are always public */
  fields?: readonly (string | Omit<FieldSpec, 'visibility'>)[]
}

// ============================================================================
// Construction
// ============================================================================

function buildType(
  name: string,
  kind: TypeKind,
  superclass: TypeDescriptor | null,
  interfaces: readonly TypeDescriptor[],
  fieldSpecs: readonly FieldSpec[]
): TypeDescriptor {
  const fields: FieldDescriptor[] = []
  const type: TypeDescriptor = {
    name,
    kind,
    superclass,
    interfaces: Object.freeze([...interfaces]),
    fields,
  }

  const seen = new Set<string>()
  for (const spec of fieldSpecs) {
    const fieldName = notBlank(spec.name, 'The field name must not be blank/empty')
    isTrue(!seen.has(fieldName), 'Duplicate field %s on %s', fieldName, name)
    seen.add(fieldName)
    fields.push(Object.freeze({
      name: fieldName,
      visibility: spec.visibility ?? 'package',
      declaringType: type,
      accessible: false,
      ...(spec.accessor ? { accessor: spec.accessor } : {}),
    }))
  }

  Object.freeze(fields)
  return Object.freeze(type)
}

function toFieldSpec(field: string | FieldSpec): FieldSpec {
  return typeof field === 'string' ? { name: field } : field
}

export function defineInterface(spec: InterfaceSpec): TypeDescriptor {
  const name = notBlank(spec.name, 'The type name must not be blank/empty')
  const parents = spec.extends ?? []
  for (const parent of parents) {
    isTrue(isInterface(parent), '%s cannot extend %s', name, describeType(parent))
  }
  const fields = (spec.fields ?? []).map((f) => ({
    ...toFieldSpec(f),
    visibility: 'public' as const,
  }))
  return buildType(name, 'interface', null, parents, fields)
}

export function defineClass(spec: ClassSpec): TypeDescriptor {
  const name = notBlank(spec.name, 'The type name must not be blank/empty')
  const superclass = spec.superclass ?? null
  if (superclass) {
    isTrue(!isInterface(superclass), '%s cannot extend %s', name, describeType(superclass))
  }
  const interfaces = spec.interfaces ?? []
  for (const iface of interfaces) {
    isTrue(isInterface(iface), '%s cannot implement %s', name, describeType(iface))
  }
  return buildType(name, 'class', superclass, interfaces, (spec.fields ?? []).map(toFieldSpec))
}

// ============================================================================
// Queries
// ============================================================================

export function isInterface(type: TypeDescriptor): boolean {
  return type.kind === 'interface'
}

/** Renders a type for messages, e.g. `class Order` or `interface Named` */
export function describeType(type: TypeDescriptor): string {
  return `${type.kind} ${type.name}`
}
