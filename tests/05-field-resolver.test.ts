/**
 * Segment 05: Field Resolution Tests
 *
 * Superclass walk with visibility handling, interface fallback,
 * ambiguity detection and accessor-based reads and writes.
 */

import { describe, it, expect } from 'vitest'
import {
  lookupField,
  getField,
  resolveField,
  getDeclaredField,
  getAllFields,
  readField,
  writeField,
  AmbiguousMemberError,
} from '../src/field-resolver'
import { defineClass, defineInterface } from '../src/type-descriptor'
import { InvalidArgumentError } from '../src/errors'

// ============================================================================
// Fixtures
// ============================================================================

const named = defineInterface({ name: 'Named', fields: ['NAME'] })
const labelled = defineInterface({ name: 'Labelled', fields: ['y'] })
const tagged = defineInterface({ name: 'Tagged', fields: ['y'] })

const parent = defineClass({
  name: 'Parent',
  fields: [
    { name: 'value', visibility: 'public' },
    { name: 'NAME', visibility: 'private' },
  ],
})
const child = defineClass({
  name: 'Child',
  superclass: parent,
  interfaces: [named],
  fields: [{ name: 'value', visibility: 'private' }],
})

describe('Segment 05: Field Resolution', () => {
  // ========================================================================
  // Preconditions
  // ========================================================================

  describe('preconditions', () => {
    it('rejects an absent type', () => {
      expect(() => getField(null, 'x', false)).toThrow(InvalidArgumentError)
      expect(() => getField(undefined, 'x')).toThrow('The class must not be null')
    })

    it('rejects a blank field name', () => {
      expect(() => getField(parent, '', false)).toThrow(InvalidArgumentError)
      expect(() => getField(parent, '   ')).toThrow('The field name must not be blank/empty')
      expect(() => getField(parent, null)).toThrow(InvalidArgumentError)
    })

    it('applies to lookupField and getDeclaredField too', () => {
      expect(() => lookupField(null, 'x', true)).toThrow(InvalidArgumentError)
      expect(() => getDeclaredField(parent, '', true)).toThrow(InvalidArgumentError)
    })
  })

  // ========================================================================
  // Superclass walk
  // ========================================================================

  describe('superclass walk', () => {
    it('skips a private field unless access is forced', () => {
      const secret = defineClass({ name: 'Secret', fields: [{ name: 'x', visibility: 'private' }] })

      expect(getField(secret, 'x', false)).toBeNull()

      const forced = getField(secret, 'x', true)
      expect(forced?.name).toBe('x')
      expect(forced?.visibility).toBe('private')
      expect(forced?.declaringType).toBe(secret)
      expect(forced?.accessible).toBe(true)
    })

    it('forcing access returns a copy and leaves the descriptor untouched', () => {
      const declared = child.fields[0]
      const forced = getField(child, 'value', true)
      expect(forced).not.toBe(declared)
      expect(declared?.accessible).toBe(false)
    })

    it('returns a public field declared on a superclass', () => {
      const field = getField(child, 'value', false)
      expect(field).toBe(parent.fields[0])
      expect(field?.declaringType).toBe(parent)
    })

    it('prefers the nearest declaration when access is forced', () => {
      expect(getField(child, 'value', true)?.declaringType).toBe(child)
    })

    it('treats protected and package fields as non-public', () => {
      const type = defineClass({
        name: 'Mixed',
        fields: [
          { name: 'prot', visibility: 'protected' },
          'pkg',
        ],
      })
      expect(getField(type, 'prot')).toBeNull()
      expect(getField(type, 'pkg')).toBeNull()
      expect(getField(type, 'prot', true)?.accessible).toBe(true)
      expect(getField(type, 'pkg', true)?.accessible).toBe(true)
    })

    it('returns public fields without marking them accessible', () => {
      expect(getField(parent, 'value', true)).toBe(parent.fields[0])
    })
  })

  // ========================================================================
  // Interface fallback
  // ========================================================================

  describe('interface fallback', () => {
    it('finds an interface field hidden behind a private superclass field', () => {
      expect(getField(child, 'NAME', false)).toBe(named.fields[0])
    })

    it('prefers the superclass field when access is forced', () => {
      const field = getField(child, 'NAME', true)
      expect(field?.declaringType).toBe(parent)
      expect(field?.accessible).toBe(true)
    })

    it('finds an interface implemented by an ancestor', () => {
      const base = defineClass({ name: 'Base', interfaces: [named] })
      const derived = defineClass({ name: 'Derived', superclass: base })
      expect(getField(derived, 'NAME')).toBe(named.fields[0])
    })

    it('finds a field on a parent interface', () => {
      const extended = defineInterface({ name: 'Extended', extends: [named] })
      const impl = defineClass({ name: 'Impl', interfaces: [extended] })
      expect(getField(impl, 'NAME')).toBe(named.fields[0])
    })

    it('returns null when nothing declares the name', () => {
      expect(getField(child, 'missing', true)).toBeNull()
      expect(lookupField(child, 'missing', true)).toEqual({ kind: 'not-found' })
    })

    it('counts an interface reached along two paths once', () => {
      const diamond = defineInterface({ name: 'Diamond', extends: [labelled] })
      const impl = defineClass({ name: 'Impl', interfaces: [labelled, diamond] })
      expect(getField(impl, 'y')).toBe(labelled.fields[0])
    })
  })

  // ========================================================================
  // Ambiguity
  // ========================================================================

  describe('ambiguity', () => {
    const impl = defineClass({ name: 'Impl', interfaces: [labelled, tagged] })

    it('throws AmbiguousMemberError for either access flag', () => {
      expect(() => getField(impl, 'y', false)).toThrow(AmbiguousMemberError)
      expect(() => getField(impl, 'y', true)).toThrow(AmbiguousMemberError)
    })

    it('names the field and the type', () => {
      expect(() => resolveField(impl, 'y', false)).toThrow(
        'Reference to field y is ambiguous relative to class Impl; ' +
          'a matching field exists on two or more implemented interfaces.'
      )
    })

    it('carries the candidates in discovery order', () => {
      try {
        getField(impl, 'y')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(AmbiguousMemberError)
        if (err instanceof AmbiguousMemberError) {
          expect(err.code).toBe('AMBIGUOUS_MEMBER')
          expect(err.memberName).toBe('y')
          expect(err.typeName).toBe('class Impl')
          expect(err.candidates).toEqual([labelled.fields[0], tagged.fields[0]])
        }
      }
    })

    it('is reported as a tagged result by lookupField', () => {
      const lookup = lookupField(impl, 'y', false)
      expect(lookup.kind).toBe('ambiguous')
      if (lookup.kind === 'ambiguous') {
        expect(lookup.candidates.map((f) => f.declaringType.name)).toEqual(['Labelled', 'Tagged'])
      }
    })

    it('does not arise when a superclass declares a public field', () => {
      const owner = defineClass({
        name: 'Owner',
        interfaces: [labelled, tagged],
        fields: [{ name: 'y', visibility: 'public' }],
      })
      expect(getField(owner, 'y')?.declaringType).toBe(owner)
    })

    it('arises again when the superclass field is private and access is not forced', () => {
      const owner = defineClass({
        name: 'Owner',
        interfaces: [labelled, tagged],
        fields: [{ name: 'y', visibility: 'private' }],
      })
      expect(() => getField(owner, 'y', false)).toThrow(AmbiguousMemberError)
      expect(getField(owner, 'y', true)?.declaringType).toBe(owner)
    })
  })

  // ========================================================================
  // getField and lookupField
  // ========================================================================

  describe('getField agrees with lookupField', () => {
    const cases: [string, boolean][] = [
      ['value', false],
      ['value', true],
      ['NAME', false],
      ['NAME', true],
      ['missing', false],
    ]

    it.each(cases)('resolves %s (forceAccess=%s) the same way', (name, forceAccess) => {
      const lookup = lookupField(child, name, forceAccess)
      const field = getField(child, name, forceAccess)
      if (lookup.kind === 'found') expect(field).toEqual(lookup.field)
      else expect(field).toBeNull()
    })

    it('rejects the same arguments with the same messages', () => {
      expect(() => lookupField(child, ' ', false)).toThrow('The field name must not be blank/empty')
      expect(() => getField(child, ' ', false)).toThrow('The field name must not be blank/empty')
    })
  })

  // ========================================================================
  // Declared and all fields
  // ========================================================================

  describe('getDeclaredField', () => {
    it('only looks at the given type', () => {
      expect(getDeclaredField(child, 'NAME', true)).toBeNull()
      expect(getDeclaredField(parent, 'value')).toBe(parent.fields[0])
    })

    it('needs forced access for non-public fields', () => {
      expect(getDeclaredField(child, 'value')).toBeNull()
      expect(getDeclaredField(child, 'value', true)?.accessible).toBe(true)
    })
  })

  describe('getAllFields', () => {
    it('lists declared fields most-derived first', () => {
      expect(getAllFields(child).map((f) => `${f.declaringType.name}.${f.name}`)).toEqual([
        'Child.value',
        'Parent.value',
        'Parent.NAME',
      ])
    })

    it('rejects an absent type', () => {
      expect(() => getAllFields(null)).toThrow('The class must not be null')
    })
  })

  // ========================================================================
  // Reading and writing
  // ========================================================================

  describe('readField / writeField', () => {
    class AccountRecord {
      balance = 10
      label = 'main'
    }

    const account = defineClass({
      name: 'Account',
      fields: [
        {
          name: 'balance',
          visibility: 'private',
          accessor: {
            get: (target) => (target instanceof AccountRecord ? target.balance : undefined),
            set: (target, value) => {
              if (target instanceof AccountRecord && typeof value === 'number') target.balance = value
            },
          },
        },
        {
          name: 'label',
          visibility: 'public',
          accessor: { get: (target) => (target instanceof AccountRecord ? target.label : undefined) },
        },
        { name: 'opaque', visibility: 'public' },
      ],
    })

    it('reads through the accessor when access is forced', () => {
      expect(readField(new AccountRecord(), account, 'balance', true)).toBe(10)
    })

    it('cannot locate a private field without forced access', () => {
      expect(() => readField(new AccountRecord(), account, 'balance')).toThrow(
        'Cannot locate field balance on class Account'
      )
    })

    it('reads public fields without forcing', () => {
      expect(readField(new AccountRecord(), account, 'label')).toBe('main')
    })

    it('writes through the accessor', () => {
      const record = new AccountRecord()
      writeField(record, account, 'balance', 25, true)
      expect(record.balance).toBe(25)
    })

    it('rejects a field without an accessor', () => {
      expect(() => readField(new AccountRecord(), account, 'opaque')).toThrow(
        'Field opaque on class Account has no accessor'
      )
    })

    it('rejects writing a read-only field', () => {
      expect(() => writeField(new AccountRecord(), account, 'label', 'x')).toThrow(
        'Field label on class Account is read-only'
      )
    })

    it('rejects an absent target', () => {
      expect(() => readField(null, account, 'label')).toThrow('The target object must not be null')
      expect(() => writeField(undefined, account, 'label', 'x')).toThrow(InvalidArgumentError)
    })
  })
})
