import { describe, it, expect, afterEach } from 'vitest'
import { compileBinding, compileBindings, BINDING_RULES } from '../src/compiler'
import { configure, resetConfig } from '../src/config'
import { BindingSyntaxError, MarkerInvocationError, UnsupportedExpressionShapeError } from '../src/errors'
import { format, nullable, withOptions } from '../src/markers'
import { Label, TextBox } from '../src/widgets'

const celsius = {
  convert: (value: unknown) => (Number(value) * 9) / 5 + 32,
  convertBack: (value: unknown) => ((Number(value) - 32) * 5) / 9
}

const toUpper = (value: unknown) => String(value).toUpperCase()
const double = (value: unknown) => Number(value) * 2
const addOne = (value: unknown) => Number(value) + 1

afterEach(() => {
  resetConfig()
})

describe('Binding Compiler', () => {
  describe('Paths', () => {
    it('should compile a member chain with default settings', () => {
      expect(compileBinding('model.a.b.c')).toEqual({
        path: 'a.b.c',
        segments: [
          { kind: 'property', name: 'a' },
          { kind: 'property', name: 'b' },
          { kind: 'property', name: 'c' }
        ],
        mode: 'TwoWay',
        updateTrigger: 'default',
        validatesOnDataErrors: true,
        validatesOnExceptions: true
      })
    })

    it('should compile current-item paths', () => {
      expect(compileBinding('model.items.currentItem.name').path).toBe('items/name')
      expect(compileBinding('model.items.currentItem').path).toBe('items/')
    })

    it('should only accept chains rooted at the source name', () => {
      expect(compileBinding('vm.total', { sourceName: 'vm' }).path).toBe('total')
      expect(() => compileBinding('model.total', { sourceName: 'vm' })).toThrow(UnsupportedExpressionShapeError)
    })

    it('should freeze the descriptor', () => {
      const descriptor = compileBinding('model.name')
      expect(Object.isFrozen(descriptor)).toBe(true)
      expect(Object.isFrozen(descriptor.segments)).toBe(true)
    })

    it('should follow the configured default mode', () => {
      configure({ defaultMode: 'OneWay' })
      expect(compileBinding('model.name').mode).toBe('OneWay')
    })
  })

  describe('Coercions and Shims', () => {
    it.each(['Number(model.count)', 'Boolean(model.count)', '+model.count'])(
      'should drop the coercion in %s',
      source => {
        const descriptor = compileBinding(source)
        expect(descriptor.path).toBe('count')
        expect(descriptor.mode).toBe('TwoWay')
        expect(descriptor.converter).toBeUndefined()
      }
    )

    it.each(['String(model.count)', 'model.count.toString()', '`${model.count}`'])(
      'should drop the stringification in %s',
      source => {
        expect(compileBinding(source).path).toBe('count')
      }
    )

    it.each(['nullable(model.age)', 'model.age ?? null', 'model.age ?? undefined'])(
      'should drop the nullable shim in %s',
      source => {
        expect(compileBinding(source).path).toBe('age')
      }
    )

    it('should not drop a coercion the scope redefines', () => {
      const scope = { Number: double }
      const descriptor = compileBinding('Number(model.count)', { scope })
      expect(descriptor.mode).toBe('OneWay')
      expect(descriptor.converter?.convert(4)).toBe(8)
    })

    it('should reject a fallback that is not null or undefined', () => {
      expect(() => compileBinding("model.name ?? 'anonymous'")).toThrow(UnsupportedExpressionShapeError)
    })
  })

  describe('Format', () => {
    it('should compile a format marker into a one-way binding', () => {
      expect(compileBinding("format('Running time: {0}', model.elapsed)")).toEqual({
        path: 'elapsed',
        segments: [{ kind: 'property', name: 'elapsed' }],
        format: 'Running time: {0}',
        mode: 'OneWay',
        updateTrigger: 'default',
        validatesOnDataErrors: true,
        validatesOnExceptions: true
      })
    })

    it('should only accept a literal pattern', () => {
      expect(() => compileBinding('format(pattern, model.elapsed)', { scope: { pattern: '{0}' } })).toThrow(
        UnsupportedExpressionShapeError
      )
    })

    it('should combine with a stringified path', () => {
      const descriptor = compileBinding("format('{0} items', String(model.count))")
      expect(descriptor.path).toBe('count')
      expect(descriptor.format).toBe('{0} items')
    })
  })

  describe('Converters', () => {
    it('should use a scope function as a one-way converter', () => {
      const descriptor = compileBinding('toUpper(model.name)', { scope: { toUpper } })
      expect(descriptor.mode).toBe('OneWay')
      expect(descriptor.converter?.convert('ada')).toBe('ADA')
      expect(descriptor.converter?.convertBack).toBeUndefined()
    })

    it('should compose nested one-way converters from the inside out', () => {
      const descriptor = compileBinding('addOne(double(model.n))', { scope: { addOne, double } })
      expect(descriptor.path).toBe('n')
      expect(descriptor.converter?.convert(3)).toBe(7)
    })

    it('should refuse a two-way binding through a one-way converter', () => {
      expect(() =>
        compileBinding('toUpper(model.name)', { scope: { toUpper }, options: { mode: 'TwoWay' } })
      ).toThrow(UnsupportedExpressionShapeError)
    })

    it('should not treat methods of the model as converters', () => {
      expect(() => compileBinding('model.describe(model.name)')).toThrow(UnsupportedExpressionShapeError)
    })

    it('should attach a two-way converter', () => {
      const descriptor = compileBinding('convert(celsius, model.temperature)', { scope: { celsius } })
      expect(descriptor.mode).toBe('TwoWay')
      expect(descriptor.converter).toBe(celsius)
    })

    it('should apply a two-way converter after an inner one-way converter', () => {
      const hash = { convert: (value: unknown) => `#${String(value)}`, convertBack: (value: unknown) => value }
      const descriptor = compileBinding('convert(hash, double(model.x))', { scope: { hash, double } })

      expect(descriptor.mode).toBe('OneWay')
      expect(descriptor.converter?.convert(5)).toBe('#10')
      expect(descriptor.converter?.convertBack).toBeUndefined()
    })

    it('should refuse convert with a converter lacking convertBack', () => {
      const scope = { oneWay: { convert: toUpper } }
      expect(() => compileBinding('convert(oneWay, model.name)', { scope })).toThrow(UnsupportedExpressionShapeError)
    })
  })

  describe('Options', () => {
    it('should read inline options', () => {
      const descriptor = compileBinding(
        "withOptions(model.name, { mode: 'OneWay', updateTrigger: 'onEveryChange', fallbackValue: 'n/a' })"
      )
      expect(descriptor.mode).toBe('OneWay')
      expect(descriptor.updateTrigger).toBe('onEveryChange')
      expect(descriptor.fallbackValue).toBe('n/a')
      expect('nullValue' in descriptor).toBe(false)
    })

    it('should read options from the scope', () => {
      const scope = { live: { updateTrigger: 'onEveryChange', validatesOnExceptions: false } }
      const descriptor = compileBinding('withOptions(model.name, live)', { scope })
      expect(descriptor.updateTrigger).toBe('onEveryChange')
      expect(descriptor.validatesOnExceptions).toBe(false)
    })

    it('should let statement options win over caller options', () => {
      const descriptor = compileBinding("withOptions(model.name, { mode: 'OneWayToSource' })", {
        options: { mode: 'OneWay', nullValue: '-' }
      })
      expect(descriptor.mode).toBe('OneWayToSource')
      expect(descriptor.nullValue).toBe('-')
    })

    it('should reject unknown option names', () => {
      expect(() => compileBinding('withOptions(model.name, { colour: 1 })')).toThrow(UnsupportedExpressionShapeError)
    })

    it('should reject invalid option values', () => {
      expect(() => compileBinding("withOptions(model.name, { mode: 'Sideways' })")).toThrow(
        UnsupportedExpressionShapeError
      )
    })
  })

  describe('Determinism', () => {
    it('should compile the same expression to equal descriptors', () => {
      const scope = { toUpper }
      const source = "withOptions(toUpper(model.items.currentItem.name), { nullValue: '' })"
      expect(compileBinding(source, { scope })).toEqual(compileBinding(source, { scope }))
    })

    it('should run the rules in a fixed order', () => {
      expect(BINDING_RULES.map(rule => rule.name)).toEqual([
        'path',
        'coercion',
        'stringify',
        'nullable',
        'format',
        'unary-converter',
        'two-way-converter',
        'options'
      ])
    })
  })

  describe('Unsupported Shapes', () => {
    it('should reject chained calls', () => {
      const source = 'model.name.trim().toUpperCase()'
      let thrown: unknown
      try {
        compileBinding(source)
      } catch (error) {
        thrown = error
      }
      expect(thrown).toBeInstanceOf(UnsupportedExpressionShapeError)
      expect(thrown instanceof UnsupportedExpressionShapeError && thrown.text).toBe(source)
    })

    it('should reject arithmetic', () => {
      expect(() => compileBinding('model.x + model.y')).toThrow(
        '[statewire] Unsupported binding expression `model.x + model.y`'
      )
    })

    it('should report unparsable input as a syntax error', () => {
      expect(() => compileBinding('model.')).toThrow(BindingSyntaxError)
      expect(() => compileBinding('model.a model.b')).toThrow(BindingSyntaxError)
    })
  })

  describe('Markers', () => {
    it('should throw when a marker is called at run time', () => {
      expect(() => format('{0}', 1)).toThrow(MarkerInvocationError)
      expect(() => nullable(1)).toThrow(MarkerInvocationError)
      expect(() => withOptions(1, {})).toThrow(MarkerInvocationError)
    })
  })
})

describe('Binding Batches', () => {
  it('should compile each statement independently', () => {
    const total = new Label()
    const name = new TextBox()
    const results = compileBindings(
      `
      total.text = format('Total: {0}', model.total);
      name.text = model.name.trim().toUpperCase();
      missing.text = model.name;
      name.text = model.name
      `,
      { scope: { total, name } }
    )

    expect(results.map(result => result.ok)).toEqual([true, false, false, true])

    const [first, second, third, fourth] = results
    expect(first.ok && first.binding.target).toBe(total)
    expect(first.ok && first.binding.property).toBe('text')
    expect(first.ok && first.binding.descriptor.format).toBe('Total: {0}')
    expect(second.ok ? undefined : second.error).toBeInstanceOf(UnsupportedExpressionShapeError)
    expect(second.ok ? undefined : second.text).toBe('name.text = model.name.trim().toUpperCase()')
    expect(third.ok ? undefined : third.error.name).toBe('AmbiguousOrMissingTargetError')
    expect(fourth.ok && fourth.binding.descriptor.path).toBe('name')
  })

  it('should reject statements that are not assignments', () => {
    const [result] = compileBindings('model.name', { scope: {} })
    expect(result.ok).toBe(false)
    expect(result.ok ? undefined : result.error).toBeInstanceOf(UnsupportedExpressionShapeError)
  })

  it('should fail the whole batch on a syntax error', () => {
    expect(() => compileBindings('label.text = ', { scope: {} })).toThrow(BindingSyntaxError)
  })
})
