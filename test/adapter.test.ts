import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { coerceTo, createBindingAdapter, formatValue } from '../src/adapter'
import { applyBindings } from '../src/bindings'
import { compileBinding } from '../src/compiler'
import { configure, resetConfig } from '../src/config'
import { createCollectionView, createModel } from '../src/model'
import { Button, CheckBox, Label, TextBox } from '../src/widgets'
import { createTestLogger } from './support'

let logger = createTestLogger()

beforeEach(() => {
  logger = createTestLogger()
  configure({ logger })
})

afterEach(() => {
  resetConfig()
})

describe('Value Formatting', () => {
  it('should substitute the value', () => {
    expect(formatValue('Running time: {0}', 12)).toBe('Running time: 12')
  })

  it('should apply fixed decimals to numbers', () => {
    expect(formatValue('{0:F2} s', 1.5)).toBe('1.50 s')
  })

  it('should unescape doubled braces', () => {
    expect(formatValue('{{{0}}}', 'x')).toBe('{x}')
  })

  it('should render null as empty text', () => {
    expect(formatValue('[{0}]', null)).toBe('[]')
  })
})

describe('Value Coercion', () => {
  it('should convert to the kind of the sample', () => {
    expect(coerceTo('', 42)).toBe('42')
    expect(coerceTo(0, '42')).toBe(42)
    expect(coerceTo(false, 'true')).toBe(true)
    expect(coerceTo({}, 'kept')).toBe('kept')
  })

  it('should refuse text that is not a number', () => {
    expect(() => coerceTo(0, 'abc')).toThrow('"abc" is not a number')
    expect(() => coerceTo(0, '  ')).toThrow(TypeError)
  })
})

describe('Binding Adapter', () => {
  describe('Source to Target', () => {
    it('should push formatted values to a label', () => {
      const model = createModel({ elapsed: 5 })
      const label = new Label()
      applyBindings(model, "label.text = format('Running time: {0}', model.elapsed)", { label })

      expect(label.text).toBe('Running time: 5')
      model.elapsed = 6
      expect(label.text).toBe('Running time: 6')
    })

    it('should follow replaced intermediate objects', () => {
      const model = createModel({ customer: createModel({ name: 'Ada' }) })
      const label = new Label()
      applyBindings(model, 'label.text = model.customer.name', { label })
      expect(label.text).toBe('Ada')

      model.customer.name = 'Grace'
      expect(label.text).toBe('Grace')

      const previous = model.customer
      model.customer = createModel({ name: 'Linus' })
      expect(label.text).toBe('Linus')

      previous.name = 'Barbara'
      expect(label.text).toBe('Linus')
    })

    it('should follow the current item of a collection', () => {
      const people = createCollectionView([{ name: 'Ada' }, { name: 'Grace' }])
      const model = createModel({ people })
      const label = new Label()
      applyBindings(model, 'label.text = model.people.currentItem.name', { label })
      expect(label.text).toBe('Ada')

      people.moveCurrentTo(1)
      expect(label.text).toBe('Grace')
    })

    it('should use the fallback value when the path does not resolve', () => {
      const model = createModel({ name: 'Ada' })
      const label = new Label()
      applyBindings(model, "label.text = withOptions(model.nickname, { fallbackValue: 'n/a' })", { label })
      expect(label.text).toBe('n/a')
    })

    it('should use the null value for null sources', () => {
      const model = createModel<{ nickname: string | null }>({ nickname: null })
      const label = new Label()
      applyBindings(model, "label.text = withOptions(model.nickname, { nullValue: '(none)' })", { label })
      expect(label.text).toBe('(none)')

      model.nickname = 'Ace'
      expect(label.text).toBe('Ace')
    })

    it('should apply one-way converters', () => {
      const model = createModel({ name: 'ada' })
      const label = new Label()
      const toUpper = (value: unknown) => String(value).toUpperCase()
      applyBindings(model, 'label.text = toUpper(model.name)', { label, toUpper })
      expect(label.text).toBe('ADA')
    })

    it('should not write back one-way bindings', () => {
      const model = createModel({ canSave: false })
      const save = new Button()
      applyBindings(model, "save.isEnabled = withOptions(model.canSave, { mode: 'OneWay' })", { save })
      expect(save.isEnabled).toBe(false)

      save.isEnabled = true
      expect(model.canSave).toBe(false)
    })

    it('should push again on refresh', () => {
      const model = { title: 'plain object' }
      const label = new Label()
      const handle = createBindingAdapter(model).installBinding(label, 'text', compileBinding('model.title'))
      model.title = 'changed silently'
      expect(label.text).toBe('plain object')

      handle.refresh()
      expect(label.text).toBe('changed silently')
    })
  })

  describe('Target to Source', () => {
    it('should write text box edits back when committed', () => {
      const model = createModel({ name: 'Ada' })
      const box = new TextBox()
      applyBindings(model, 'box.text = model.name', { box })
      expect(box.text).toBe('Ada')

      box.text = 'Grace'
      expect(model.name).toBe('Ada')
      box.commit()
      expect(model.name).toBe('Grace')
    })

    it('should write every edit with the onEveryChange trigger', () => {
      const model = createModel({ name: '' })
      const box = new TextBox()
      applyBindings(model, "box.text = withOptions(model.name, { updateTrigger: 'onEveryChange' })", { box })

      box.text = 'G'
      expect(model.name).toBe('G')
    })

    it('should convert edited text to the source field kind', () => {
      const model = createModel({ age: 30 })
      const box = new TextBox()
      applyBindings(model, 'box.text = model.age', { box })
      expect(box.text).toBe('30')

      box.enter('31')
      expect(model.age).toBe(31)
    })

    it('should write checkbox changes immediately', () => {
      const model = createModel({ done: false })
      const check = new CheckBox()
      applyBindings(model, 'check.isChecked = model.done', { check })

      check.isChecked = true
      expect(model.done).toBe(true)
    })

    it('should convert back through a two-way converter', () => {
      const model = createModel({ temperature: 100 })
      const box = new TextBox()
      const celsius = {
        convert: (value: unknown) => (Number(value) * 9) / 5 + 32,
        convertBack: (value: unknown) => ((Number(value) - 32) * 5) / 9
      }
      applyBindings(model, 'box.text = convert(celsius, model.temperature)', { box, celsius })
      expect(box.text).toBe('212')

      box.enter('50')
      expect(model.temperature).toBe(10)
    })

    it('should pull from the target on install for one-way-to-source bindings', () => {
      const model = createModel({ draft: 'unsaved' })
      const box = new TextBox()
      box.enter('hello')
      applyBindings(model, "box.text = withOptions(model.draft, { mode: 'OneWayToSource' })", { box })
      expect(model.draft).toBe('hello')

      model.draft = 'reset'
      expect(box.text).toBe('hello')
    })
  })

  describe('Validation', () => {
    it('should record conversion failures instead of throwing', () => {
      const model = createModel({ age: 30 })
      const box = new TextBox()
      const [handle] = applyBindings(model, 'box.text = model.age', { box }).installed

      box.enter('abc')
      expect(model.age).toBe(30)
      expect(handle.errors).toEqual(['"abc" is not a number'])

      box.enter('40')
      expect(model.age).toBe(40)
      expect(handle.errors).toEqual([])
    })

    it('should throw conversion failures when validation on exceptions is off', () => {
      const model = createModel({ age: 30 })
      const box = new TextBox()
      applyBindings(model, 'box.text = withOptions(model.age, { validatesOnExceptions: false })', { box })

      expect(() => box.enter('abc')).toThrow(TypeError)
    })

    it('should report data errors of the source', () => {
      const model = createModel(
        { age: 30 },
        { validate: { age: value => (value < 0 ? 'must not be negative' : undefined) } }
      )
      const box = new TextBox()
      const [handle] = applyBindings(model, 'box.text = model.age', { box }).installed

      box.enter('-1')
      expect(model.age).toBe(-1)
      expect(handle.errors).toEqual(['must not be negative'])
    })
  })

  describe('Disposal', () => {
    it('should stop both directions once disposed', () => {
      const model = createModel({ name: 'Ada' })
      const box = new TextBox()
      const report = applyBindings(model, 'box.text = model.name', { box })
      report.dispose()

      model.name = 'Grace'
      expect(box.text).toBe('Ada')
      box.enter('Linus')
      expect(model.name).toBe('Grace')
    })

    it('should dispose every binding of an adapter', () => {
      const model = createModel({ a: 'a', b: 'b' })
      const first = new Label()
      const second = new Label()
      const adapter = createBindingAdapter(model)
      applyBindings(model, 'first.text = model.a; second.text = model.b', { first, second }, { adapter })
      adapter.dispose()

      model.a = 'x'
      model.b = 'y'
      expect([first.text, second.text]).toEqual(['a', 'b'])
    })
  })
})

describe('Binding Batches', () => {
  it('should bind the statements that compile and report the others', () => {
    const model = createModel({ total: 10, name: 'Ada' })
    const total = new Label()
    const name = new TextBox()
    const report = applyBindings(
      model,
      `total.text = format('Total: {0}', model.total);
       name.text = model.name.trim().toUpperCase();
       name.text = model.name;`,
      { total, name }
    )

    expect(report.installed).toHaveLength(2)
    expect(report.failed.map(failure => failure.text)).toEqual(['name.text = model.name.trim().toUpperCase()'])
    expect(total.text).toBe('Total: 10')
    expect(name.text).toBe('Ada')
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('should throw an aggregate error in strict mode', () => {
    const model = createModel({ name: 'Ada' })
    expect(() => applyBindings(model, 'missing.text = model.name', {}, { strict: true })).toThrow(AggregateError)
  })

  it('should apply a different source name', () => {
    const vm = createModel({ title: 'Report' })
    const label = new Label()
    applyBindings(vm, 'label.text = vm.title', { label }, { sourceName: 'vm' })
    expect(label.text).toBe('Report')
  })
})
