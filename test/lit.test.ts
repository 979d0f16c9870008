// @vitest-environment happy-dom
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { html } from 'lit-html'
import { configure, resetConfig } from '../src/config'
import { createController, syncHandler } from '../src/dispatch'
import { createLitView, fromDomEvent } from '../src/lit'
import { createModel } from '../src/model'
import { start } from '../src/mvc'
import { createTestLogger } from './support'

interface Profile {
  name: string
  age: number
  saves: number
}

type ProfileEvent = { type: 'save' }

let container: HTMLElement

function createProfileView(bindings: string) {
  return createLitView<Profile, ProfileEvent>(container, {
    template: send => html`
      <input id="name" />
      <input id="age" type="number" />
      <span id="greeting"></span>
      <span id="saves"></span>
      <button id="save" @click=${() => send({ type: 'save' })}>Save</button>
    `,
    bindings,
    eventTypes: ['save']
  })
}

function inputById(id: string): HTMLInputElement {
  const element = container.querySelector(`#${id}`)
  if (!(element instanceof HTMLInputElement)) throw new Error(`no input #${id}`)
  return element
}

function elementById(id: string): HTMLElement {
  const element = container.querySelector(`#${id}`)
  if (!(element instanceof HTMLElement)) throw new Error(`no element #${id}`)
  return element
}

beforeEach(() => {
  configure({ logger: createTestLogger(), onUnhandledError: vi.fn() })
  container = document.createElement('div')
  document.body.appendChild(container)
})

afterEach(() => {
  container.remove()
  resetConfig()
})

describe('lit-html Views', () => {
  it('should render the template and find elements by id', () => {
    const view = createProfileView('')

    expect(Object.keys(view.elements())).toEqual(['name', 'age', 'greeting', 'saves', 'save'])
  })

  it('should push model values into elements', () => {
    const view = createProfileView(`
      name.value = model.name;
      age.value = model.age;
      greeting.textContent = format('Hello, {0}!', model.name);
    `)
    const model = createModel<Profile>({ name: 'Ada', age: 36, saves: 0 })

    const report = view.setBindings(model)

    expect(report.failed).toEqual([])
    expect(inputById('name').value).toBe('Ada')
    expect(inputById('age').value).toBe('36')
    expect(elementById('greeting').textContent).toBe('Hello, Ada!')
  })

  it('should write back to the model when an input changes', () => {
    const view = createProfileView(`
      name.value = model.name;
      age.value = model.age;
      greeting.textContent = format('Hello, {0}!', model.name);
    `)
    const model = createModel<Profile>({ name: 'Ada', age: 36, saves: 0 })
    view.setBindings(model)

    const name = inputById('name')
    name.value = 'Grace'
    name.dispatchEvent(new Event('change'))
    const age = inputById('age')
    age.value = '45'
    age.dispatchEvent(new Event('change'))

    expect(model.name).toBe('Grace')
    expect(model.age).toBe(45)
    expect(elementById('greeting').textContent).toBe('Hello, Grace!')
  })

  it('should wait for change unless the binding updates on every input', () => {
    const view = createProfileView(`
      name.value = model.name;
      age.value = withOptions(model.age, { updateTrigger: 'onEveryChange' });
    `)
    const model = createModel<Profile>({ name: 'Ada', age: 36, saves: 0 })
    view.setBindings(model)

    const name = inputById('name')
    name.value = 'Grace'
    name.dispatchEvent(new Event('input'))
    const age = inputById('age')
    age.value = '37'
    age.dispatchEvent(new Event('input'))

    expect(model.name).toBe('Ada')
    expect(model.age).toBe(37)
  })

  it('should stop updating elements once the bindings are disposed', () => {
    const view = createProfileView('name.value = model.name')
    const model = createModel<Profile>({ name: 'Ada', age: 36, saves: 0 })
    const report = view.setBindings(model)

    report.dispose()
    model.name = 'Grace'

    expect(inputById('name').value).toBe('Ada')
  })

  it('should raise domain events from template listeners', () => {
    const view = createProfileView('')
    const received: ProfileEvent[] = []
    view.events.subscribe(event => received.push(event))

    elementById('save').click()

    expect(received).toEqual([{ type: 'save' }])
  })

  it('should clear the container when destroyed', () => {
    const view = createProfileView('')
    view.destroy()

    expect(container.querySelector('input')).toBeNull()
  })

  it('should run a component end to end', () => {
    const view = createProfileView(`
      name.value = model.name;
      saves.textContent = format('Saved {0} times', model.saves);
    `)
    const controller = createController<Profile, ProfileEvent>(
      model => {
        model.saves = 0
      },
      {
        save: () =>
          syncHandler(model => {
            model.saves += 1
          })
      }
    )
    const model = createModel<Profile>({ name: 'Ada', age: 36, saves: 5 })
    start<Profile, ProfileEvent>(model, { view, controller })

    expect(elementById('saves').textContent).toBe('Saved 0 times')
    elementById('save').click()
    elementById('save').click()

    expect(model.saves).toBe(2)
    expect(elementById('saves').textContent).toBe('Saved 2 times')
  })
})

describe('DOM Events', () => {
  it('should map DOM events to domain events while subscribed', () => {
    const button = document.createElement('button')
    const received: ProfileEvent[] = []
    const unsubscribe = fromDomEvent(button, 'click', (): ProfileEvent => ({ type: 'save' })).subscribe(event =>
      received.push(event)
    )

    button.click()
    unsubscribe()
    button.click()

    expect(received).toEqual([{ type: 'save' }])
  })
})
