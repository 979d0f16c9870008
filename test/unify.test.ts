import { describe, it, expect } from 'vitest'
import { createEvent } from '../src/events'
import { isLeft, isRight, left, matchEither, right, unify } from '../src/unify'
import type { Either } from '../src/unify'

describe('Stream Unification', () => {
  it('should tag events with the stream they came from', () => {
    const [numbers, emitNumber] = createEvent<number>()
    const [words, emitWord] = createEvent<string>()
    const received: Array<Either<number, string>> = []
    unify(numbers, words).subscribe(event => received.push(event))

    emitNumber(1)
    emitWord('two')
    emitNumber(3)

    expect(received).toEqual([left(1), right('two'), left(3)])
  })

  it('should nest tags when unified streams are unified again', () => {
    const [a, emitA] = createEvent<'a'>()
    const [b, emitB] = createEvent<'b'>()
    const [c, emitC] = createEvent<'c'>()
    const received: unknown[] = []
    unify(unify(a, b), c).subscribe(event => received.push(event))

    emitC('c')
    emitA('a')
    emitB('b')

    expect(received).toEqual([right('c'), left(left('a')), left(right('b'))])
  })

  it('should queue events raised while a delivery is running', () => {
    const [numbers, emitNumber] = createEvent<number>()
    const [words, emitWord] = createEvent<string>()
    const log: string[] = []
    let depth = 0
    let maxDepth = 0

    unify(numbers, words).subscribe(event => {
      depth += 1
      maxDepth = Math.max(maxDepth, depth)
      log.push(`start ${event.tag}`)
      if (isLeft(event)) emitWord(`after ${event.value}`)
      log.push(`end ${event.tag}`)
      depth -= 1
    })

    emitNumber(1)

    expect(log).toEqual(['start left', 'end left', 'start right', 'end right'])
    expect(maxDepth).toBe(1)
  })

  it('should keep emission order for events raised during a nested delivery', () => {
    const [a, emitA] = createEvent<string>()
    const [b] = createEvent<string>()
    const [c, emitC] = createEvent<string>()
    const log: string[] = []
    let depth = 0
    let maxDepth = 0

    unify(unify(a, b), c).subscribe(event => {
      depth += 1
      maxDepth = Math.max(maxDepth, depth)
      const label = matchEither(
        event,
        inner => matchEither(inner, value => `a:${value}`, value => `b:${value}`),
        value => `c:${value}`
      )
      log.push(label)
      if (label === 'a:first') {
        emitA('second')
        emitC('third')
      }
      depth -= 1
    })

    emitA('first')

    expect(log).toEqual(['a:first', 'a:second', 'c:third'])
    expect(maxDepth).toBe(1)
  })

  it('should stop delivering after unsubscribe', () => {
    const [numbers, emitNumber] = createEvent<number>()
    const [words] = createEvent<string>()
    const received: unknown[] = []
    const unsubscribe = unify(numbers, words).subscribe(event => received.push(event))

    emitNumber(1)
    unsubscribe()
    emitNumber(2)

    expect(received).toEqual([left(1)])
  })

  it('should match on the tag', () => {
    const label = (event: Either<number, string>) =>
      matchEither(
        event,
        value => `number ${value}`,
        value => `text ${value}`
      )

    expect(label(left(2))).toBe('number 2')
    expect(label(right('x'))).toBe('text x')
    expect(isRight(right('x'))).toBe(true)
  })
})
