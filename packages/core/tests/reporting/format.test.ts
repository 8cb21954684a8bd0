import { describe, it, expect } from 'vitest'
import { formatClock, formatMessage, formatTag, formatLine, LurkError, ResultKind } from '../../src/index.js'
import { FIXED_TIME } from '../helpers/memory-stream.js'

describe('formatClock', () => {
  it('renders zero-padded UTC time', () => {
    expect(formatClock(FIXED_TIME)).toBe('09:05:07')
    expect(formatClock(new Date(Date.UTC(2024, 5, 1, 23, 59, 0)))).toBe('23:59:00')
  })
})

describe('formatMessage', () => {
  it('substitutes printf-style arguments', () => {
    expect(formatMessage('%s items left, %d dropped', ['3', 4])).toBe('3 items left, 4 dropped')
  })

  it('ignores arguments beyond the placeholders', () => {
    expect(formatMessage('drained', [5, 'extra'])).toBe('drained')
    expect(formatMessage('%s done', ['mail', 'extra'])).toBe('mail done')
  })

  it('honours zero-padded hex widths', () => {
    expect(formatMessage('code [%08x]', [255])).toBe('code [000000ff]')
    expect(formatMessage('code [%08x]', [-1])).toBe('code [ffffffff]')
  })

  it('raises FORMAT_ERROR when an argument does not fit its placeholder', () => {
    expect(() => formatMessage('%d items', ['many'])).toThrow(LurkError)
    try {
      formatMessage('%d items', ['many'])
    } catch (error) {
      if (error instanceof LurkError) {
        expect(error.code).toBe('FORMAT_ERROR')
        expect(error.message.startsWith('cannot format "%d items": ')).toBe(true)
      }
    }
  })

  it('leaves a template without arguments untouched', () => {
    expect(formatMessage('100%', [])).toBe('100%')
    expect(formatMessage('literal %s', [])).toBe('literal %s')
  })
})

describe('formatTag', () => {
  it('brackets the project name', () => {
    expect(formatTag('lurk')).toBe('[lurk]')
  })

  it('adds caller and location', () => {
    expect(formatTag('lurk', 'dequeue', '42')).toBe('[lurk:dequeue.42]')
  })
})

describe('formatLine', () => {
  it('joins time, code and tag with two spaces', () => {
    const line = formatLine({
      time: FIXED_TIME,
      result: ResultKind.Done,
      tag: '[app]',
      prefix: '> ',
      message: 'finished',
      postfix: ' <\n',
    })
    expect(line).toBe('09:05:07  00000002  [app]  > finished <\n')
  })
})
