import { describe, test, expect } from 'vitest'
import { lineAt, locate } from '../position.js'

describe('locate', () => {
  test('start of input', () => {
    expect(locate('abc', 0)).toEqual({ offset: 0, line: 1, column: 1 })
  })

  test('second line', () => {
    expect(locate('ab\ncd', 4)).toEqual({ offset: 4, line: 2, column: 2 })
  })

  test('byte offsets past multi-byte characters', () => {
    expect(locate('é\nx', 3)).toEqual({ offset: 2, line: 2, column: 1 })
  })
})

describe('lineAt', () => {
  test('strips carriage returns', () => {
    expect(lineAt('a\r\nb', 1)).toBe('a')
    expect(lineAt('a\r\nb', 2)).toBe('b')
  })

  test('missing line is empty', () => {
    expect(lineAt('a\nb', 3)).toBe('')
  })
})
