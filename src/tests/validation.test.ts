import { describe, it, expect } from 'vitest'
import {
  isValidScore,
  isValidStudentId,
  isValidSubjectIndex,
  parseIntegerInput,
  sanitizeString,
} from '../lib/validation'

describe('validators', () => {
  it('accepts whole scores from 0 to 100', () => {
    expect([0, 1, 50, 100].every(isValidScore)).toBe(true)
    expect([-1, 101, 99.5, Number.NaN, '80', null].some(isValidScore)).toBe(false)
  })

  it('accepts safe integer IDs', () => {
    expect(isValidStudentId(0)).toBe(true)
    expect(isValidStudentId(-12)).toBe(true)
    expect(isValidStudentId(2 ** 53)).toBe(false)
    expect(isValidStudentId(1.1)).toBe(false)
  })

  it('accepts non-negative subject indexes', () => {
    expect(isValidSubjectIndex(0)).toBe(true)
    expect(isValidSubjectIndex(-1)).toBe(false)
    expect(isValidSubjectIndex(1.5)).toBe(false)
  })
})

describe('parseIntegerInput', () => {
  it('parses whole numbers with surrounding whitespace and signs', () => {
    expect(parseIntegerInput(' 42 ')).toEqual({ valid: true, value: 42 })
    expect(parseIntegerInput('-3')).toEqual({ valid: true, value: -3 })
    expect(parseIntegerInput('+7')).toEqual({ valid: true, value: 7 })
  })

  it('rejects text, decimals and empty input', () => {
    for (const raw of ['abc', '4.5', '', '1e3', '12abc']) {
      expect(parseIntegerInput(raw, 'student ID')).toEqual({
        valid: false,
        error: 'Invalid student ID. Must be a whole number.',
      })
    }
  })

  it('rejects numbers beyond the safe range', () => {
    expect(parseIntegerInput('99999999999999999999', 'choice')).toEqual({
      valid: false,
      error: 'Invalid choice. Number is too large.',
    })
  })

  it('applies bounds', () => {
    expect(parseIntegerInput('-1', 'score count', 0)).toEqual({
      valid: false,
      error: 'Score count must be at least 0.',
    })
    expect(parseIntegerInput('11', 'level', 0, 10)).toEqual({
      valid: false,
      error: 'Level must be at most 10.',
    })
    expect(parseIntegerInput('10', 'level', 0, 10)).toEqual({ valid: true, value: 10 })
  })
})

describe('sanitizeString', () => {
  it('strips control characters and truncates', () => {
    expect(sanitizeString('Ada\x00\x07 Lovelace')).toBe('Ada Lovelace')
    expect(sanitizeString('abcdef', 3)).toBe('abc...')
    expect(sanitizeString(12)).toBe('12')
  })
})
