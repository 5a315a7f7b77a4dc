import { describe, it, expect } from 'vitest'
import { cleanText, extractYear, splitBrandModel } from '../text.js'

describe('cleanText', () => {
  it('collapses whitespace', () => {
    expect(cleanText('  Ping \n  G430   Max ')).toBe('Ping G430 Max')
    expect(cleanText(undefined)).toBe('')
  })
})

describe('splitBrandModel', () => {
  it('takes the first word as the brand', () => {
    expect(splitBrandModel('Callaway Paradym Ai Smoke Driver')).toEqual({
      brand: 'Callaway',
      model: 'Paradym Ai Smoke Driver',
    })
  })

  it('keeps known multi-word brands whole', () => {
    expect(splitBrandModel('scotty cameron Special Select Newport 2')).toEqual({
      brand: 'scotty cameron',
      model: 'Special Select Newport 2',
    })
  })

  it('uses a single-word title as both brand and model', () => {
    expect(splitBrandModel('Mizuno')).toEqual({ brand: 'Mizuno', model: 'Mizuno' })
  })

  it('returns null for blank titles', () => {
    expect(splitBrandModel('   ')).toBeNull()
  })
})

describe('extractYear', () => {
  it('finds a release year in free text', () => {
    expect(extractYear('Titleist T100 Irons (2023 model)')).toBe(2023)
    expect(extractYear('Model Year: 1999')).toBe(1999)
  })

  it('ignores numbers outside the plausible range', () => {
    expect(extractYear('Ping G425 Max 10.5')).toBeUndefined()
    expect(extractYear('Part 12345')).toBeUndefined()
  })
})
