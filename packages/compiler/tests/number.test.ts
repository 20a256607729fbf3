import { describe, expect, it } from 'vitest'
import { toNumber } from '../src/number'

describe('toNumber', () => {
  it('converts decimal literals', () => {
    expect(toNumber('42')).toBe(42)
    expect(toNumber('-7')).toBe(-7)
    expect(toNumber('+3')).toBe(3)
    expect(toNumber('1.5')).toBe(1.5)
    expect(toNumber('.5')).toBe(0.5)
    expect(toNumber('5.')).toBe(5)
    expect(toNumber('2e3')).toBe(2000)
    expect(toNumber('1E-2')).toBe(0.01)
  })

  it('converts hexadecimal literals', () => {
    expect(toNumber('0x10')).toBe(16)
    expect(toNumber('0XfF')).toBe(255)
    expect(toNumber('-0x10')).toBe(-16)
    expect(toNumber('0x1.8')).toBe(1.5)
    expect(toNumber('0x1p4')).toBe(16)
    expect(toNumber('0x.8p1')).toBe(1)
  })

  it('overflows huge literals to infinity', () => {
    expect(toNumber('1e999')).toBe(Infinity)
    expect(toNumber('-1e999')).toBe(-Infinity)
  })

  it('rejects anything else', () => {
    for (const token of ['abc', '', '1e', '0x', '0x.', 'Infinity', 'NaN', '1,5', '--1', '0b101', '12abc']) {
      expect(toNumber(token)).toBeUndefined()
    }
  })
})
