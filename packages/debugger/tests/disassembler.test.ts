import { assemble, parse } from '@capiscript/compiler'
import { describe, expect, it } from 'vitest'
import { disassemble } from '../src/index'

const strip = (ir: ReturnType<typeof parse>) => ir.map(({ opcode, args }) => ({ opcode, args }))

describe('disassemble', () => {
  it('prints one canonical line per instruction', () => {
    const source = [
      'getglobal print',
      '',
      'pushstring   Hello   world!',
      'pushbool TRUE',
      'pushnumber 0x10',
      'pushnumber -0',
      'pcall 2 0 0',
      'pushstring',
      'emptystack'
    ].join('\n')
    expect(disassemble(assemble(parse(source)))).toBe([
      'getglobal print',
      'pushstring Hello world!',
      'pushboolean true',
      'pushnumber 16',
      'pushnumber -0',
      'pcall 2 0 0',
      'pushstring',
      'emptystack',
      ''
    ].join('\n'))
  })

  it('produces text that parses back to the same program', () => {
    const ir = parse('getglobal t\ngetfield -1 name\npushnumber 1.5e-3\nsetfield -3 name\nsettop -2\nremove 1\npop 1')
    expect(strip(parse(disassemble(assemble(ir))))).toEqual(strip(ir))
  })

  it('prints infinities in a form the parser reads back', () => {
    const ir = parse('pushnumber 1e400\npushnumber -1e400')
    const text = disassemble(assemble(ir))
    expect(text).toBe('pushnumber 1e999\npushnumber -1e999\n')
    expect(parse(text).map(instruction => instruction.args[0])).toEqual([Infinity, -Infinity])
  })

  it('returns an empty listing for an empty program', () => {
    expect(disassemble(assemble([]))).toBe('')
  })
})
