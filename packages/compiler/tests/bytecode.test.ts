import { unzlibSync, zlibSync } from 'fflate'
import { fromUint8Array, toUint8Array } from 'js-base64'
import { describe, expect, it } from 'vitest'
import { BytecodeCompiler, BytecodeError, Header, assemble, decode, parse } from '../src/index'

describe('bytecode', () => {
  it('lays out opcode id, line and tagged arguments', () => {
    const { bytecode, strings } = new BytecodeCompiler(parse('getfield 1 x\npushbool true')).compile()
    expect(strings).toEqual(['x'])
    expect(Array.from(bytecode.slice(0, 10))).toEqual([1, 1, 0, 0, 0, 0, 0, 0, 0, Header.LOAD_NUMBER])
    expect(Array.from(bytecode.slice(18, 28))).toEqual([Header.LOAD_STRING, 0, 0, 0, 0, 0, 0, 0, 0, 7])
    expect(bytecode[bytecode.length - 1]).toBe(Header.LOAD_TRUE)
    expect(bytecode.length).toBe(37)
  })

  it('deduplicates the string table', () => {
    const bundle = assemble(parse('getglobal t\ngetfield -1 t\npushstring other'))
    expect(bundle.strings).toEqual(['t', 'other'])
  })

  it('compresses and base64-encodes the stream', () => {
    const ir = parse('pushnil')
    const bundle = assemble(ir)
    expect(Array.from(unzlibSync(toUint8Array(bundle.bytecode)))).toEqual([8, 1, 0, 0, 0, 0, 0, 0, 0])
  })

  it('decodes what it assembles', () => {
    const ir = parse('getglobal print\n\npushstring Hello world!\npushnumber -1.25\npushbool false\npcall 1 0 0\nsettop -2')
    expect(decode(assemble(ir))).toEqual(ir)
  })

  it('rejects unknown opcode ids', () => {
    const bundle = assemble(parse('pushnil'))
    const bytes = unzlibSync(toUint8Array(bundle.bytecode))
    bytes[0] = 99
    expect(() => decode(reencode(bytes, bundle.strings))).toThrow(new BytecodeError(0, 'unknown opcode 99'))
  })

  it('rejects string pointers outside the table', () => {
    const bundle = assemble(parse('getglobal x'))
    expect(() => decode({ ...bundle, strings: [] })).toThrow('offset 9: string pointer 0 out of range')
  })

  it('rejects truncated streams', () => {
    const bundle = assemble(parse('pushnumber 1'))
    const bytes = unzlibSync(toUint8Array(bundle.bytecode)).slice(0, 12)
    expect(() => decode(reencode(bytes, bundle.strings))).toThrow('offset 10: unexpected end of bytecode')
  })

  it('rejects data that is not a zlib stream', () => {
    expect(() => decode({ bytecode: 'bm90IHpsaWI=', strings: [] })).toThrow(BytecodeError)
  })
})

const reencode = (bytes: Uint8Array, strings: string[]) => ({
  bytecode: fromUint8Array(zlibSync(bytes)),
  strings
})
