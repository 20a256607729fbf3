import { describe, expect, it } from 'vitest'
import { ArgKind, Opcode, OpcodeRegistry, registry } from '../src/index'

describe('opcode registry', () => {
  it('assigns dense ids in registration order', () => {
    const order = [
      'getglobal', 'getfield', 'setfield', 'pushvalue', 'pcall', 'call', 'pushnumber',
      'pushboolean', 'pushnil', 'pushstring', 'settop', 'remove', 'pop', 'emptystack'
    ]
    expect(order.map(mnemonic => registry.lookup(mnemonic)?.id)).toEqual(order.map((_, id) => id))
    expect(registry.size).toBe(14)
  })

  it('resolves pushbool to the pushboolean opcode and id', () => {
    const alias = registry.lookup('pushbool')
    expect(alias).toBe(registry.lookup('pushboolean'))
    expect(alias?.id).toBe(7)
    expect(alias?.mnemonic).toBe('pushboolean')
    expect(registry.lookup('pushnil')?.id).toBe(8)
  })

  it('keeps argument schemas', () => {
    expect(registry.definition(Opcode.PCALL).args).toEqual([ArgKind.NUMBER, ArgKind.NUMBER, ArgKind.NUMBER])
    expect(registry.definition(Opcode.GET_FIELD).args).toEqual([ArgKind.NUMBER, ArgKind.STRING])
    expect(registry.definition(Opcode.EMPTY_STACK).args).toEqual([])
  })

  it('looks opcodes up by numeric id', () => {
    expect(registry.fromId(5)?.opcode).toBe(Opcode.CALL)
    expect(registry.fromId(13)?.opcode).toBe(Opcode.EMPTY_STACK)
    expect(registry.fromId(14)).toBeUndefined()
  })

  it('does not advance the id counter for aliases', () => {
    const custom = new OpcodeRegistry()
    custom.register('a', Opcode.PUSH_NIL)
    custom.alias('b', Opcode.PUSH_NIL)
    expect(custom.register('c', Opcode.POP, ArgKind.NUMBER).id).toBe(1)
  })

  it('rejects duplicate mnemonics and unknown alias targets', () => {
    const custom = new OpcodeRegistry()
    custom.register('a', Opcode.PUSH_NIL)
    expect(() => custom.register('a', Opcode.POP)).toThrow('Duplicate mnemonic: a')
    expect(() => custom.alias('b', Opcode.POP)).toThrow('Cannot alias unregistered opcode: POP')
  })
})
