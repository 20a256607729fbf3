import { ArgKind, Opcode } from './constant'

export interface OpcodeDefinition {
  mnemonic: string // canonical mnemonic, the first one registered
  opcode: Opcode
  id: number
  args: readonly ArgKind[]
}

export default class OpcodeRegistry {
  private readonly mnemonics = new Map<string, Opcode>()
  private readonly definitions = new Map<Opcode, OpcodeDefinition>()
  private readonly ids: Opcode[] = [] // index is the numeric id

  /**
   * Register an opcode under the next free id
   * @param mnemonic - name used in instruction text
   * @param opcode - operation it maps to
   * @param args - argument kinds, in order
   */
  register(mnemonic: string, opcode: Opcode, ...args: ArgKind[]): OpcodeDefinition {
    if (this.mnemonics.has(mnemonic)) throw new Error(`Duplicate mnemonic: ${mnemonic}`)
    if (this.definitions.has(opcode)) throw new Error(`Opcode already registered: ${opcode}`)
    const definition: OpcodeDefinition = {
      mnemonic,
      opcode,
      id: this.ids.length,
      args: Object.freeze([...args])
    }
    this.ids.push(opcode)
    this.mnemonics.set(mnemonic, opcode)
    this.definitions.set(opcode, definition)
    return definition
  }

  /**
   * Map another mnemonic to an already registered opcode, sharing its id
   */
  alias(mnemonic: string, opcode: Opcode): OpcodeDefinition {
    const definition = this.definitions.get(opcode)
    if (!definition) throw new Error(`Cannot alias unregistered opcode: ${opcode}`)
    if (this.mnemonics.has(mnemonic)) throw new Error(`Duplicate mnemonic: ${mnemonic}`)
    this.mnemonics.set(mnemonic, opcode)
    return definition
  }

  lookup(mnemonic: string): OpcodeDefinition | undefined {
    const opcode = this.mnemonics.get(mnemonic)
    return opcode === undefined ? undefined : this.definitions.get(opcode)
  }

  definition(opcode: Opcode): OpcodeDefinition {
    const definition = this.definitions.get(opcode)
    if (!definition) throw new Error(`Unregistered opcode: ${opcode}`)
    return definition
  }

  fromId(id: number): OpcodeDefinition | undefined {
    const opcode = this.ids[id]
    return opcode === undefined ? undefined : this.definitions.get(opcode)
  }

  get size() {
    return this.ids.length
  }
}

const createRegistry = () => {
  const registry = new OpcodeRegistry()
  registry.register('getglobal', Opcode.GET_GLOBAL, ArgKind.STRING)
  registry.register('getfield', Opcode.GET_FIELD, ArgKind.NUMBER, ArgKind.STRING)
  registry.register('setfield', Opcode.SET_FIELD, ArgKind.NUMBER, ArgKind.STRING)
  registry.register('pushvalue', Opcode.PUSH_VALUE, ArgKind.NUMBER)
  registry.register('pcall', Opcode.PCALL, ArgKind.NUMBER, ArgKind.NUMBER, ArgKind.NUMBER)
  registry.register('call', Opcode.CALL, ArgKind.NUMBER, ArgKind.NUMBER)
  registry.register('pushnumber', Opcode.PUSH_NUMBER, ArgKind.NUMBER)
  registry.register('pushboolean', Opcode.PUSH_BOOLEAN, ArgKind.BOOLEAN)
  registry.alias('pushbool', Opcode.PUSH_BOOLEAN)
  registry.register('pushnil', Opcode.PUSH_NIL)
  registry.register('pushstring', Opcode.PUSH_STRING, ArgKind.STRING)
  registry.register('settop', Opcode.SET_TOP, ArgKind.NUMBER)
  registry.register('remove', Opcode.REMOVE, ArgKind.NUMBER)
  registry.register('pop', Opcode.POP, ArgKind.NUMBER)
  registry.register('emptystack', Opcode.EMPTY_STACK)
  return registry
}

// Wire contract: ids and the pushbool alias must not change
export const registry = createRegistry()
