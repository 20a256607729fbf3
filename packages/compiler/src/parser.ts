import { ArgKind } from './constant'
import { ParseError } from './errors'
import { toNumber } from './number'
import OpcodeRegistry, { registry as defaultRegistry } from './registry'
import type { Instruction, Literal } from './types'

const WHITESPACE = /[ \t\r\v\f]+/

export default class Parser {
  private readonly source: string
  private readonly registry: OpcodeRegistry
  ir: Instruction[]

  /**
   * Parser constructor
   * @constructor
   * @param source - instruction text, one instruction per line
   * @param registry - opcode table used to validate mnemonics and arguments
   */
  constructor(source: string, registry: OpcodeRegistry = defaultRegistry) {
    this.source = source
    this.registry = registry
    this.ir = []
  }

  private splitLines(): string[] {
    const lines = this.source.split('\n')
    // a trailing terminator does not start another line
    if (this.source.endsWith('\n')) lines.pop()
    return lines
  }

  private tokenize(line: string): string[] {
    return line.split(WHITESPACE).filter(token => token.length > 0)
  }

  private parseArgument(kind: ArgKind, tokens: string[], index: number, line: number): Literal {
    const token = tokens[index]
    switch (kind) {
      case ArgKind.STRING:
        // strings swallow the rest of the line
        return tokens.slice(index).join(' ')
      case ArgKind.NUMBER: {
        const value = token === undefined ? undefined : toNumber(token)
        if (value === undefined) throw new ParseError(line, `invalid number \`${token ?? '<eol>'}\``)
        return value
      }
      case ArgKind.BOOLEAN: {
        const lower = token?.toLowerCase()
        if (lower === 'true') return true
        if (lower === 'false') return false
        throw new ParseError(line, `invalid boolean \`${token ?? '<eol>'}\``)
      }
    }
  }

  private parseLine(text: string, line: number): Instruction | undefined {
    const [mnemonic, ...tokens] = this.tokenize(text)
    if (mnemonic === undefined) return undefined // blank line

    const definition = this.registry.lookup(mnemonic)
    if (!definition) throw new ParseError(line, `invalid opcode \`${mnemonic}\``)

    const args = definition.args.map((kind, index) => this.parseArgument(kind, tokens, index, line))
    return Object.freeze({ opcode: definition.opcode, args: Object.freeze(args), line })
  }

  parse(): Instruction[] {
    this.ir = []
    this.splitLines().forEach((text, index) => {
      const instruction = this.parseLine(text, index + 1)
      if (instruction) this.ir.push(instruction)
    })
    return this.ir
  }
}
