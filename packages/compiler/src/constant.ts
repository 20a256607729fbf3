/**
 * Header is used to identify the type of an argument in the bytecode
 */
export enum Header {
  LOAD_NUMBER = 100,
  LOAD_STRING,
  LOAD_TRUE,
  LOAD_FALSE,
}

export enum ArgKind {
  NUMBER = 'number',
  STRING = 'string',
  BOOLEAN = 'boolean',
}

/**
 * Opcode identifies the operation of an instruction.
 * Numeric ids live in the registry, not here.
 */
export enum Opcode {
  GET_GLOBAL = 'GET_GLOBAL',
  GET_FIELD = 'GET_FIELD',
  SET_FIELD = 'SET_FIELD',
  PUSH_VALUE = 'PUSH_VALUE',
  PCALL = 'PCALL',
  CALL = 'CALL',
  PUSH_NUMBER = 'PUSH_NUMBER',
  PUSH_BOOLEAN = 'PUSH_BOOLEAN',
  PUSH_NIL = 'PUSH_NIL',
  PUSH_STRING = 'PUSH_STRING',
  SET_TOP = 'SET_TOP',
  REMOVE = 'REMOVE',
  POP = 'POP',
  EMPTY_STACK = 'EMPTY_STACK',
}
