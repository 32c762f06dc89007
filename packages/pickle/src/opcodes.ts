// packages/pickle/src/opcodes.ts

/**
 * Inline argument encodings. `*nl` encodings are newline-terminated text,
 * numbered ones are little-endian and length-prefixed where they carry data.
 */
export type ArgEncoding =
  | 'none'
  | 'uint1'
  | 'uint2'
  | 'int4'
  | 'uint4'
  | 'uint8'
  | 'float8'
  | 'decimalnl'
  | 'floatnl'
  | 'stringnl'
  | 'unicodenl'
  | 'textnl'
  | 'pairnl'
  | 'string1'
  | 'string4'
  | 'text1'
  | 'text4'
  | 'text8'
  | 'bytes1'
  | 'bytes4'
  | 'bytes8'
  | 'long1'
  | 'long4';

export interface OpcodeInfo {
  name: string;
  code: number;
  arg: ArgEncoding;
  /** Protocol version that introduced the opcode. */
  proto: number;
}

const ch = (c: string) => c.charCodeAt(0);

export const OPCODES = [
  // protocol 0 and 1
  { name: 'MARK', code: ch('('), arg: 'none', proto: 0 },
  { name: 'STOP', code: ch('.'), arg: 'none', proto: 0 },
  { name: 'POP', code: ch('0'), arg: 'none', proto: 0 },
  { name: 'POP_MARK', code: ch('1'), arg: 'none', proto: 1 },
  { name: 'DUP', code: ch('2'), arg: 'none', proto: 0 },
  { name: 'FLOAT', code: ch('F'), arg: 'floatnl', proto: 0 },
  { name: 'INT', code: ch('I'), arg: 'decimalnl', proto: 0 },
  { name: 'BININT', code: ch('J'), arg: 'int4', proto: 1 },
  { name: 'BININT1', code: ch('K'), arg: 'uint1', proto: 1 },
  { name: 'LONG', code: ch('L'), arg: 'decimalnl', proto: 0 },
  { name: 'BININT2', code: ch('M'), arg: 'uint2', proto: 1 },
  { name: 'NONE', code: ch('N'), arg: 'none', proto: 0 },
  { name: 'PERSID', code: ch('P'), arg: 'textnl', proto: 0 },
  { name: 'BINPERSID', code: ch('Q'), arg: 'none', proto: 1 },
  { name: 'REDUCE', code: ch('R'), arg: 'none', proto: 0 },
  { name: 'STRING', code: ch('S'), arg: 'stringnl', proto: 0 },
  { name: 'BINSTRING', code: ch('T'), arg: 'string4', proto: 1 },
  { name: 'SHORT_BINSTRING', code: ch('U'), arg: 'string1', proto: 1 },
  { name: 'UNICODE', code: ch('V'), arg: 'unicodenl', proto: 0 },
  { name: 'BINUNICODE', code: ch('X'), arg: 'text4', proto: 1 },
  { name: 'APPEND', code: ch('a'), arg: 'none', proto: 0 },
  { name: 'BUILD', code: ch('b'), arg: 'none', proto: 0 },
  { name: 'GLOBAL', code: ch('c'), arg: 'pairnl', proto: 0 },
  { name: 'DICT', code: ch('d'), arg: 'none', proto: 0 },
  { name: 'EMPTY_DICT', code: ch('}'), arg: 'none', proto: 1 },
  { name: 'APPENDS', code: ch('e'), arg: 'none', proto: 1 },
  { name: 'GET', code: ch('g'), arg: 'decimalnl', proto: 0 },
  { name: 'BINGET', code: ch('h'), arg: 'uint1', proto: 1 },
  { name: 'INST', code: ch('i'), arg: 'pairnl', proto: 0 },
  { name: 'LONG_BINGET', code: ch('j'), arg: 'uint4', proto: 1 },
  { name: 'LIST', code: ch('l'), arg: 'none', proto: 0 },
  { name: 'EMPTY_LIST', code: ch(']'), arg: 'none', proto: 1 },
  { name: 'OBJ', code: ch('o'), arg: 'none', proto: 1 },
  { name: 'PUT', code: ch('p'), arg: 'decimalnl', proto: 0 },
  { name: 'BINPUT', code: ch('q'), arg: 'uint1', proto: 1 },
  { name: 'LONG_BINPUT', code: ch('r'), arg: 'uint4', proto: 1 },
  { name: 'SETITEM', code: ch('s'), arg: 'none', proto: 0 },
  { name: 'TUPLE', code: ch('t'), arg: 'none', proto: 0 },
  { name: 'EMPTY_TUPLE', code: ch(')'), arg: 'none', proto: 1 },
  { name: 'SETITEMS', code: ch('u'), arg: 'none', proto: 1 },
  { name: 'BINFLOAT', code: ch('G'), arg: 'float8', proto: 1 },

  // protocol 2
  { name: 'PROTO', code: 0x80, arg: 'uint1', proto: 2 },
  { name: 'NEWOBJ', code: 0x81, arg: 'none', proto: 2 },
  { name: 'EXT1', code: 0x82, arg: 'uint1', proto: 2 },
  { name: 'EXT2', code: 0x83, arg: 'uint2', proto: 2 },
  { name: 'EXT4', code: 0x84, arg: 'int4', proto: 2 },
  { name: 'TUPLE1', code: 0x85, arg: 'none', proto: 2 },
  { name: 'TUPLE2', code: 0x86, arg: 'none', proto: 2 },
  { name: 'TUPLE3', code: 0x87, arg: 'none', proto: 2 },
  { name: 'NEWTRUE', code: 0x88, arg: 'none', proto: 2 },
  { name: 'NEWFALSE', code: 0x89, arg: 'none', proto: 2 },
  { name: 'LONG1', code: 0x8a, arg: 'long1', proto: 2 },
  { name: 'LONG4', code: 0x8b, arg: 'long4', proto: 2 },

  // protocol 3
  { name: 'BINBYTES', code: ch('B'), arg: 'bytes4', proto: 3 },
  { name: 'SHORT_BINBYTES', code: ch('C'), arg: 'bytes1', proto: 3 },

  // protocol 4
  { name: 'SHORT_BINUNICODE', code: 0x8c, arg: 'text1', proto: 4 },
  { name: 'BINUNICODE8', code: 0x8d, arg: 'text8', proto: 4 },
  { name: 'BINBYTES8', code: 0x8e, arg: 'bytes8', proto: 4 },
  { name: 'EMPTY_SET', code: 0x8f, arg: 'none', proto: 4 },
  { name: 'ADDITEMS', code: 0x90, arg: 'none', proto: 4 },
  { name: 'FROZENSET', code: 0x91, arg: 'none', proto: 4 },
  { name: 'NEWOBJ_EX', code: 0x92, arg: 'none', proto: 4 },
  { name: 'STACK_GLOBAL', code: 0x93, arg: 'none', proto: 4 },
  { name: 'MEMOIZE', code: 0x94, arg: 'none', proto: 4 },
  { name: 'FRAME', code: 0x95, arg: 'uint8', proto: 4 },

  // protocol 5
  { name: 'BYTEARRAY8', code: 0x96, arg: 'bytes8', proto: 5 },
  { name: 'NEXT_BUFFER', code: 0x97, arg: 'none', proto: 5 },
  { name: 'READONLY_BUFFER', code: 0x98, arg: 'none', proto: 5 },
] as const satisfies readonly OpcodeInfo[];

export type OpcodeName = (typeof OPCODES)[number]['name'];

export const HIGHEST_PROTOCOL = 5;

/** Protocol assumed for a stream that does not open with PROTO. */
export const IMPLICIT_PROTOCOL = 1;

const BY_CODE: ReadonlyMap<number, (typeof OPCODES)[number]> = new Map(OPCODES.map((op) => [op.code, op]));

export function opcodeByCode(code: number): (typeof OPCODES)[number] | undefined {
  return BY_CODE.get(code);
}

export const PROTO_CODE = 0x80;
export const STOP_CODE = 0x2e;
