// packages/pickle/src/testing.ts
// Fixture builders for tests: pickle streams, ZIP archives, .npy and
// safetensors files, all assembled in memory.
import zlib from 'node:zlib';
import { OPCODES, type OpcodeName } from './opcodes.js';

const CODE = new Map<string, number>(OPCODES.map((o) => [o.name, o.code]));

function opcode(name: OpcodeName): number {
  const code = CODE.get(name);
  if (code === undefined) throw new Error(`no opcode ${name}`);
  return code;
}

function le(n: number, width: 1 | 2 | 4 | 8): number[] {
  const out: number[] = [];
  let v = BigInt.asUintN(width * 8, BigInt(n));
  for (let i = 0; i < width; i++) {
    out.push(Number(v & 0xffn));
    v >>= 8n;
  }
  return out;
}

function utf8(s: string): number[] {
  return [...Buffer.from(s, 'utf8')];
}

/**
 * Chainable pickle assembler. Methods emit the opcode a real pickler would
 * pick for the value, so fixtures stay readable.
 */
export class PickleWriter {
  private readonly out: number[] = [];

  constructor(readonly protocol = 2) {}

  op(name: OpcodeName, ...arg: number[]): this {
    this.out.push(opcode(name), ...arg);
    return this;
  }

  raw(...bytes: number[]): this {
    this.out.push(...bytes);
    return this;
  }

  proto(version = this.protocol): this {
    return this.op('PROTO', version);
  }

  mark(): this {
    return this.op('MARK');
  }

  stop(): this {
    return this.op('STOP');
  }

  none(): this {
    return this.op('NONE');
  }

  bool(v: boolean): this {
    return this.op(v ? 'NEWTRUE' : 'NEWFALSE');
  }

  int(n: number): this {
    if (n >= 0 && n < 0x100) return this.op('BININT1', n);
    if (n >= 0 && n < 0x10000) return this.op('BININT2', ...le(n, 2));
    return this.op('BININT', ...le(n, 4));
  }

  float(n: number): this {
    const b = Buffer.alloc(8);
    b.writeDoubleBE(n);
    return this.op('BINFLOAT', ...b);
  }

  str(s: string): this {
    const bytes = utf8(s);
    if (this.protocol >= 4 && bytes.length < 0x100) return this.op('SHORT_BINUNICODE', bytes.length, ...bytes);
    return this.op('BINUNICODE', ...le(bytes.length, 4), ...bytes);
  }

  bytes(data: number[]): this {
    if (data.length < 0x100) return this.op('SHORT_BINBYTES', data.length, ...data);
    return this.op('BINBYTES', ...le(data.length, 4), ...data);
  }

  global(module: string, name: string): this {
    return this.op('GLOBAL', ...utf8(`${module}\n${name}\n`));
  }

  stackGlobal(module: string, name: string): this {
    return this.str(module).str(name).op('STACK_GLOBAL');
  }

  /** Closes a tuple of the last `n` values (MARK must precede for n > 3). */
  tuple(n: number): this {
    if (n === 0) return this.op('EMPTY_TUPLE');
    if (n === 1) return this.op('TUPLE1');
    if (n === 2) return this.op('TUPLE2');
    if (n === 3) return this.op('TUPLE3');
    return this.op('TUPLE');
  }

  emptyTuple(): this {
    return this.op('EMPTY_TUPLE');
  }

  emptyList(): this {
    return this.op('EMPTY_LIST');
  }

  emptyDict(): this {
    return this.op('EMPTY_DICT');
  }

  append(): this {
    return this.op('APPEND');
  }

  appends(): this {
    return this.op('APPENDS');
  }

  setitem(): this {
    return this.op('SETITEM');
  }

  setitems(): this {
    return this.op('SETITEMS');
  }

  reduce(): this {
    return this.op('REDUCE');
  }

  build(): this {
    return this.op('BUILD');
  }

  newobj(): this {
    return this.op('NEWOBJ');
  }

  put(id: number): this {
    return id < 0x100 ? this.op('BINPUT', id) : this.op('LONG_BINPUT', ...le(id, 4));
  }

  get(id: number): this {
    return id < 0x100 ? this.op('BINGET', id) : this.op('LONG_BINGET', ...le(id, 4));
  }

  memoize(): this {
    return this.op('MEMOIZE');
  }

  /** `module.name(*args)` where each arg is emitted by `args`. */
  call(module: string, name: string, args: (w: this) => unknown, argc: number): this {
    this.global(module, name);
    if (argc > 3) this.mark();
    args(this);
    return this.tuple(argc).reduce();
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.out);
  }
}

/** `proto 2; os.system(cmd); stop` */
export function systemCallPickle(cmd: string): Uint8Array {
  return new PickleWriter(2)
    .proto()
    .call('os', 'system', (w) => w.str(cmd), 1)
    .stop()
    .toBytes();
}

export interface ZipFixtureEntry {
  name: string;
  data: Uint8Array;
  deflate?: boolean;
  /** General-purpose bit flags; bit 0 marks an encrypted entry. */
  flags?: number;
}

/**
 * Minimal ZIP writer (no CRCs; readers here never check them).
 */
export function buildZip(entries: readonly ZipFixtureEntry[], options: { comment?: string } = {}): Uint8Array {
  const local: number[] = [];
  const central: number[] = [];

  for (const entry of entries) {
    const name = utf8(entry.name);
    const data = entry.deflate ? zlib.deflateRawSync(entry.data) : entry.data;
    const method = entry.deflate ? 8 : 0;
    const offset = local.length;
    const flags = entry.flags ?? 0;

    local.push(
      ...le(0x04034b50, 4), ...le(20, 2), ...le(flags, 2), ...le(method, 2), ...le(0, 2), ...le(0, 2),
      ...le(0, 4), ...le(data.byteLength, 4), ...le(entry.data.byteLength, 4),
      ...le(name.length, 2), ...le(0, 2), ...name, ...data
    );
    central.push(
      ...le(0x02014b50, 4), ...le(20, 2), ...le(20, 2), ...le(flags, 2), ...le(method, 2), ...le(0, 2), ...le(0, 2),
      ...le(0, 4), ...le(data.byteLength, 4), ...le(entry.data.byteLength, 4),
      ...le(name.length, 2), ...le(0, 2), ...le(0, 2), ...le(0, 2), ...le(0, 2), ...le(0, 4),
      ...le(offset, 4), ...name
    );
  }

  const comment = utf8(options.comment ?? '');
  const eocd = [
    ...le(0x06054b50, 4), ...le(0, 2), ...le(0, 2), ...le(entries.length, 2), ...le(entries.length, 2),
    ...le(central.length, 4), ...le(local.length, 4), ...le(comment.length, 2), ...comment,
  ];
  return Uint8Array.from([...local, ...central, ...eocd]);
}

export function buildNpy(descr: string, payload: Uint8Array, shape = '(1,)'): Uint8Array {
  let header = `{'descr': '${descr}', 'fortran_order': False, 'shape': ${shape}, }`;
  while ((10 + header.length + 1) % 64 !== 0) header += ' ';
  header += '\n';
  return Uint8Array.from([0x93, ...utf8('NUMPY'), 1, 0, ...le(header.length, 2), ...utf8(header), ...payload]);
}

export function buildSafetensors(header: unknown, data: Uint8Array = new Uint8Array()): Uint8Array {
  const json = utf8(JSON.stringify(header));
  return Uint8Array.from([...le(json.length, 8), ...json, ...data]);
}
