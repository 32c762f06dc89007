// packages/pickle/src/reader.ts
import { DEFAULT_LIMITS, ScanError, type ScanLimits } from '@mltriage/core';
import {
  HIGHEST_PROTOCOL,
  IMPLICIT_PROTOCOL,
  opcodeByCode,
  type ArgEncoding,
  type OpcodeName,
} from './opcodes.js';

export type OperationArg =
  | { type: 'int'; value: number | bigint | undefined }
  | { type: 'bool'; value: boolean }
  | { type: 'float'; value: number }
  | { type: 'text'; value: string; byteLength: number; truncated: boolean }
  | { type: 'bytes'; value: Uint8Array }
  | { type: 'pair'; module: string; name: string };

export interface Operation {
  readonly opcode: OpcodeName;
  readonly code: number;
  readonly arg?: OperationArg;
  /** Offset of the opcode byte in the buffer handed to the reader. */
  readonly offset: number;
}

export interface ReadOptions {
  /** Where the stream starts inside the buffer. */
  offset?: number;
  limits?: ScanLimits;
  /** Reject opcodes newer than the stream's declared protocol. Default true. */
  strictProtocol?: boolean;
  /** Epoch milliseconds after which reading stops with ScanTimeout. */
  deadline?: number;
  now?: () => number;
}

/** Longest integer payload decoded to a value; longer ones keep `value: undefined`. */
const MAX_LONG_BYTES = 16;

function decode(view: Uint8Array, encoding: BufferEncoding): string {
  return Buffer.from(view.buffer, view.byteOffset, view.byteLength).toString(encoding);
}

type TextArg = Extract<OperationArg, { type: 'text' }>;

function textArg(view: Uint8Array, encoding: BufferEncoding, preview: number): TextArg {
  const truncated = view.byteLength > preview;
  return {
    type: 'text',
    value: decode(truncated ? view.subarray(0, preview) : view, encoding),
    byteLength: view.byteLength,
    truncated,
  };
}

function parseDecimal(text: string): number | bigint | undefined {
  const digits = text.endsWith('L') ? text.slice(0, -1) : text;
  if (!/^[+-]?\d+$/.test(digits)) return undefined;
  return digits.length <= 15 ? Number.parseInt(digits, 10) : BigInt(digits);
}

function decodeLong(view: Uint8Array): number | bigint | undefined {
  if (view.byteLength === 0) return 0;
  if (view.byteLength > MAX_LONG_BYTES) return undefined;
  let n = 0n;
  for (let i = view.byteLength - 1; i >= 0; i--) n = (n << 8n) | BigInt(view[i] ?? 0);
  const last = view[view.byteLength - 1] ?? 0;
  if (last & 0x80) n -= 1n << BigInt(view.byteLength * 8);
  return n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(n) : n;
}

const REPR_ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t', '0': '\0', '\\': '\\', "'": "'", '"': '"' };

function unquoteRepr(text: string): string {
  const q = text[0];
  if (text.length < 2 || (q !== "'" && q !== '"') || text[text.length - 1] !== q) return text;
  return text.slice(1, -1).replace(/\\(x[0-9a-fA-F]{2}|[\\'"nrt0])/g, (_m, e: string) =>
    e.startsWith('x') ? String.fromCharCode(Number.parseInt(e.slice(1), 16)) : (REPR_ESCAPES[e] ?? e)
  );
}

function unescapeRawUnicode(text: string): string {
  return text.replace(/\\u([0-9a-fA-F]{4})|\\U([0-9a-fA-F]{8})/g, (m, short?: string, long?: string) => {
    const cp = Number.parseInt(short ?? long ?? '', 16);
    return Number.isFinite(cp) && cp <= 0x10ffff ? String.fromCodePoint(cp) : m;
  });
}

/**
 * Bounds-checked forward cursor over one stream. Every declared length is
 * checked against the per-stream byte cap and the remaining buffer before
 * anything is sliced.
 */
class Cursor {
  pos: number;
  opOffset: number;
  private readonly view: DataView;

  constructor(
    readonly buf: Uint8Array,
    readonly start: number,
    private readonly limits: ScanLimits
  ) {
    this.pos = start;
    this.opOffset = start;
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  need(n: number, what: string): void {
    if (n < 0) {
      throw new ScanError('TruncatedStream', `${what}: negative length ${n}`, { offset: this.opOffset });
    }
    const used = this.pos - this.start;
    if (used + n > this.limits.maxStreamBytes) {
      throw new ScanError(
        'StreamTooLarge',
        `${what}: ${n} bytes would exceed the ${this.limits.maxStreamBytes}-byte stream limit`,
        { offset: this.opOffset }
      );
    }
    const left = this.buf.byteLength - this.pos;
    if (n > left) {
      throw new ScanError('TruncatedStream', `${what}: need ${n} bytes, ${left} left`, { offset: this.opOffset });
    }
  }

  u8(what: string): number {
    this.need(1, what);
    return this.view.getUint8(this.pos++);
  }

  u16(what: string): number {
    this.need(2, what);
    const v = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return v;
  }

  i32(what: string): number {
    this.need(4, what);
    const v = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return v;
  }

  u32(what: string): number {
    this.need(4, what);
    const v = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return v;
  }

  u64(what: string): number {
    this.need(8, what);
    const v = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return Number(v);
  }

  f64be(what: string): number {
    this.need(8, what);
    const v = this.view.getFloat64(this.pos, false);
    this.pos += 8;
    return v;
  }

  take(n: number, what: string): Uint8Array {
    this.need(n, what);
    const out = this.buf.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  line(what: string): Uint8Array {
    const nl = this.buf.indexOf(0x0a, this.pos);
    if (nl < 0) {
      throw new ScanError('TruncatedStream', `${what}: missing newline terminator`, { offset: this.opOffset });
    }
    const out = this.take(nl - this.pos, what);
    this.pos += 1;
    return out;
  }
}

function readArg(cur: Cursor, encoding: ArgEncoding, opcode: OpcodeName, preview: number): OperationArg | undefined {
  switch (encoding) {
    case 'none':
      return undefined;
    case 'uint1':
      return { type: 'int', value: cur.u8(opcode) };
    case 'uint2':
      return { type: 'int', value: cur.u16(opcode) };
    case 'int4':
      return { type: 'int', value: cur.i32(opcode) };
    case 'uint4':
      return { type: 'int', value: cur.u32(opcode) };
    case 'uint8':
      return { type: 'int', value: cur.u64(opcode) };
    case 'float8':
      return { type: 'float', value: cur.f64be(opcode) };
    case 'decimalnl': {
      const text = decode(cur.line(opcode).subarray(0, preview), 'latin1').trim();
      if (opcode === 'INT' && (text === '00' || text === '01')) return { type: 'bool', value: text === '01' };
      return { type: 'int', value: parseDecimal(text) };
    }
    case 'floatnl':
      return { type: 'float', value: Number.parseFloat(decode(cur.line(opcode).subarray(0, preview), 'latin1')) };
    case 'stringnl': {
      const arg = textArg(cur.line(opcode), 'latin1', preview);
      return { ...arg, value: unquoteRepr(arg.value.trim()) };
    }
    case 'unicodenl': {
      const arg = textArg(cur.line(opcode), 'latin1', preview);
      return { ...arg, value: unescapeRawUnicode(arg.value) };
    }
    case 'textnl':
      return textArg(cur.line(opcode), 'utf8', preview);
    case 'pairnl': {
      const module = decode(cur.line(opcode).subarray(0, preview), 'utf8');
      const name = decode(cur.line(opcode).subarray(0, preview), 'utf8');
      return { type: 'pair', module, name };
    }
    case 'string1':
      return textArg(cur.take(cur.u8(opcode), opcode), 'latin1', preview);
    case 'string4':
      return textArg(cur.take(cur.i32(opcode), opcode), 'latin1', preview);
    case 'text1':
      return textArg(cur.take(cur.u8(opcode), opcode), 'utf8', preview);
    case 'text4':
      return textArg(cur.take(cur.u32(opcode), opcode), 'utf8', preview);
    case 'text8':
      return textArg(cur.take(cur.u64(opcode), opcode), 'utf8', preview);
    case 'bytes1':
      return { type: 'bytes', value: cur.take(cur.u8(opcode), opcode) };
    case 'bytes4':
      return { type: 'bytes', value: cur.take(cur.u32(opcode), opcode) };
    case 'bytes8':
      return { type: 'bytes', value: cur.take(cur.u64(opcode), opcode) };
    case 'long1':
      return { type: 'int', value: decodeLong(cur.take(cur.u8(opcode), opcode)) };
    case 'long4':
      return { type: 'int', value: decodeLong(cur.take(cur.i32(opcode), opcode)) };
  }
}

function hex(n: number): string {
  return `0x${n.toString(16).padStart(2, '0')}`;
}

/**
 * Decodes one pickle stream into operations, lazily and in a single forward
 * pass. Ends after STOP; every malformed or over-limit input raises a
 * ScanError carrying the offset of the opcode being read.
 */
export function* readOperations(buffer: Uint8Array, options: ReadOptions = {}): Generator<Operation, void, undefined> {
  const limits = options.limits ?? DEFAULT_LIMITS;
  const strict = options.strictProtocol ?? true;
  const now = options.now ?? Date.now;
  const start = options.offset ?? 0;
  const cur = new Cursor(buffer, start, limits);

  let protocol = IMPLICIT_PROTOCOL;

  for (;;) {
    const offset = cur.pos;
    cur.opOffset = offset;
    if (offset >= buffer.byteLength) {
      throw new ScanError(
        'TruncatedStream',
        offset === start ? 'empty stream' : 'end of data before STOP',
        { offset }
      );
    }

    const code = cur.u8('opcode');
    const info = opcodeByCode(code);
    if (!info) {
      throw new ScanError('UnknownOpcode', `unknown opcode ${hex(code)}`, { offset });
    }

    if (info.name === 'PROTO') {
      if (offset !== start) {
        throw new ScanError('ProtocolMismatch', 'PROTO after the start of the stream', { offset });
      }
    } else if (strict && info.proto > protocol) {
      throw new ScanError(
        'UnknownOpcode',
        `${info.name} (${hex(code)}) needs protocol ${info.proto}, stream declares ${protocol}`,
        { offset }
      );
    }

    const arg = readArg(cur, info.arg, info.name, limits.maxStringPreview);

    if (info.name === 'PROTO') {
      const version = arg?.type === 'int' && typeof arg.value === 'number' ? arg.value : -1;
      if (version < 0 || version > HIGHEST_PROTOCOL) {
        throw new ScanError('ProtocolMismatch', `unsupported protocol ${version}`, { offset });
      }
      protocol = version;
    }

    if (cur.pos - start > limits.maxStreamBytes) {
      throw new ScanError('StreamTooLarge', `stream exceeds ${limits.maxStreamBytes} bytes`, { offset });
    }
    if (options.deadline !== undefined && now() > options.deadline) {
      throw new ScanError('ScanTimeout', `deadline passed while reading ${info.name}`, { offset });
    }

    yield Object.freeze(arg ? { opcode: info.name, code, arg, offset } : { opcode: info.name, code, offset });

    if (info.name === 'STOP') return;
  }
}
