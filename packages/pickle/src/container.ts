// packages/pickle/src/container.ts
import zlib, { type ZlibOptions } from 'node:zlib';
import { z } from 'zod';
import { DEFAULT_LIMITS, ScanError, isScanError, type ExtensionClass, type ScanLimits } from '@mltriage/core';
import { HIGHEST_PROTOCOL, PROTO_CODE, STOP_CODE } from './opcodes.js';

export interface EmbeddedStream {
  /** Archive entry name; unset for a bare file. */
  name?: string;
  /** The whole entry (or file); operation offsets are positions in it. */
  bytes: Uint8Array;
  /** Where the pickle starts in `bytes`, past a `.npy` header for instance. */
  start?: number;
  /** Further streams may follow the first STOP (legacy torch layout). */
  multiStream: boolean;
}

export interface EntryFailure {
  /** Archive entry; unset when the failure is about the archive as a whole. */
  entry?: string;
  error: ScanError;
}

export interface Demultiplexed {
  streams: EmbeddedStream[];
  /** Entries that could not be read. They never cost the archive its other streams. */
  failures: EntryFailure[];
}

const SIG_LOCAL = 0x04034b50;
const SIG_CENTRAL = 0x02014b50;
const SIG_EOCD = 0x06054b50;
const SIG_ZIP64_LOCATOR = 0x07064b50;
const SIG_ZIP64_EOCD = 0x06064b50;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

/** The largest .npy header we are willing to decode. */
const MAX_NPY_HEADER = 64 * 1024;
/** Magic, version and the v2/v3 length field. */
const NPY_PREAMBLE = 12;

function corrupt(message: string, offset?: number): ScanError {
  return new ScanError('ContainerCorrupt', message, offset !== undefined ? { offset } : undefined);
}

class LE {
  private readonly view: DataView;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  private check(at: number, n: number, what: string): void {
    if (at < 0 || at + n > this.length) throw corrupt(`${what} out of range`, at);
  }

  u16(at: number, what: string): number {
    this.check(at, 2, what);
    return this.view.getUint16(at, true);
  }

  u32(at: number, what: string): number {
    this.check(at, 4, what);
    return this.view.getUint32(at, true);
  }

  u64(at: number, what: string): number {
    this.check(at, 8, what);
    return Number(this.view.getBigUint64(at, true));
  }

  slice(at: number, n: number, what: string): Uint8Array {
    this.check(at, n, what);
    return this.bytes.subarray(at, at + n);
  }
}

export interface ZipEntry {
  name: string;
  flags: number;
  method: number;
  compressedSize: number;
  size: number;
  localOffset: number;
}

export function isZip(bytes: Uint8Array): boolean {
  if (bytes.byteLength < 4) return false;
  const sig = new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, true);
  return sig === SIG_LOCAL || sig === SIG_EOCD;
}

function findEocd(r: LE): number {
  const last = r.length - 22;
  const first = Math.max(0, last - U16_MAX);
  for (let i = last; i >= first; i--) {
    if (r.bytes[i] === 0x50 && r.u32(i, 'eocd') === SIG_EOCD) return i;
  }
  throw corrupt('no end-of-central-directory record');
}

function applyZip64Extra(r: LE, at: number, len: number, entry: ZipEntry): void {
  let p = at;
  const end = at + len;
  while (p + 4 <= end) {
    const id = r.u16(p, 'extra field');
    const size = r.u16(p + 2, 'extra field');
    if (id === 0x0001) {
      let q = p + 4;
      if (entry.size === U32_MAX) {
        entry.size = r.u64(q, 'zip64 size');
        q += 8;
      }
      if (entry.compressedSize === U32_MAX) {
        entry.compressedSize = r.u64(q, 'zip64 compressed size');
        q += 8;
      }
      if (entry.localOffset === U32_MAX) entry.localOffset = r.u64(q, 'zip64 offset');
      return;
    }
    p += 4 + size;
  }
}

/**
 * Central directory of a ZIP (ZIP64 aware). Entry data is not touched.
 */
export function readZipDirectory(bytes: Uint8Array, limits: ScanLimits = DEFAULT_LIMITS): ZipEntry[] {
  const r = new LE(bytes);
  const eocd = findEocd(r);

  let count = r.u16(eocd + 10, 'eocd');
  let cdSize = r.u32(eocd + 12, 'eocd');
  let cdOffset = r.u32(eocd + 16, 'eocd');

  if (count === U16_MAX || cdSize === U32_MAX || cdOffset === U32_MAX) {
    const locator = eocd - 20;
    if (locator < 0 || r.u32(locator, 'zip64 locator') !== SIG_ZIP64_LOCATOR) {
      throw corrupt('missing ZIP64 locator', eocd);
    }
    const rec = r.u64(locator + 8, 'zip64 locator');
    if (r.u32(rec, 'zip64 record') !== SIG_ZIP64_EOCD) throw corrupt('bad ZIP64 end record', rec);
    count = r.u64(rec + 32, 'zip64 record');
    cdSize = r.u64(rec + 40, 'zip64 record');
    cdOffset = r.u64(rec + 48, 'zip64 record');
  }

  if (count > limits.maxArchiveEntries) {
    throw new ScanError('StreamTooLarge', `archive declares ${count} entries, limit is ${limits.maxArchiveEntries}`);
  }
  if (cdOffset + cdSize > bytes.byteLength) throw corrupt('central directory out of range', cdOffset);

  const entries: ZipEntry[] = [];
  let p = cdOffset;
  for (let i = 0; i < count; i++) {
    if (r.u32(p, 'central directory') !== SIG_CENTRAL) throw corrupt('bad central directory signature', p);
    const nameLen = r.u16(p + 28, 'central directory');
    const extraLen = r.u16(p + 30, 'central directory');
    const commentLen = r.u16(p + 32, 'central directory');
    const entry: ZipEntry = {
      flags: r.u16(p + 8, 'central directory'),
      method: r.u16(p + 10, 'central directory'),
      compressedSize: r.u32(p + 20, 'central directory'),
      size: r.u32(p + 24, 'central directory'),
      localOffset: r.u32(p + 42, 'central directory'),
      name: Buffer.from(r.slice(p + 46, nameLen, 'entry name')).toString('utf8'),
    };
    applyZip64Extra(r, p + 46 + nameLen, extraLen, entry);
    entries.push(entry);
    p += 46 + nameLen + extraLen + commentLen;
  }
  return entries;
}

// Entry-level errors are located at the start of the entry; the finding names the entry.

function rawEntryData(r: LE, entry: ZipEntry): Uint8Array {
  const at = entry.localOffset;
  if (at + 30 > r.length || r.u32(at, 'local header') !== SIG_LOCAL) throw corrupt('bad local header', 0);
  const start = at + 30 + r.u16(at + 26, 'local header') + r.u16(at + 28, 'local header');
  if (start + entry.compressedSize > r.length) throw corrupt('entry data out of range', 0);
  return r.bytes.subarray(start, start + entry.compressedSize);
}

function checkReadable(entry: ZipEntry): void {
  if (entry.flags & 0x1) throw corrupt('encrypted entry', 0);
  if (entry.method !== 0 && entry.method !== 8) throw corrupt(`unsupported compression method ${entry.method}`, 0);
}

function inflateEntry(raw: Uint8Array, options: ZlibOptions): Uint8Array {
  try {
    return zlib.inflateRawSync(raw, options);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new ScanError('StreamTooLarge', 'inflates past the stream limit', { cause: err });
    }
    throw new ScanError('ContainerCorrupt', 'invalid deflate data', { offset: 0, cause: err });
  }
}

function entryData(r: LE, entry: ZipEntry, limits: ScanLimits): Uint8Array {
  checkReadable(entry);
  const raw = rawEntryData(r, entry);
  if (entry.method === 8) return inflateEntry(raw, { maxOutputLength: limits.maxStreamBytes });
  if (raw.byteLength > limits.maxStreamBytes) {
    throw new ScanError('StreamTooLarge', `${raw.byteLength} bytes exceeds the stream limit`);
  }
  return raw;
}

/** Bytes a .npy header spans, once the preamble is readable. */
function npyHeaderEnd(bytes: Uint8Array): number | undefined {
  if (bytes.byteLength < NPY_PREAMBLE) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, NPY_PREAMBLE);
  return bytes[6] === 1 ? 10 + view.getUint16(8, true) : NPY_PREAMBLE + view.getUint32(8, true);
}

/**
 * Leading bytes of a `.npy` entry, enough to hold its header. Deflated entries
 * are inflated from a growing compressed prefix; the array data is never
 * inflated as a whole.
 */
function npyEntryHead(r: LE, entry: ZipEntry): Uint8Array {
  checkReadable(entry);
  const raw = rawEntryData(r, entry);
  if (entry.method === 0) return raw;

  const maxTake = Math.min(raw.byteLength, NPY_PREAMBLE + MAX_NPY_HEADER + 1024);
  for (let take = Math.min(1024, maxTake); ; take = Math.min(take * 4, maxTake)) {
    // deflate expands at most ~1032:1, so each round is bounded by `take`
    const head = inflateEntry(raw.subarray(0, take), { finishFlush: zlib.constants.Z_SYNC_FLUSH });
    const end = npyHeaderEnd(head);
    if (take === maxTake || (end !== undefined && (head.byteLength >= end || end > NPY_PREAMBLE + MAX_NPY_HEADER))) {
      return head;
    }
  }
}

function basename(name: string): string {
  const i = name.lastIndexOf('/');
  return i < 0 ? name : name.slice(i + 1);
}

/** Raw storage payloads: `.../data/<n>` and purely numeric names. */
function isTensorPath(name: string): boolean {
  return /(^|\/)data\/\d+$/.test(name) || /^\d+$/.test(basename(name));
}

function looksLikePickle(data: Uint8Array): boolean {
  const n = data.byteLength;
  return n >= 3 && data[0] === PROTO_CODE && (data[1] ?? 0xff) <= HIGHEST_PROTOCOL && data[n - 1] === STOP_CODE;
}

/**
 * Header of a .npy array. `objectDtype` means the payload after the header is
 * a pickle stream rather than raw numbers.
 */
export function parseNpyHeader(bytes: Uint8Array): { objectDtype: boolean; dataOffset: number } {
  const r = new LE(bytes);
  const magic = Buffer.from(bytes.subarray(0, 6)).toString('latin1');
  if (magic !== '\x93NUMPY') throw corrupt('bad .npy magic', 0);
  const major = bytes[6];
  let headerLen: number;
  let headerStart: number;
  if (major === 1) {
    headerLen = r.u16(8, '.npy header length');
    headerStart = 10;
  } else if (major === 2 || major === 3) {
    headerLen = r.u32(8, '.npy header length');
    headerStart = 12;
  } else {
    throw corrupt(`unsupported .npy version ${String(major)}`, 6);
  }
  if (headerLen > MAX_NPY_HEADER) throw corrupt(`.npy header of ${headerLen} bytes`, 8);
  const header = Buffer.from(r.slice(headerStart, headerLen, '.npy header')).toString(major === 3 ? 'utf8' : 'latin1');
  if (!/['"]descr['"]\s*:/.test(header)) throw corrupt('.npy header has no descr', headerStart);
  return {
    objectDtype: /['"][|<>=]?O\d*['"]/.test(header),
    dataOffset: headerStart + headerLen,
  };
}

const TensorInfo = z.object({
  dtype: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  data_offsets: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
});

const SafetensorsHeader = z.record(z.string(), z.unknown());

/**
 * Checks safetensors framing: little-endian u64 header length, a JSON object
 * header and tensor offsets inside the data section.
 */
export function validateSafetensors(bytes: Uint8Array, limits: ScanLimits = DEFAULT_LIMITS): void {
  const r = new LE(bytes);
  if (bytes.byteLength < 8) throw corrupt('file shorter than the header length field', 0);
  const headerLen = r.u64(0, 'header length');
  if (headerLen > bytes.byteLength - 8 || headerLen > limits.maxStreamBytes) {
    throw corrupt(`header length ${headerLen} exceeds the file`, 0);
  }

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(r.slice(8, headerLen, 'header')).toString('utf8'));
  } catch (err) {
    throw new ScanError('ContainerCorrupt', 'header is not valid JSON', { offset: 8, cause: err });
  }

  const parsed = SafetensorsHeader.safeParse(json);
  if (!parsed.success) throw corrupt('header is not a JSON object', 8);

  const dataLen = bytes.byteLength - 8 - headerLen;
  for (const [name, info] of Object.entries(parsed.data)) {
    if (name === '__metadata__') continue;
    const tensor = TensorInfo.safeParse(info);
    if (!tensor.success) throw corrupt(`tensor ${name}: malformed entry`, 8);
    const [begin, end] = tensor.data.data_offsets;
    if (begin > end || end > dataLen) throw corrupt(`tensor ${name}: offsets outside the data section`, 8);
  }
}

function entryStream(r: LE, entry: ZipEntry, limits: ScanLimits): EmbeddedStream | undefined {
  const name = entry.name;
  const lower = name.toLowerCase();
  if (name.endsWith('/')) return undefined;

  if (lower.endsWith('.pkl') || lower.endsWith('.pickle')) {
    return { name, bytes: entryData(r, entry, limits), multiStream: false };
  }
  if (lower.endsWith('.npy')) {
    const npy = parseNpyHeader(npyEntryHead(r, entry));
    if (!npy.objectDtype) return undefined;
    return { name, bytes: entryData(r, entry, limits), start: npy.dataOffset, multiStream: false };
  }
  if (!basename(name).includes('.') && !isTensorPath(name) && entry.method === 0 && !(entry.flags & 0x1)) {
    // extension-less members are sniffed only when stored
    const data = rawEntryData(r, entry);
    if (looksLikePickle(data)) return { name, bytes: data, multiStream: false };
  }
  return undefined;
}

/**
 * Directory framing errors fail the archive; anything wrong with a single
 * entry is recorded against that entry and the walk goes on.
 */
function demultiplexZip(bytes: Uint8Array, limits: ScanLimits): Demultiplexed {
  const r = new LE(bytes);
  const streams: EmbeddedStream[] = [];
  const failures: EntryFailure[] = [];

  for (const entry of readZipDirectory(bytes, limits)) {
    let stream: EmbeddedStream | undefined;
    try {
      stream = entryStream(r, entry, limits);
    } catch (err) {
      if (!isScanError(err)) throw err;
      failures.push({ entry: entry.name, error: err });
      continue;
    }
    if (!stream) continue;
    if (streams.length >= limits.maxStreamsPerArtifact) {
      failures.push({
        error: new ScanError('StreamTooLarge', `more than ${limits.maxStreamsPerArtifact} embedded streams`),
      });
      break;
    }
    streams.push(stream);
  }

  if (!streams.length && !failures.length) {
    throw new ScanError('NoPickleStreamFound', 'archive contains no pickle entries');
  }
  return { streams, failures };
}

function isGzip(bytes: Uint8Array): boolean {
  return bytes[0] === 0x1f && bytes[1] === 0x8b;
}

function isZlib(bytes: Uint8Array): boolean {
  const cmf = bytes[0] ?? 0;
  const flg = bytes[1] ?? 0;
  return cmf === 0x78 && ((cmf << 8) | flg) % 31 === 0;
}

function decompressWhole(bytes: Uint8Array, limits: ScanLimits): Uint8Array {
  try {
    const opts = { maxOutputLength: limits.maxStreamBytes };
    return isGzip(bytes) ? zlib.gunzipSync(bytes, opts) : zlib.inflateSync(bytes, opts);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new ScanError('StreamTooLarge', 'decompresses past the stream limit', { cause: err });
    }
    throw new ScanError('ContainerCorrupt', 'invalid compressed data', { offset: 0, cause: err });
  }
}

/**
 * Locates the pickle streams inside one artifact. ZIP archives are detected
 * by signature whatever the extension; everything else is dispatched on the
 * extension class.
 */
export function demultiplex(
  bytes: Uint8Array,
  extensionClass: ExtensionClass,
  limits: ScanLimits = DEFAULT_LIMITS
): Demultiplexed {
  if (isZip(bytes)) return demultiplexZip(bytes, limits);

  const only = (stream: EmbeddedStream): Demultiplexed => ({ streams: [stream], failures: [] });
  switch (extensionClass) {
    case 'safetensors':
      validateSafetensors(bytes, limits);
      return { streams: [], failures: [] };
    case 'numpy': {
      const npy = parseNpyHeader(bytes);
      if (!npy.objectDtype) throw new ScanError('NoPickleStreamFound', '.npy array has a plain dtype');
      return only({ bytes, start: npy.dataOffset, multiStream: false });
    }
    case 'torch':
      if (bytes[0] !== PROTO_CODE) throw new ScanError('NoPickleStreamFound', 'neither a ZIP archive nor a pickle stream');
      return only({ bytes, multiStream: true });
    case 'pickle':
      if (isGzip(bytes) || isZlib(bytes)) return only({ bytes: decompressWhole(bytes, limits), multiStream: true });
      return only({ bytes, multiStream: true });
  }
}
