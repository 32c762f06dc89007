// packages/pickle/src/values.ts
import type { OpcodeName } from './opcodes.js';

export type LiteralType =
  | 'none'
  | 'bool'
  | 'int'
  | 'float'
  | 'string'
  | 'bytes'
  | 'list'
  | 'dict'
  | 'tuple'
  | 'set'
  | 'frozenset'
  | 'buffer';

/**
 * Abstract stack token. Nothing here holds a live object: containers keep the
 * tokens that were placed in them (dicts as alternating key/value items) and
 * calls are recorded, never made.
 */
export type Value = LiteralValue | GlobalValue | ConstructedValue | MarkValue | MemoizedValue | UnknownValue;

export interface LiteralValue {
  kind: 'literal';
  type: LiteralType;
  /** Scalar payload; strings and bytes hold a bounded preview. */
  value?: string | number | bigint | boolean;
  /** Declared size when `value` is a truncated preview. */
  byteLength?: number;
  items?: Value[];
  offset: number;
}

export interface GlobalValue {
  kind: 'global';
  module: string;
  name: string;
  offset: number;
}

export interface ConstructedValue {
  kind: 'constructed';
  callee: Value;
  args: Value[];
  /** Opcode that would have made the call. */
  via: OpcodeName;
  offset: number;
}

export interface MarkValue {
  kind: 'mark';
  offset: number;
}

/** Back-reference to a memo slot that was never stored. */
export interface MemoizedValue {
  kind: 'memoized';
  id: number;
  offset: number;
}

export interface UnknownValue {
  kind: 'unknown';
  reason: string;
  offset: number;
}

export type CapabilityNode = GlobalValue | ConstructedValue;

/** Opcodes whose real effect is calling the callee with the arguments. */
export const CALL_OPCODES: ReadonlySet<OpcodeName> = new Set<OpcodeName>(['REDUCE', 'NEWOBJ', 'NEWOBJ_EX', 'INST', 'OBJ']);

export const EXTENSION_OPCODES: ReadonlySet<OpcodeName> = new Set<OpcodeName>(['EXT1', 'EXT2', 'EXT4']);

export function isCapabilityNode(v: Value): v is CapabilityNode {
  return v.kind === 'global' || v.kind === 'constructed';
}

export function isCall(v: Value): v is ConstructedValue {
  return v.kind === 'constructed' && CALL_OPCODES.has(v.via);
}

export function qualifiedName(v: GlobalValue): string {
  return `${v.module}.${v.name}`;
}

/** String payload of a string literal, if that is what `v` is. */
export function stringValue(v: Value | undefined): string | undefined {
  return v?.kind === 'literal' && v.type === 'string' && typeof v.value === 'string' ? v.value : undefined;
}

export interface RenderOptions {
  maxDepth?: number;
  maxItems?: number;
  maxString?: number;
}

const DEFAULT_RENDER: Required<RenderOptions> = { maxDepth: 3, maxItems: 6, maxString: 64 };

function quote(s: string, max: number, prefix = ''): string {
  const cut = s.length > max ? `${s.slice(0, max)}...` : s;
  return `${prefix}'${cut.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/\n/g, '\\n')}'`;
}

function renderItems(items: readonly Value[], depth: number, opts: Required<RenderOptions>): string {
  const shown = items.slice(0, opts.maxItems).map((it) => render(it, depth + 1, opts));
  if (items.length > opts.maxItems) shown.push('...');
  return shown.join(', ');
}

function renderDict(items: readonly Value[], depth: number, opts: Required<RenderOptions>): string {
  const pairs: string[] = [];
  for (let i = 0; i + 1 < items.length && pairs.length < opts.maxItems; i += 2) {
    const k = items[i];
    const v = items[i + 1];
    if (!k || !v) break;
    pairs.push(`${render(k, depth + 1, opts)}: ${render(v, depth + 1, opts)}`);
  }
  if (items.length / 2 > opts.maxItems) pairs.push('...');
  return `{${pairs.join(', ')}}`;
}

function renderLiteral(v: LiteralValue, depth: number, opts: Required<RenderOptions>): string {
  const items = v.items ?? [];
  switch (v.type) {
    case 'none':
      return 'None';
    case 'bool':
      return v.value ? 'True' : 'False';
    case 'int':
      return v.value === undefined ? '<int>' : String(v.value);
    case 'float':
      return String(v.value ?? 'nan');
    case 'string':
      return quote(String(v.value ?? ''), opts.maxString);
    case 'bytes':
      return quote(String(v.value ?? ''), opts.maxString, 'b');
    case 'buffer':
      return '<buffer>';
    case 'list':
      return `[${renderItems(items, depth, opts)}]`;
    case 'tuple':
      return items.length === 1 ? `(${renderItems(items, depth, opts)},)` : `(${renderItems(items, depth, opts)})`;
    case 'set':
      return items.length ? `{${renderItems(items, depth, opts)}}` : 'set()';
    case 'frozenset':
      return `frozenset({${renderItems(items, depth, opts)}})`;
    case 'dict':
      return renderDict(items, depth, opts);
  }
}

function render(v: Value, depth: number, opts: Required<RenderOptions>): string {
  if (depth > opts.maxDepth) return '...';
  switch (v.kind) {
    case 'literal':
      return renderLiteral(v, depth, opts);
    case 'global':
      return qualifiedName(v);
    case 'constructed':
      return `${render(v.callee, depth + 1, opts)}(${renderItems(v.args, depth, opts)})`;
    case 'mark':
      return '<mark>';
    case 'memoized':
      return `<memo ${v.id}>`;
    case 'unknown':
      return `<${v.reason}>`;
  }
}

/**
 * Short, bounded, source-like rendering of a value for finding evidence.
 * Depth and width are capped, so self-referencing containers terminate.
 */
export function renderValue(v: Value, options: RenderOptions = {}): string {
  return render(v, 0, { ...DEFAULT_RENDER, ...options });
}
