// packages/pickle/src/builder.ts
import { DEFAULT_LIMITS, ScanError, isScanError, type ScanLimits } from '@mltriage/core';
import type { Operation, OperationArg } from './reader.js';
import {
  isCapabilityNode,
  type CapabilityNode,
  type ConstructedValue,
  type GlobalValue,
  type LiteralType,
  type LiteralValue,
  type Value,
} from './values.js';

export interface CapabilityGraph {
  /** The value STOP returned; unset when the stream failed first. */
  root?: Value;
  /** Every global reference and recorded call, in creation order. */
  nodes: CapabilityNode[];
  /** Nodes reachable from the root (or from the leftover stack of a failed stream). */
  reachable: ReadonlySet<CapabilityNode>;
  /** The reachability walk hit `maxTraversalNodes`. */
  truncated: boolean;
}

export interface BuildResult {
  graph: CapabilityGraph;
  /** Reader or stack-discipline failure; `graph` then holds what was built before it. */
  error?: ScanError;
  /** Offset just past STOP when the stream completed. */
  end?: number;
}

export interface BuildOptions {
  limits?: ScanLimits;
}

function literal(type: LiteralType, offset: number, extra: Partial<LiteralValue> = {}): LiteralValue {
  return { kind: 'literal', type, offset, ...extra };
}

function argLiteral(arg: OperationArg | undefined, offset: number, textType: LiteralType = 'string'): Value {
  if (!arg) return { kind: 'unknown', reason: 'missing argument', offset };
  switch (arg.type) {
    case 'int':
      return literal('int', offset, arg.value === undefined ? {} : { value: arg.value });
    case 'bool':
      return literal('bool', offset, { value: arg.value });
    case 'float':
      return literal('float', offset, { value: arg.value });
    case 'text':
      return literal(textType, offset, { value: arg.value, ...(arg.truncated ? { byteLength: arg.byteLength } : {}) });
    case 'bytes':
      return literal('bytes', offset, { byteLength: arg.value.byteLength });
    case 'pair':
      return { kind: 'unknown', reason: 'unexpected module/name argument', offset };
  }
}

function intArg(op: Operation): number {
  const arg = op.arg;
  if (arg?.type === 'int' && typeof arg.value === 'number') return arg.value;
  throw new ScanError('TruncatedStream', `${op.opcode}: malformed integer argument`, { offset: op.offset });
}

/** Argument tuples are unpacked so a call renders as `f(a, b)`. */
function callArgs(v: Value): Value[] {
  return v.kind === 'literal' && v.type === 'tuple' ? [...(v.items ?? [])] : [v];
}

const PREVIEW_BYTES = 256;

function bytesPreview(arg: OperationArg | undefined): string {
  if (arg?.type !== 'bytes') return '';
  const view = arg.value.subarray(0, PREVIEW_BYTES);
  return Buffer.from(view.buffer, view.byteOffset, view.byteLength).toString('latin1');
}

/**
 * Abstract interpreter for one stream. Mirrors the stack and memo discipline
 * of the real protocol over Value tokens only; call-like opcodes record a
 * ConstructedValue instead of calling anything.
 */
class GraphBuilder {
  readonly stack: Value[] = [];
  readonly memo = new Map<number, Value>();
  readonly nodes: CapabilityNode[] = [];
  root?: Value;
  end?: number;

  constructor(private readonly limits: ScanLimits) {}

  private underflow(op: Operation, detail: string): ScanError {
    return new ScanError('StackUnderflow', `${op.opcode}: ${detail}`, { offset: op.offset });
  }

  private push(v: Value): void {
    this.stack.push(v);
  }

  private pop(op: Operation): Value {
    const v = this.stack[this.stack.length - 1];
    if (!v) throw this.underflow(op, 'pop from empty stack');
    if (v.kind === 'mark') throw this.underflow(op, 'pop through mark');
    this.stack.pop();
    return v;
  }

  private top(op: Operation): Value {
    const v = this.stack[this.stack.length - 1];
    if (!v) throw this.underflow(op, 'empty stack');
    if (v.kind === 'mark') throw this.underflow(op, 'no value above mark');
    return v;
  }

  private popMark(op: Operation): Value[] {
    let i = this.stack.length - 1;
    while (i >= 0 && this.stack[i]?.kind !== 'mark') i--;
    if (i < 0) throw this.underflow(op, 'no mark on stack');
    const items = this.stack.splice(i + 1);
    this.stack.pop();
    return items;
  }

  private record<T extends CapabilityNode>(op: Operation, node: T): T {
    this.nodes.push(node);
    if (this.nodes.length > this.limits.maxGraphNodes) {
      throw new ScanError('StreamTooLarge', `more than ${this.limits.maxGraphNodes} graph nodes`, { offset: op.offset });
    }
    return node;
  }

  private call(op: Operation, callee: Value, args: Value[]): ConstructedValue {
    return this.record(op, { kind: 'constructed', callee, args, via: op.opcode, offset: op.offset });
  }

  private global(op: Operation, module: string, name: string): GlobalValue {
    return this.record(op, { kind: 'global', module, name, offset: op.offset });
  }

  private memoize(op: Operation, id: number, v: Value): void {
    this.memo.set(id, v);
    if (this.memo.size > this.limits.maxMemoEntries) {
      throw new ScanError('StreamTooLarge', `more than ${this.limits.maxMemoEntries} memo entries`, { offset: op.offset });
    }
  }

  /**
   * Adds items to a literal container in place; anything else would have its
   * own append/update method called, which is recorded as a call node.
   */
  private extend(op: Operation, target: Value, items: Value[], accepts: LiteralType[]): void {
    if (target.kind === 'literal' && accepts.includes(target.type)) {
      const into = (target.items ??= []);
      for (const item of items) into.push(item);
      return;
    }
    this.call(op, target, items);
  }

  apply(op: Operation): void {
    switch (op.opcode) {
      case 'PROTO':
      case 'FRAME':
        return;
      case 'STOP':
        this.root = this.pop(op);
        this.end = op.offset + 1;
        return;
      case 'MARK':
        this.push({ kind: 'mark', offset: op.offset });
        return;
      case 'POP':
        if (!this.stack.pop()) throw this.underflow(op, 'pop from empty stack');
        return;
      case 'POP_MARK':
        this.popMark(op);
        return;
      case 'DUP':
        this.push(this.top(op));
        return;

      case 'NONE':
        this.push(literal('none', op.offset));
        return;
      case 'NEWTRUE':
      case 'NEWFALSE':
        this.push(literal('bool', op.offset, { value: op.opcode === 'NEWTRUE' }));
        return;
      case 'INT':
      case 'BININT':
      case 'BININT1':
      case 'BININT2':
      case 'LONG':
      case 'LONG1':
      case 'LONG4':
      case 'FLOAT':
      case 'BINFLOAT':
      case 'STRING':
      case 'BINSTRING':
      case 'SHORT_BINSTRING':
      case 'UNICODE':
      case 'BINUNICODE':
      case 'SHORT_BINUNICODE':
      case 'BINUNICODE8':
        this.push(argLiteral(op.arg, op.offset));
        return;
      case 'BINBYTES':
      case 'SHORT_BINBYTES':
      case 'BINBYTES8':
      case 'BYTEARRAY8':
        this.push(
          literal('bytes', op.offset, {
            value: bytesPreview(op.arg),
            byteLength: op.arg?.type === 'bytes' ? op.arg.value.byteLength : 0,
          })
        );
        return;
      case 'NEXT_BUFFER':
        this.push(literal('buffer', op.offset));
        return;
      case 'READONLY_BUFFER':
        this.top(op);
        return;

      case 'EMPTY_LIST':
        this.push(literal('list', op.offset, { items: [] }));
        return;
      case 'EMPTY_DICT':
        this.push(literal('dict', op.offset, { items: [] }));
        return;
      case 'EMPTY_TUPLE':
        this.push(literal('tuple', op.offset, { items: [] }));
        return;
      case 'EMPTY_SET':
        this.push(literal('set', op.offset, { items: [] }));
        return;
      case 'LIST':
        this.push(literal('list', op.offset, { items: this.popMark(op) }));
        return;
      case 'DICT':
        this.push(literal('dict', op.offset, { items: this.popMark(op) }));
        return;
      case 'TUPLE':
        this.push(literal('tuple', op.offset, { items: this.popMark(op) }));
        return;
      case 'FROZENSET':
        this.push(literal('frozenset', op.offset, { items: this.popMark(op) }));
        return;
      case 'TUPLE1':
      case 'TUPLE2':
      case 'TUPLE3': {
        const n = op.opcode === 'TUPLE1' ? 1 : op.opcode === 'TUPLE2' ? 2 : 3;
        const items: Value[] = [];
        for (let i = 0; i < n; i++) items.unshift(this.pop(op));
        this.push(literal('tuple', op.offset, { items }));
        return;
      }

      case 'APPEND': {
        const v = this.pop(op);
        this.extend(op, this.top(op), [v], ['list']);
        return;
      }
      case 'APPENDS': {
        const items = this.popMark(op);
        this.extend(op, this.top(op), items, ['list']);
        return;
      }
      case 'SETITEM': {
        const v = this.pop(op);
        const k = this.pop(op);
        this.extend(op, this.top(op), [k, v], ['dict']);
        return;
      }
      case 'SETITEMS': {
        const items = this.popMark(op);
        this.extend(op, this.top(op), items, ['dict']);
        return;
      }
      case 'ADDITEMS': {
        const items = this.popMark(op);
        this.extend(op, this.top(op), items, ['set']);
        return;
      }

      case 'GET':
      case 'BINGET':
      case 'LONG_BINGET': {
        const id = intArg(op);
        this.push(this.memo.get(id) ?? { kind: 'memoized', id, offset: op.offset });
        return;
      }
      case 'PUT':
      case 'BINPUT':
      case 'LONG_BINPUT':
        this.memoize(op, intArg(op), this.top(op));
        return;
      case 'MEMOIZE':
        this.memoize(op, this.memo.size, this.top(op));
        return;

      case 'GLOBAL': {
        const arg = op.arg;
        if (arg?.type !== 'pair') throw new ScanError('TruncatedStream', 'GLOBAL: missing module/name', { offset: op.offset });
        this.push(this.global(op, arg.module, arg.name));
        return;
      }
      case 'STACK_GLOBAL': {
        const name = this.pop(op);
        const module = this.pop(op);
        if (module.kind === 'literal' && module.type === 'string' && name.kind === 'literal' && name.type === 'string') {
          this.push(this.global(op, String(module.value ?? ''), String(name.value ?? '')));
        } else {
          this.push({ kind: 'unknown', reason: 'STACK_GLOBAL with non-string operands', offset: op.offset });
        }
        return;
      }
      case 'INST': {
        const arg = op.arg;
        if (arg?.type !== 'pair') throw new ScanError('TruncatedStream', 'INST: missing module/name', { offset: op.offset });
        const args = this.popMark(op);
        const callee = this.global(op, arg.module, arg.name);
        this.push(this.call(op, callee, args));
        return;
      }
      case 'OBJ': {
        const items = this.popMark(op);
        const callee = items.shift();
        if (!callee) throw this.underflow(op, 'no class above mark');
        this.push(this.call(op, callee, items));
        return;
      }
      case 'REDUCE': {
        const args = this.pop(op);
        const callee = this.pop(op);
        this.push(this.call(op, callee, callArgs(args)));
        return;
      }
      case 'NEWOBJ': {
        const args = this.pop(op);
        const cls = this.pop(op);
        this.push(this.call(op, cls, callArgs(args)));
        return;
      }
      case 'NEWOBJ_EX': {
        const kwargs = this.pop(op);
        const args = this.pop(op);
        const cls = this.pop(op);
        this.push(this.call(op, cls, [...callArgs(args), kwargs]));
        return;
      }
      case 'BUILD': {
        const state = this.pop(op);
        const inst = this.pop(op);
        this.push(this.call(op, inst, [state]));
        return;
      }
      case 'EXT1':
      case 'EXT2':
      case 'EXT4': {
        const registry: GlobalValue = { kind: 'global', module: 'copyreg', name: '_extension_registry', offset: op.offset };
        this.push(this.call(op, registry, [literal('int', op.offset, { value: intArg(op) })]));
        return;
      }
      case 'PERSID':
        this.push(this.call(op, { kind: 'unknown', reason: 'persistent_load', offset: op.offset }, [argLiteral(op.arg, op.offset)]));
        return;
      case 'BINPERSID': {
        const pid = this.pop(op);
        this.push(this.call(op, { kind: 'unknown', reason: 'persistent_load', offset: op.offset }, [pid]));
        return;
      }
    }
  }
}

function children(v: Value): readonly Value[] {
  if (v.kind === 'literal') return v.items ?? [];
  if (v.kind === 'constructed') return [v.callee, ...v.args];
  return [];
}

/**
 * Nodes reachable from `roots`, visiting each value once so memo cycles
 * (a list appended to itself) terminate; stops after `maxVisits`.
 */
export function collectReachable(
  roots: readonly Value[],
  maxVisits: number
): { reachable: Set<CapabilityNode>; truncated: boolean } {
  const seen = new Set<Value>();
  const reachable = new Set<CapabilityNode>();
  const queue: Value[] = [...roots];
  let truncated = false;

  while (queue.length) {
    const v = queue.pop();
    if (!v || seen.has(v)) continue;
    if (seen.size >= maxVisits) {
      truncated = true;
      break;
    }
    seen.add(v);
    if (isCapabilityNode(v)) reachable.add(v);
    for (const child of children(v)) if (!seen.has(child)) queue.push(child);
  }

  return { reachable, truncated };
}

/**
 * Runs the abstract interpreter over a stream's operations. Reader and
 * stack-discipline failures do not throw: they come back as `error` next to
 * the graph built so far, which is still worth classifying.
 */
export function buildCapabilityGraph(operations: Iterable<Operation>, options: BuildOptions = {}): BuildResult {
  const limits = options.limits ?? DEFAULT_LIMITS;
  const b = new GraphBuilder(limits);
  let error: ScanError | undefined;

  try {
    for (const op of operations) {
      b.apply(op);
      if (b.end !== undefined) break;
    }
  } catch (err) {
    if (!isScanError(err)) throw err;
    error = err;
  }

  const roots = b.root ? [b.root] : b.stack.filter((v) => v.kind !== 'mark');
  const { reachable, truncated } = collectReachable(roots, limits.maxTraversalNodes);

  return {
    graph: {
      ...(b.root ? { root: b.root } : {}),
      nodes: b.nodes,
      reachable,
      truncated,
    },
    ...(error ? { error } : {}),
    ...(b.end !== undefined ? { end: b.end } : {}),
  };
}
