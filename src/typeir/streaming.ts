import {
  irMeta,
  nonStreamingMeta,
  streamingMeta,
  hasStreamState,
  hasChecks,
  type IRMeta,
  type MetaBase,
  type StreamingMeta,
} from "./meta";
import type { StreamingMode, TypeGeneric, TypeIR, TypeNonStreaming, TypeStreaming } from "./types";
import type { TypeLookups } from "./definitions";
import { isNullType } from "./union";
import { optionalOf } from "./builders";
import { flattenUnionMembers } from "./simplify";
import { typeEquals } from "./display";
import { mapMeta } from "./visitor";
import type { Outcome } from "../outcome/outcome";
import { done } from "../outcome/constructors";

// =========================================================================
// IR -> Streaming
// =========================================================================

/**
 * Convert an authoring-time type into the shape a partially received value
 * takes. Leaves become optional unless `needed`; classes and aliases switch
 * to their streaming mode; `done` subtrees stay atomic.
 */
export function toStreamingType(t: TypeIR): TypeStreaming {
  return transform(t, 0);
}

function resolvedMeta(t: TypeIR, done: boolean, state: boolean): StreamingMeta {
  return streamingMeta({ constraints: t.meta.constraints, done, state });
}

function transform(t: TypeIR, unionDepth: number): TypeStreaming {
  const { needed, done, state } = t.meta.streamingBehavior;
  const inUnion = unionDepth > 0;

  if (done) {
    const atomic = atomicSubtree(t);
    return inUnion || needed || isNullType(t) ? atomic : optionalOf(atomic, streamingMeta());
  }

  const leaf = (build: (meta: StreamingMeta) => TypeStreaming, atomicLeaf: boolean): TypeStreaming => {
    if (inUnion || needed) {
      return build(resolvedMeta(t, atomicLeaf, state));
    }
    // The state flag moves to the optional wrapper.
    return optionalOf(build(resolvedMeta(t, atomicLeaf, false)), streamingMeta({ state }));
  };

  switch (t.tag) {
    case "Primitive": {
      const value = t.value;
      if (value === "null") {
        return { tag: "Primitive", value, meta: resolvedMeta(t, false, state) };
      }
      return leaf(meta => ({ tag: "Primitive", value, meta }), value !== "string");
    }
    case "Enum": {
      const { name, dynamic } = t;
      return leaf(meta => ({ tag: "Enum", name, dynamic, meta }), true);
    }
    case "Literal": {
      const value = t.value;
      return leaf(meta => ({ tag: "Literal", value, meta }), true);
    }
    case "Top":
      return leaf(meta => ({ tag: "Top", meta }), false);
    case "Class": {
      const { name, dynamic } = t;
      return leaf(meta => ({ tag: "Class", name, mode: "Streaming", dynamic, meta }), false);
    }
    case "RecursiveTypeAlias": {
      const name = t.name;
      return leaf(meta => ({ tag: "RecursiveTypeAlias", name, mode: "Streaming", meta }), false);
    }
    case "List":
      return { tag: "List", item: transform(t.item, 0), meta: resolvedMeta(t, false, state) };
    case "Map":
      return {
        tag: "Map",
        key: transform(t.key, 0),
        value: transform(t.value, 0),
        meta: resolvedMeta(t, false, state),
      };
    case "Tuple":
      return { tag: "Tuple", items: t.items.map(i => transform(i, 0)), meta: resolvedMeta(t, false, state) };
    case "Arrow":
      return {
        tag: "Arrow",
        params: t.params.map(p => transform(p, 0)),
        returns: transform(t.returns, 0),
        meta: resolvedMeta(t, false, state),
      };
    case "Union": {
      const members = flattenUnionMembers(
        t.union.members.map(m => transform(m, unionDepth + 1)),
        m => hasChecks(m) || m.streamingBehavior.done || m.streamingBehavior.state
      );
      const deduped: TypeStreaming[] = [];
      let nullType: TypeStreaming | undefined =
        t.union.nullType === undefined ? undefined : transform(t.union.nullType, unionDepth + 1);
      for (const m of members) {
        if (isNullType(m)) {
          nullType = nullType ?? m;
        } else if (!deduped.some(d => typeEquals(d, m))) {
          deduped.push(m);
        }
      }
      if (nullType === undefined && !inUnion && !needed) {
        nullType = { tag: "Primitive", value: "null", meta: streamingMeta() };
      }
      const meta = resolvedMeta(t, false, state);
      return nullType === undefined
        ? { tag: "Union", union: { members: deduped }, meta }
        : { tag: "Union", union: { members: deduped, nullType }, meta };
    }
  }
}

/** A `done` subtree keeps its non-streaming shape, tagged done at its root. */
function atomicSubtree(root: TypeIR): TypeStreaming {
  return mapMeta<IRMeta, StreamingMeta>(
    root,
    node =>
      streamingMeta({
        constraints: node.meta.constraints,
        done: node === root ? true : node.meta.streamingBehavior.done,
        state: node.meta.streamingBehavior.state,
      }),
    "NonStreaming"
  );
}

// =========================================================================
// Streaming -> IR
// =========================================================================

function isAutoOptionalLeaf<M extends MetaBase>(t: TypeGeneric<M>): boolean {
  switch (t.tag) {
    case "Primitive":
      return t.value !== "null";
    case "Enum":
    case "Literal":
    case "Top":
    case "Class":
    case "RecursiveTypeAlias":
      return true;
    default:
      return false;
  }
}

/**
 * Convert a streaming type back to authoring-time metadata. A leaf (or a
 * null-free union) that is not wrapped by a union must have been `needed`,
 * so that flag is restored.
 */
export function toIrType(t: TypeStreaming): TypeIR {
  return backToIr(t, false);
}

function backToIr(t: TypeStreaming, inUnion: boolean): TypeIR {
  const needed =
    !inUnion && (isAutoOptionalLeaf(t) || (t.tag === "Union" && t.union.nullType === undefined));
  const meta = irMeta({
    constraints: t.meta.constraints,
    streaming: { needed, done: t.meta.streamingBehavior.done, state: t.meta.streamingBehavior.state },
  });
  switch (t.tag) {
    case "Top":
      return { tag: "Top", meta };
    case "Primitive":
      return { tag: "Primitive", value: t.value, meta };
    case "Enum":
      return { tag: "Enum", name: t.name, dynamic: t.dynamic, meta };
    case "Literal":
      return { tag: "Literal", value: t.value, meta };
    case "Class":
      return { tag: "Class", name: t.name, mode: t.mode, dynamic: t.dynamic, meta };
    case "RecursiveTypeAlias":
      return { tag: "RecursiveTypeAlias", name: t.name, mode: t.mode, meta };
    case "List":
      return { tag: "List", item: backToIr(t.item, false), meta };
    case "Map":
      return { tag: "Map", key: backToIr(t.key, false), value: backToIr(t.value, false), meta };
    case "Tuple":
      return { tag: "Tuple", items: t.items.map(i => backToIr(i, false)), meta };
    case "Arrow":
      return { tag: "Arrow", params: t.params.map(p => backToIr(p, false)), returns: backToIr(t.returns, false), meta };
    case "Union": {
      const members = t.union.members.map(m => backToIr(m, true));
      const nullType = t.union.nullType === undefined ? undefined : backToIr(t.union.nullType, true);
      return { tag: "Union", union: nullType === undefined ? { members } : { members, nullType }, meta };
    }
  }
}

// =========================================================================
// IR -> NonStreaming
// =========================================================================

export function toNonStreamingType(t: TypeIR): TypeNonStreaming {
  return mapMeta(t, node => nonStreamingMeta(node.meta.constraints), "NonStreaming");
}

// =========================================================================
// Mode computation
// =========================================================================

/** First failure wins, then the first Streaming; otherwise NonStreaming. */
export function mergeModes(modes: Iterable<Outcome<StreamingMode>>): Outcome<StreamingMode> {
  for (const m of modes) {
    if (m.tag === "Fail" || m.value === "Streaming") return m;
  }
  return done("NonStreaming");
}

/**
 * Mode a value of `t` is read in when its context asks for `mode`. Classes
 * and aliases keep their own mode, leaves are always NonStreaming, and a
 * stateful member two or more union levels deep forces Streaming.
 */
export function streamingMode<M extends MetaBase>(
  t: TypeGeneric<M>,
  mode: StreamingMode,
  lookups: TypeLookups,
  unionDepth = 0
): Outcome<StreamingMode> {
  if (mode === "NonStreaming") return done("NonStreaming");
  if (unionDepth > 1 && hasStreamState(t.meta)) return done("Streaming");

  switch (t.tag) {
    case "Class":
    case "RecursiveTypeAlias":
      return done(t.mode);
    case "Top":
    case "Primitive":
    case "Enum":
    case "Literal":
    case "Arrow":
      return done("NonStreaming");
    case "List":
      return streamingMode(t.item, mode, lookups, unionDepth);
    case "Map":
      return mergeModes([streamingMode(t.key, mode, lookups, unionDepth), streamingMode(t.value, mode, lookups, unionDepth)]);
    case "Tuple":
      return mergeModes(t.items.map(i => streamingMode(i, mode, lookups, unionDepth)));
    case "Union":
      return mergeModes(t.union.members.map(m => streamingMode(m, mode, lookups, unionDepth + 1)));
  }
}

// =========================================================================
// Stream-state wrapper
// =========================================================================

export type CompletionState = "Incomplete" | "Complete";

export interface StreamState<T> {
  readonly value: T;
  readonly state: CompletionState;
}

/**
 * Pair a value with its completion state when the streaming type asks for
 * it; otherwise return the value unchanged.
 */
export function withStreamState<T>(value: T, type: TypeStreaming, state: CompletionState): T | StreamState<T> {
  return type.meta.streamingBehavior.state ? { value, state } : value;
}
