// src/region/document.ts
//
// Typed view over a deserialized BSON tree. Everything the decoders touch is
// converted to DocValue once, at the payload boundary; later stages never see
// raw `unknown` values.

import { Binary, Long } from "bson";

export type DocMap = ReadonlyMap<string, DocValue>;

export type DocValue =
  | Readonly<{ kind: "map"; entries: DocMap }>
  | Readonly<{ kind: "seq"; items: ReadonlyArray<DocValue> }>
  | Readonly<{ kind: "string"; value: string }>
  | Readonly<{ kind: "int"; value: number }>
  | Readonly<{ kind: "long"; value: bigint }>
  | Readonly<{ kind: "float"; value: number }>
  | Readonly<{ kind: "bool"; value: boolean }>
  | Readonly<{ kind: "binary"; value: Uint8Array }>
  | Readonly<{ kind: "null" }>
  | Readonly<{ kind: "other"; description: string }>;

function isPlainObject(v: object): v is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function toDocValue(v: unknown): DocValue {
  if (v === null || v === undefined) return { kind: "null" };
  if (typeof v === "string") return { kind: "string", value: v };
  if (typeof v === "boolean") return { kind: "bool", value: v };
  if (typeof v === "bigint") return { kind: "long", value: v };
  if (typeof v === "number") {
    return Number.isInteger(v) ? { kind: "int", value: v } : { kind: "float", value: v };
  }
  if (typeof v !== "object") return { kind: "other", description: typeof v };

  if (v instanceof Uint8Array) return { kind: "binary", value: v };
  if (v instanceof Binary) return { kind: "binary", value: v.buffer.subarray(0, v.position) };
  if (v instanceof Long) return { kind: "long", value: v.toBigInt() };

  if (Array.isArray(v)) {
    const items: DocValue[] = [];
    for (const item of v) items.push(toDocValue(item));
    return { kind: "seq", items };
  }

  if (isPlainObject(v)) {
    const entries = new Map<string, DocValue>();
    for (const [key, value] of Object.entries(v)) entries.set(key, toDocValue(value));
    return { kind: "map", entries };
  }

  return { kind: "other", description: v.constructor.name };
}

export function docField(value: DocValue, key: string): DocValue | undefined {
  return value.kind === "map" ? value.entries.get(key) : undefined;
}

export function docPath(value: DocValue, path: ReadonlyArray<string>): DocValue | undefined {
  let cur: DocValue | undefined = value;
  for (const key of path) {
    if (cur === undefined) return undefined;
    cur = docField(cur, key);
  }
  return cur;
}

/** Integer-valued scalar as a JS number; longs outside the safe range are rejected. */
export function docInteger(value: DocValue | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (value.kind === "int") return value.value;
  if (value.kind === "long") {
    const n = Number(value.value);
    return Number.isSafeInteger(n) ? n : undefined;
  }
  return undefined;
}
