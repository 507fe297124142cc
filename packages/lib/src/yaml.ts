/**
 * Ordered patch operations on parsed YAML documents. A patch list is the
 * contract between a generated default config and this local topology, so
 * operations run strictly in list order and a later `set` of the same path
 * wins.
 */
import { readFile, writeFile } from "node:fs/promises";
import YAML, { Document, YAMLMap, YAMLSeq, isCollection, isMap, isSeq } from "yaml";
import type { Node as YamlNode } from "yaml";
import { SynapseEnvError } from "./errors.ts";

export type PatchPath = readonly (string | number)[];

export type PatchValue = string | number | boolean | null | readonly PatchValue[] | { readonly [key: string]: PatchValue };

export type YamlPatch =
  | { op: "set"; path: PatchPath; value: PatchValue }
  | { op: "delete"; path: PatchPath }
  | { op: "append"; path: PatchPath; value: PatchValue };

export const MANAGED_MARKER = "This file is managed by synapse-env";

/**
 * Split a dotted key path with numeric indexes, e.g.
 * `listeners[0].bind_addresses[0]` -> ["listeners", 0, "bind_addresses", 0].
 */
export function parsePath(expression: string): PatchPath {
  const segments: (string | number)[] = [];
  for (const part of expression.split(".")) {
    const match = /^([^[\]]*)((?:\[\d+\])*)$/.exec(part);
    if (!match) throw new SynapseEnvError("generate_failed", `invalid patch path: ${expression}`);
    const [, key, indexes] = match;
    if (key) segments.push(key);
    for (const index of (indexes ?? "").matchAll(/\[(\d+)\]/g)) segments.push(Number(index[1]));
  }
  return segments;
}

export function setAt(path: string, value: PatchValue): YamlPatch {
  return { op: "set", path: parsePath(path), value };
}

export function deleteAt(path: string): YamlPatch {
  return { op: "delete", path: parsePath(path) };
}

export function appendAt(path: string, value: PatchValue): YamlPatch {
  return { op: "append", path: parsePath(path), value };
}

export function formatPath(path: PatchPath): string {
  return path.map((segment, i) => (typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`)).join("");
}

// `get` is overloaded on both classes, so it cannot be called on the union;
// each branch narrows to one class first.
function childOf(node: YAMLMap | YAMLSeq, key: string | number): unknown {
  return isMap(node) ? node.get(key, true) : node.get(key, true);
}

function emptyCollectionFor(nextKey: string | number): YAMLMap | YAMLSeq {
  return typeof nextKey === "number" ? new YAMLSeq() : new YAMLMap();
}

/** Walk to the parent of the last segment, creating collections on the way. */
function ensureParent(doc: Document, path: PatchPath): YAMLMap | YAMLSeq {
  const [first] = path;
  if (first === undefined) throw new SynapseEnvError("generate_failed", "empty patch path");
  let root = doc.contents;
  if (!isCollection(root)) {
    root = emptyCollectionFor(first);
    doc.contents = root;
  }

  let node: YAMLMap | YAMLSeq = root;
  for (let i = 0; i < path.length - 1; i += 1) {
    const key = path[i];
    const next = path[i + 1];
    if (key === undefined || next === undefined) break;
    const child = childOf(node, key);
    if (isCollection(child)) {
      node = child;
      continue;
    }
    const created = emptyCollectionFor(next);
    node.set(key, created);
    node = created;
  }
  return node;
}

function findParent(doc: Document, path: PatchPath): YAMLMap | YAMLSeq | undefined {
  let node: unknown = doc.contents;
  for (const key of path.slice(0, -1)) {
    if (!isCollection(node)) return undefined;
    node = childOf(node, key);
  }
  return isCollection(node) ? node : undefined;
}

function applyPatch(doc: Document, patch: YamlPatch): void {
  const last = patch.path[patch.path.length - 1];
  if (last === undefined) throw new SynapseEnvError("generate_failed", "empty patch path");

  switch (patch.op) {
    case "set": {
      ensureParent(doc, patch.path).set(last, doc.createNode(patch.value));
      return;
    }
    case "delete": {
      findParent(doc, patch.path)?.delete(last);
      return;
    }
    case "append": {
      const target: unknown = doc.getIn(patch.path, true);
      if (target === undefined || target === null) {
        ensureParent(doc, patch.path).set(last, doc.createNode([patch.value]));
        return;
      }
      if (!isSeq(target)) {
        throw new SynapseEnvError("generate_failed", `cannot append to ${formatPath(patch.path)}: not a sequence`);
      }
      target.add(doc.createNode(patch.value));
      return;
    }
  }
}

export function applyPatches(doc: Document, patches: readonly YamlPatch[]): void {
  for (const patch of patches) applyPatch(doc, patch);
}

export function parseYamlDocument(content: string, source: string = "document"): Document {
  const doc = YAML.parseDocument<YamlNode>(content);
  if (doc.errors.length > 0) {
    const [first] = doc.errors;
    throw new SynapseEnvError("generate_failed", `could not parse ${source}: ${first?.message ?? "unknown error"}`);
  }
  return doc;
}

/** Put the managed-by marker above any comment the document already has, once. */
export function markManaged(doc: Document, marker: string = MANAGED_MARKER): void {
  const line = ` ${marker}`;
  const existing = doc.commentBefore;
  if (!existing) doc.commentBefore = line;
  else if (!existing.split("\n").includes(line)) doc.commentBefore = `${line}\n${existing}`;
}

export function stringifyYamlDocument(doc: Document): string {
  return doc.toString({ indent: 2, lineWidth: 0 });
}

/** Render a plain value as a managed YAML file. */
export function stringifyManagedYaml(value: unknown): string {
  const doc = new Document(value);
  markManaged(doc);
  return stringifyYamlDocument(doc);
}

/** Parse, patch, mark as managed and re-serialize. */
export function patchYamlText(content: string, patches: readonly YamlPatch[], source?: string): string {
  const doc = parseYamlDocument(content, source);
  applyPatches(doc, patches);
  markManaged(doc);
  return stringifyYamlDocument(doc);
}

export async function patchYamlFile(file: string, patches: readonly YamlPatch[]): Promise<void> {
  await writeFile(file, patchYamlText(await readFile(file, "utf8"), patches, file));
}
