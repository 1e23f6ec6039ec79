/**
 * Ordered, nested string map backed by a YAML document
 *
 * Wraps nodes of a `yaml` document so that comments, key order and formatting
 * of everything that was not touched survive a read-modify-write cycle.
 * Leaves are always strings: documents are read with the failsafe schema, so
 * `pat: 0123` stays "0123" instead of becoming a number.
 */

import {
  Document,
  Pair,
  Scalar,
  YAMLMap,
  isMap,
  isScalar,
  parseDocument,
  type Node,
} from "yaml";

const SCHEMA = "failsafe";

export type YamlMapErrorKind = "invalid-yaml" | "invalid-format" | "not-found";

export class YamlMapError extends Error {
  readonly kind: YamlMapErrorKind;

  constructor(kind: YamlMapErrorKind, message: string) {
    super(message);
    this.name = "YamlMapError";
    this.kind = kind;
  }
}

// Maps changed since load, keyed by node so every wrapper sees the same flag
const modifiedNodes = new WeakSet<YAMLMap>();

function keyOf(pair: Pair<unknown, unknown>): string {
  return isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
}

function isEmptyScalar(value: unknown): value is Scalar {
  return isScalar(value) && (value.value === null || value.value === "");
}

function prependComment(key: Scalar, comment: string): void {
  key.commentBefore = key.commentBefore
    ? `${comment}\n${key.commentBefore}`
    : comment;
}

// The line holding `key:` has a comment after the colon
function hasInlineComment(source: string, key: unknown): boolean {
  if (!isScalar(key) || !key.range) return false;
  const start = key.range[0];
  const end = source.indexOf("\n", start);
  const line = source.slice(start, end === -1 ? undefined : end);
  return line.slice(line.indexOf(":") + 1).trim().startsWith("#");
}

/**
 * The parser hands comment lines that follow a key with no value to that
 * empty value, so they would print on the key's line. Move them to the next
 * key instead; whatever reaches the end of a map moves up to the parent's
 * next key. Returns the comment left over at the end of `map`.
 */
function reattachComments(map: YAMLMap, source: string): string | undefined {
  let pending: string | undefined;
  for (const pair of map.items) {
    if (pending !== undefined) {
      const key = isScalar(pair.key) ? pair.key : new Scalar(pair.key);
      prependComment(key, pending);
      pair.key = key;
      pending = undefined;
    }

    const value = pair.value;
    if (isMap(value)) {
      pending = reattachComments(value, source);
    } else if (isEmptyScalar(value) && value.comment) {
      if (hasInlineComment(source, pair.key)) {
        const newline = value.comment.indexOf("\n");
        if (newline !== -1) {
          pending = value.comment.slice(newline + 1);
          value.comment = value.comment.slice(0, newline);
        }
      } else {
        pending = value.comment;
        value.comment = undefined;
      }
    }
  }
  return pending;
}

export class YamlMap {
  readonly node: Node;
  private readonly doc: Document | null;

  private constructor(node: Node, doc: Document | null = null) {
    this.node = node;
    this.doc = doc;
  }

  /**
   * Parse a YAML document whose root must be a mapping.
   * An empty document yields an empty map.
   */
  static parse(text: string): YamlMap {
    const doc = parseDocument(text, { schema: SCHEMA });
    if (doc.errors.length > 0) {
      throw new YamlMapError("invalid-yaml", doc.errors[0].message);
    }

    const contents = doc.contents;
    if (contents === null) {
      // Comment-only or blank file: keep its comments around a fresh mapping
      const root = new YAMLMap();
      const fresh = new Document(undefined, { schema: SCHEMA });
      fresh.commentBefore = doc.commentBefore;
      fresh.comment = doc.comment;
      fresh.contents = root;
      return new YamlMap(root, fresh);
    }
    if (!isMap(contents)) {
      throw new YamlMapError(
        "invalid-format",
        "top-level value must be a mapping",
      );
    }
    const trailing = reattachComments(contents, text);
    if (trailing !== undefined) {
      doc.comment = doc.comment ? `${trailing}\n${doc.comment}` : trailing;
    }
    return new YamlMap(contents, doc);
  }

  static mapValue(): YamlMap {
    return new YamlMap(new YAMLMap());
  }

  static stringValue(value: string): YamlMap {
    return new YamlMap(new Scalar(value));
  }

  /** Leaf value; maps and sequences read as "" */
  get value(): string {
    if (!isScalar(this.node)) return "";
    const raw = this.node.value;
    return raw === null || raw === undefined ? "" : String(raw);
  }

  isMap(): boolean {
    return isMap(this.node);
  }

  empty(): boolean {
    return !isMap(this.node) || this.node.items.length === 0;
  }

  keys(): string[] {
    if (!isMap(this.node)) return [];
    return this.node.items.map(keyOf);
  }

  /**
   * Look up a direct child, returning undefined when it does not exist
   */
  lookup(key: string): YamlMap | undefined {
    const pair = this.findPair(key);
    if (!pair) return undefined;
    const value = pair.value;
    if (value === null || value === undefined) {
      return YamlMap.stringValue("");
    }
    if (isMap(value) || isScalar(value)) {
      return new YamlMap(value);
    }
    return new YamlMap(new Scalar(""));
  }

  findEntry(key: string): YamlMap {
    const entry = this.lookup(key);
    if (!entry) {
      throw new YamlMapError("not-found", `key "${key}" not found`);
    }
    return entry;
  }

  addEntry(key: string, value: YamlMap): void {
    this.requireMap().items.push(new Pair(new Scalar(key), value.node));
    this.setModified();
  }

  /**
   * Replace the value of `key`, adding it when missing. Replacing a scalar
   * with a scalar keeps the original node and any comment attached to it.
   */
  setEntry(key: string, value: YamlMap): void {
    const map = this.requireMap();
    const pair = this.findPair(key);
    if (!pair) {
      map.items.push(new Pair(new Scalar(key), value.node));
    } else if (isScalar(pair.value) && isScalar(value.node)) {
      pair.value.value = value.node.value;
    } else {
      pair.value = value.node;
    }
    this.setModified();
  }

  removeEntry(key: string): void {
    if (!isMap(this.node)) {
      throw new YamlMapError("not-found", `key "${key}" not found`);
    }
    const index = this.node.items.findIndex((pair) => keyOf(pair) === key);
    if (index === -1) {
      throw new YamlMapError("not-found", `key "${key}" not found`);
    }
    this.node.items.splice(index, 1);
    this.setModified();
  }

  /**
   * Attach a subtree without marking this map modified. Used to graft a
   * subtree that persists to another file into this tree.
   */
  attachEntry(key: string, value: YamlMap): void {
    const map = this.requireMap();
    const pair = this.findPair(key);
    if (pair) {
      pair.value = value.node;
    } else {
      map.items.push(new Pair(new Scalar(key), value.node));
    }
  }

  /**
   * Run `fn` with `key` temporarily detached from this map. The entry is put
   * back at its original position even when `fn` throws, and the modified
   * flag is left as it was.
   */
  withoutEntry<T>(key: string, fn: () => T): T {
    if (!isMap(this.node)) return fn();
    const items = this.node.items;
    const index = items.findIndex((pair) => keyOf(pair) === key);
    if (index === -1) return fn();

    const [detached] = items.splice(index, 1);
    try {
      return fn();
    } finally {
      items.splice(index, 0, detached);
    }
  }

  /** True when this map or any nested map changed since load */
  isModified(): boolean {
    if (!isMap(this.node)) return false;
    if (modifiedNodes.has(this.node)) return true;
    return this.node.items.some(
      (pair) => isMap(pair.value) && new YamlMap(pair.value).isModified(),
    );
  }

  setModified(): void {
    if (isMap(this.node)) {
      modifiedNodes.add(this.node);
    }
  }

  /** Clear the modified flag on this map and every nested map */
  setUnmodified(): void {
    if (!isMap(this.node)) return;
    modifiedNodes.delete(this.node);
    for (const pair of this.node.items) {
      if (isMap(pair.value)) {
        new YamlMap(pair.value).setUnmodified();
      }
    }
  }

  toString(): string {
    if (this.doc) {
      return this.doc.toString();
    }
    const doc = new Document(undefined, { schema: SCHEMA });
    doc.contents = this.node;
    return doc.toString();
  }

  private findPair(key: string): Pair<unknown, unknown> | undefined {
    if (!isMap(this.node)) return undefined;
    return this.node.items.find((pair) => keyOf(pair) === key);
  }

  private requireMap(): YAMLMap<unknown, unknown> {
    if (!isMap(this.node)) {
      throw new YamlMapError("invalid-format", "value is not a mapping");
    }
    return this.node;
  }
}
