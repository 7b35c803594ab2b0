import {Logger} from "@seqguard/utils";
import {getClassConstraints} from "./declaration.js";
import {isIterable, MutationGuard, toTypeSet} from "./guard.js";
import {HasConstraints} from "./marker.js";
import {ConstrainedListOpts, getDefaultLogger} from "./options.js";
import {AllowedTypeSet, TypeId, formatTypeSet, typeOf} from "./typeId.js";

export type ConstraintSource = "explicit" | "declared" | "inferred";

/**
 * Ordered mutable sequence whose elements must all have a runtime type in its allowed type set.
 *
 * The set is resolved once per instance, from the highest available source:
 * 1. `opts.constraints`
 * 2. the class-level declaration, see `defineConstrained` and `declareConstraints`
 * 3. the distinct runtime types of the initial elements
 *
 * Storage is private, every method that can add an element validates it first. A rejected call
 * throws a `ConstraintError` and leaves the list unchanged.
 */
export class ConstrainedList<T = unknown> implements Iterable<T>, HasConstraints {
  readonly constraintSource: ConstraintSource;
  protected readonly logger: Logger;
  private readonly allowed: AllowedTypeSet;
  private readonly guard: MutationGuard;
  private readonly data: T[];

  constructor(elements: Iterable<T> = [], opts: ConstrainedListOpts = {}) {
    this.logger = opts.logger ?? getDefaultLogger();

    const classConstraints = getClassConstraints(new.target);
    if (opts.constraints !== undefined) {
      this.allowed = toTypeSet(opts.constraints, "construct", this.logger);
      this.constraintSource = "explicit";
    } else if (classConstraints.kind === "fixed") {
      this.allowed = new Set(classConstraints.types);
      this.constraintSource = "declared";
    } else {
      // A non-iterable batch infers nothing, the guard below rejects it
      const items: T[] = isIterable(elements) ? Array.from(elements) : [];
      this.allowed = new Set(items.map((item) => typeOf(item)));
      this.constraintSource = "inferred";
      // Consume generators only once
      if (isIterable(elements)) elements = items;
    }

    this.guard = new MutationGuard(this.allowed, this.logger);
    this.data = this.guard.batch("construct", elements);

    this.logger.debug("Resolved allowed types", {
      source: this.constraintSource,
      types: formatTypeSet(this.allowed),
      length: this.data.length,
    });
  }

  /**
   * Allowed types fixed at class level, empty if the class is open
   */
  static get constraints(): AllowedTypeSet {
    const classConstraints = getClassConstraints(this);
    return classConstraints.kind === "fixed" ? new Set(classConstraints.types) : new Set<TypeId>();
  }

  /**
   * True if the allowed types are resolved per instance
   */
  static get isOpen(): boolean {
    return getClassConstraints(this).kind === "open";
  }

  /**
   * Copy of the resolved allowed types of this instance
   */
  get constraints(): AllowedTypeSet {
    return new Set(this.allowed);
  }

  get length(): number {
    return this.data.length;
  }

  push(value: T): void {
    this.data.push(this.guard.element("push", value));
  }

  /**
   * Insert before `index`. Negative indexes count from the end, out of range indexes are
   * clamped to the start or the end.
   */
  insert(index: number, value: T): void {
    this.guard.element("insert", value);
    this.guard.integer("insert", index);
    const length = this.data.length;
    const position = index < 0 ? Math.max(0, length + index) : Math.min(index, length);
    this.data.splice(position, 0, value);
  }

  set(index: number, value: T): void {
    this.guard.element("set", value);
    this.data[this.guard.index("set", index, this.data.length)] = value;
  }

  extend(values: Iterable<T>): void {
    this.appendAll(this.guard.batch("extend", values));
  }

  /**
   * Same as `extend`, returning this list
   */
  concatInPlace(values: Iterable<T>): this {
    this.appendAll(this.guard.batch("concatInPlace", values));
    return this;
  }

  /**
   * Repeat the current elements `count` times. A count of zero or less empties the list.
   * Throws if the result would exceed the maximum array length.
   */
  repeatInPlace(count: number): this {
    this.guard.integer("repeatInPlace", count);
    if (count <= 0) {
      this.data.length = 0;
      return this;
    }
    if (this.data.length === 0 || count === 1) {
      return this;
    }
    this.guard.length("repeatInPlace", this.data.length * count);
    const items = this.data.slice();
    for (let i = 1; i < count; i++) {
      this.appendAll(items);
    }
    return this;
  }

  /**
   * Remove and return the element at `index`, the last one by default.
   * Returns undefined if there is no such element, throws if `index` is not an integer.
   */
  pop(index = -1): T | undefined {
    this.guard.integer("pop", index);
    const length = this.data.length;
    const position = index < 0 ? length + index : index;
    if (position < 0 || position >= length) {
      return undefined;
    }
    return this.data.splice(position, 1)[0];
  }

  /**
   * Remove the first occurrence of `value`. Returns false if not found.
   */
  remove(value: T): boolean {
    const index = this.data.indexOf(value);
    if (index === -1) return false;
    this.data.splice(index, 1);
    return true;
  }

  clear(): void {
    this.data.length = 0;
  }

  reverse(): this {
    this.data.reverse();
    return this;
  }

  sort(compareFn?: (a: T, b: T) => number): this {
    this.data.sort(compareFn);
    return this;
  }

  /**
   * Element at `index`, negative indexes count from the end. Returns null if out of range.
   */
  get(index: number): T | null {
    const position = index < 0 ? this.data.length + index : index;
    if (!Number.isInteger(position) || position < 0 || position >= this.data.length) {
      return null;
    }
    return this.data[position];
  }

  indexOf(value: T, fromIndex?: number): number {
    return this.data.indexOf(value, fromIndex);
  }

  includes(value: T): boolean {
    return this.data.includes(value);
  }

  count(value: T): number {
    let count = 0;
    for (const item of this.data) {
      if (item === value) count++;
    }
    return count;
  }

  /**
   * New list with the elements in `[start, end)` and the same allowed types, as explicit constraints
   */
  slice(start?: number, end?: number): ConstrainedList<T> {
    return new ConstrainedList(this.data.slice(start, end), {constraints: this.allowed, logger: this.logger});
  }

  copy(): ConstrainedList<T> {
    return this.slice();
  }

  toArray(): T[] {
    return this.data.slice();
  }

  forEach(func: (value: T, index: number) => void): void {
    this.data.forEach((value, index) => func(value, index));
  }

  map<T2>(func: (value: T, index: number) => T2): T2[] {
    return this.data.map((value, index) => func(value, index));
  }

  /**
   * Element-wise strict equality with any iterable, allowed types are not compared
   */
  equals(other: Iterable<unknown>): boolean {
    const items = Array.from(other);
    return items.length === this.data.length && items.every((value, i) => value === this.data[i]);
  }

  *[Symbol.iterator](): Generator<T> {
    yield* this.data;
  }

  toString(): string {
    return `${this.constructor.name}(${this.data.length}) [${this.data.map((value) => String(value)).join(", ")}]`;
  }

  toJSON(): T[] {
    return this.toArray();
  }

  private appendAll(items: T[]): void {
    for (const item of items) {
      this.data.push(item);
    }
  }
}
