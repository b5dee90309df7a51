/**
 * Readable half of a caller-owned location
 */
export interface Getter<T> {
  get(): T;
}

/**
 * Writable half of a caller-owned location
 */
export interface Setter<T> {
  set(value: T): void;
}

/**
 * Accessor pair over a caller-owned location. Bindings hold refs, never
 * the values themselves.
 */
export interface Ref<T> extends Getter<T>, Setter<T> {}

/**
 * Ref over `target[key]`.
 *
 * @example
 * ```typescript
 * const post = { coverId: "file_1", coverUrl: "" };
 * single(ref(post, "coverId"), ref(post, "coverUrl"));
 * ```
 */
export function ref<O extends object, K extends keyof O>(target: O, key: K): Ref<O[K]> {
  return {
    get: () => target[key],
    set: (value) => {
      target[key] = value;
    },
  };
}

/**
 * Ref over a standalone value, readable back through `get`.
 */
export function cell<T>(initial: T): Ref<T> {
  let value = initial;
  return {
    get: () => value,
    set: (next) => {
      value = next;
    },
  };
}
