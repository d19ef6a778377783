type InvokeOf<T> = {
  [K in keyof T]: T[K] extends (...args: any) => void
    ? [K, ...Parameters<T[K]>]
    : never;
}[keyof T];

/**
 * Apply a list of method invocations, in order, to given instance. Each
 * invocation is a tuple holding method name followed by its arguments.
 */
const invokeOnObject = <T>(source: T, invokes: InvokeOf<T>[]): T => {
  for (const [name, ...args] of invokes) {
    const method = source[name];

    if (typeof method !== "function") {
      throw new Error(`"${String(name)}" is not a method`);
    }

    method.apply(source, args);
  }

  return source;
};

export { type InvokeOf, invokeOnObject };
