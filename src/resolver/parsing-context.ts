/** Turns an abstract value into its output, or undefined when it cannot. */
export interface ParsingContext<V, O = V> {
  resolve(value: V): O | undefined;
}

/** Hands values back untouched; for callers that want the raw values. */
export class IdentityContext<V> implements ParsingContext<V, V> {
  resolve(value: V): V {
    return value;
  }
}
