/**
 * Drain-once scratch buffer a plugin uses to report results to an operator.
 *
 * Not a queue: writing a key again overwrites it, and `take()` hands back
 * everything written since the previous take, leaving the buffer empty.
 */
export class PluginOutput {
  private values: Record<string, unknown> = {};

  set(key: string, value: unknown): void {
    this.values[key] = value;
  }

  merge(values: Record<string, unknown>): void {
    Object.assign(this.values, values);
  }

  get size(): number {
    return Object.keys(this.values).length;
  }

  take(): Record<string, unknown> {
    const drained = this.values;
    this.values = {};
    return drained;
  }
}
