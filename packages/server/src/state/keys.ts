/**
 * Builds the namespaced keys one deployment uses in the shared store.
 */
export class StateKeys {
  constructor(readonly namespace: string) {}

  /** Hash of reserved port -> owning worker */
  get ports(): string {
    return `${this.namespace}:ports`;
  }

  /** Hash of instance id -> JSON instance record */
  get instances(): string {
    return `${this.namespace}:instances`;
  }

  /** List of warm instance ids for one sandbox type */
  pool(type: string): string {
    return `${this.namespace}:pool:${type}`;
  }
}
