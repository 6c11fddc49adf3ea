import { ForeignHandleError, HandleDisposedError } from './errors';
import type { Checkpointable, Restore } from './store';

/**
 * Identity token for a record cell. Two handles are the same entity only if
 * they are the same token; the record they point at never takes part in
 * equality.
 */
export interface Handle<K extends string = string> {
  readonly kind: K;
  readonly id: number;
}

export const describeHandle = (handle: Handle): string =>
  `${handle.kind}#${handle.id}`;

export class HandleStore<K extends string, T extends object>
  implements Checkpointable
{
  private nextId = 1;
  private readonly cells = new Map<number, T>();
  private readonly issued = new Map<number, Handle<K>>();

  constructor(public readonly kind: K) {}

  public create(value: T): Handle<K> {
    const handle: Handle<K> = Object.freeze({ kind: this.kind, id: this.nextId++ });
    this.cells.set(handle.id, { ...value });
    this.issued.set(handle.id, handle);
    return handle;
  }

  public get(handle: Handle<K>): Readonly<T> {
    return this.cell(handle);
  }

  public set(handle: Handle<K>, value: T): void {
    this.cell(handle);
    this.cells.set(handle.id, { ...value });
  }

  public mutate(handle: Handle<K>, fn: (value: T) => T): void {
    const current = this.cell(handle);
    this.cells.set(handle.id, { ...fn({ ...current }) });
  }

  public dispose(handle: Handle<K>): void {
    this.cell(handle);
    this.cells.delete(handle.id);
    this.issued.delete(handle.id);
  }

  public isAlive(handle: Handle<K>): boolean {
    return this.issued.get(handle.id) === handle && this.cells.has(handle.id);
  }

  /** Number of handles currently issued and not disposed. */
  public get size(): number {
    return this.issued.size;
  }

  public *handles(): IterableIterator<Handle<K>> {
    for (const id of this.cells.keys()) {
      const handle = this.issued.get(id);
      if (handle) yield handle;
    }
  }

  // The id counter is left alone: ids handed out before a rollback stay spent.
  public checkpoint(): Restore {
    const savedCells = new Map(this.cells);
    const savedIssued = new Map(this.issued);
    return () => {
      this.cells.clear();
      this.issued.clear();
      for (const [id, value] of savedCells) this.cells.set(id, value);
      for (const [id, handle] of savedIssued) this.issued.set(id, handle);
    };
  }

  public clear(): void {
    this.cells.clear();
    this.issued.clear();
  }

  private cell(handle: Handle<K>): T {
    const issued = this.issued.get(handle.id);
    if (issued === undefined && handle.kind === this.kind && handle.id < this.nextId) {
      throw new HandleDisposedError(handle.kind, handle.id);
    }
    if (issued !== handle) {
      throw new ForeignHandleError(handle.kind, handle.id, this.kind);
    }
    const value = this.cells.get(handle.id);
    if (!value) {
      throw new HandleDisposedError(handle.kind, handle.id);
    }
    return value;
  }
}
