export type Restore = () => void;

export interface Checkpointable {
  checkpoint(): Restore;
  clear(): void;
}

export type StoreState = { readonly [name: string]: Checkpointable };

/**
 * Owns every collection of a model so that they can be saved and put back
 * as one snapshot.
 */
export class Store<S extends StoreState> {
  constructor(public readonly state: S) {}

  public checkpoint(): Restore {
    const restores = Object.values(this.state).map((collection) =>
      collection.checkpoint()
    );
    return () => {
      for (const restore of restores) restore();
    };
  }

  public clear(): void {
    for (const collection of Object.values(this.state)) collection.clear();
  }
}
