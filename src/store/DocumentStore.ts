/**
 * Collection-style persistence used by the services.
 *
 * update() is a partial merge at the top level: fields named in the patch
 * are replaced whole, everything else keeps its stored value. A missing id
 * is reported as false/null, never thrown.
 */

export type WithId<D> = D & { id: string };

export interface DocumentStore<D extends object> {
  getAll(): Promise<WithId<D>[]>;
  getById(id: string): Promise<WithId<D> | null>;

  /** Insert a document and return the id assigned to it */
  create(data: D): Promise<string>;

  /** Merge a partial patch. Returns false when the id does not exist. */
  update(id: string, patch: Partial<D>): Promise<boolean>;

  delete(id: string): Promise<boolean>;

  /** First document whose field equals the value, or null */
  findOne<K extends keyof D>(field: K, value: D[K]): Promise<WithId<D> | null>;
}
