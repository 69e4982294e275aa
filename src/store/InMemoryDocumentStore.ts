import { v4 as uuidv4 } from 'uuid';
import { DocumentStore, WithId } from './DocumentStore';

/**
 * Map-backed store for tests and local development.
 * Documents are cloned on the way in and out, so callers never share
 * references with stored state.
 */
export class InMemoryDocumentStore<D extends object> implements DocumentStore<D> {
  private documents = new Map<string, WithId<D>>();

  constructor(seed: WithId<D>[] = []) {
    for (const doc of seed) {
      this.documents.set(doc.id, structuredClone(doc));
    }
  }

  async getAll(): Promise<WithId<D>[]> {
    return Array.from(this.documents.values()).map(doc => structuredClone(doc));
  }

  async getById(id: string): Promise<WithId<D> | null> {
    const doc = this.documents.get(id);
    return doc ? structuredClone(doc) : null;
  }

  async create(data: D): Promise<string> {
    const id = uuidv4();
    this.documents.set(id, { ...structuredClone(data), id });
    return id;
  }

  async update(id: string, patch: Partial<D>): Promise<boolean> {
    const existing = this.documents.get(id);
    if (!existing) return false;

    this.documents.set(id, { ...existing, ...structuredClone(patch), id });
    return true;
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }

  async findOne<K extends keyof D>(field: K, value: D[K]): Promise<WithId<D> | null> {
    for (const doc of this.documents.values()) {
      if (doc[field] === value) return structuredClone(doc);
    }
    return null;
  }
}
