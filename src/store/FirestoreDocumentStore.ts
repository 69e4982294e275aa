import * as admin from 'firebase-admin';
import { z } from 'zod';
import { DocumentStore, WithId } from './DocumentStore';
import { EnvironmentConfig } from '../config/config';

/**
 * Firestore-backed collection.
 *
 * Documents are validated with a zod schema when read. A hand-edited
 * record that fails validation is logged and skipped: getAll() leaves it
 * out and getById()/findOne() treat it as missing.
 * update() uses Firestore's update(), which replaces named top-level
 * fields whole (a nested map such as availability is not deep-merged).
 */
export class FirestoreDocumentStore<D extends object> implements DocumentStore<D> {
  constructor(
    private db: admin.firestore.Firestore,
    private collectionName: string,
    private schema: z.ZodType<D, z.ZodTypeDef, unknown>
  ) {}

  private collection(): admin.firestore.CollectionReference {
    return this.db.collection(this.collectionName);
  }

  async getAll(): Promise<WithId<D>[]> {
    const snapshot = await this.collection().get();
    return readDocuments(this.schema, this.collectionName, snapshot.docs);
  }

  async getById(id: string): Promise<WithId<D> | null> {
    const doc = await this.collection().doc(id).get();
    return doc.exists ? readDocument(this.schema, this.collectionName, doc) : null;
  }

  async create(data: D): Promise<string> {
    const ref = await this.collection().add(toFirestoreFields(data));
    return ref.id;
  }

  async update(id: string, patch: Partial<D>): Promise<boolean> {
    const ref = this.collection().doc(id);
    const doc = await ref.get();
    if (!doc.exists) return false;

    await ref.update(toFirestoreFields(patch));
    return true;
  }

  async delete(id: string): Promise<boolean> {
    const ref = this.collection().doc(id);
    const doc = await ref.get();
    if (!doc.exists) return false;

    await ref.delete();
    return true;
  }

  async findOne<K extends keyof D>(field: K, value: D[K]): Promise<WithId<D> | null> {
    const snapshot = await this.collection().where(String(field), '==', value).limit(1).get();
    const [doc] = snapshot.docs;
    return doc ? readDocument(this.schema, this.collectionName, doc) : null;
  }
}

// =============================================================================
// SNAPSHOT DECODING
// =============================================================================

/** The part of a Firestore snapshot the store reads */
export interface StoredSnapshot {
  id: string;
  data(): unknown;
}

/**
 * Validate one stored document. Returns null, with a warning, when the
 * document does not match the schema.
 */
export function readDocument<D extends object>(
  schema: z.ZodType<D, z.ZodTypeDef, unknown>,
  collectionName: string,
  doc: StoredSnapshot
): WithId<D> | null {
  const parsed = schema.safeParse(doc.data());
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    console.warn(`[FirestoreDocumentStore] Skipping invalid document ${collectionName}/${doc.id}: ${problems}`);
    return null;
  }
  return { ...parsed.data, id: doc.id };
}

/**
 * Validate a batch of stored documents, keeping only the valid ones.
 */
export function readDocuments<D extends object>(
  schema: z.ZodType<D, z.ZodTypeDef, unknown>,
  collectionName: string,
  docs: StoredSnapshot[]
): WithId<D>[] {
  const documents: WithId<D>[] = [];
  for (const doc of docs) {
    const document = readDocument(schema, collectionName, doc);
    if (document) {
      documents.push(document);
    }
  }
  return documents;
}

/**
 * Firestore rejects undefined values; drop them from the write.
 */
function toFirestoreFields(data: object): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined && key !== 'id') {
      fields[key] = value;
    }
  }
  return fields;
}

/**
 * Initialise the Admin SDK once from the service-account env values.
 */
export function createFirestore(env: EnvironmentConfig): admin.firestore.Firestore {
  if (admin.apps.length === 0) {
    admin.initializeApp({
      credential: admin.credential.cert({
        projectId: env.firebase.projectId,
        clientEmail: env.firebase.clientEmail,
        privateKey: env.firebase.privateKey
      }),
      projectId: env.firebase.projectId
    });
  }
  return admin.firestore();
}
