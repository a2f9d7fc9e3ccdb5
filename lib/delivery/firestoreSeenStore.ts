import { Timestamp } from "firebase-admin/firestore";
import { COLLECTIONS, SEEN_DOC_ID } from "@/lib/firebase/collections";
import type { SeenStore } from "./types";
import { SeenStateSchema, toSeenState, type SeenState } from "./stateDocument";

export type SeenStateDocument = SeenState & { updatedAt: Timestamp };

/** The part of the admin Firestore handle the store touches. */
export interface StateDb {
  collection(path: string): {
    doc(id: string): {
      get(): Promise<{ readonly exists: boolean; data(): unknown }>;
      set(data: SeenStateDocument): Promise<unknown>;
    };
  };
}

/** Seen-set as a single Firestore document (state/seen). */
export class FirestoreSeenStore implements SeenStore {
  constructor(
    private readonly db: StateDb,
    private readonly docId: string = SEEN_DOC_ID
  ) {}

  private get ref() {
    return this.db.collection(COLLECTIONS.STATE).doc(this.docId);
  }

  async load(): Promise<Set<string>> {
    const snap = await this.ref.get();
    if (!snap.exists) return new Set();
    const parsed = SeenStateSchema.safeParse(snap.data());
    if (!parsed.success) {
      throw new Error(`Invalid state document ${COLLECTIONS.STATE}/${this.docId}: ${parsed.error.message}`);
    }
    return new Set(parsed.data.seen);
  }

  async save(uids: ReadonlySet<string>): Promise<void> {
    await this.ref.set({ ...toSeenState(uids), updatedAt: Timestamp.now() });
  }
}
