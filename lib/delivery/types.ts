import type { EventRecord } from "@/types";

/** Persisted set of every uid ever observed. */
export interface SeenStore {
  load(): Promise<Set<string>>;
  /** Replace the persisted set. Called at most once per run. */
  save(uids: ReadonlySet<string>): Promise<void>;
}

export interface Notifier {
  send(event: EventRecord): Promise<void>;
}
