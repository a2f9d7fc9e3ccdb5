import { z } from "zod";

/** On-disk / Firestore shape of the seen-set. Extra keys are tolerated and dropped. */
export const SeenStateSchema = z.object({
  seen: z.array(z.string()),
});

export type SeenState = z.infer<typeof SeenStateSchema>;

/** Sorted so that successive commits diff cleanly. */
export function toSeenState(uids: ReadonlySet<string>): SeenState {
  return { seen: [...uids].sort() };
}
