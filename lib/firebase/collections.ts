export const COLLECTIONS = {
  STATE: "state",
} as const;

export const SEEN_DOC_ID = "seen";
