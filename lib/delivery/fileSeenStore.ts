import { readFile, rename, writeFile } from "node:fs/promises";
import type { SeenStore } from "./types";
import { SeenStateSchema, toSeenState } from "./stateDocument";

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Seen-set in a JSON file. A missing file is an empty set (first run);
 * a file that exists but does not parse is an error, never an implicit bootstrap.
 */
export class FileSeenStore implements SeenStore {
  constructor(private readonly path: string) {}

  async load(): Promise<Set<string>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (e) {
      if (isMissingFile(e)) return new Set();
      throw e;
    }
    const parsed = SeenStateSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Invalid state file ${this.path}: ${parsed.error.message}`);
    }
    return new Set(parsed.data.seen);
  }

  async save(uids: ReadonlySet<string>): Promise<void> {
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, `${JSON.stringify(toSeenState(uids), null, 2)}\n`, "utf-8");
    await rename(tmp, this.path);
  }
}
