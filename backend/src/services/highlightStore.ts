import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { StoreCorruptError } from "../errors.js";
import type { HighlightStore, StoredHighlight } from "../types.js";

const storedHighlightSchema = z.object({
  title: z.string(),
  author: z.string(),
  text: z.string().min(1),
  location: z.string().optional(),
  page: z.string().optional(),
  added_at: z.string(),
  theme: z.string().optional()
}).passthrough();

const storeFileSchema = z.array(storedHighlightSchema);

export function parseStoreContent(raw: string, storePath: string): StoredHighlight[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreCorruptError(storePath, "Highlights file is invalid JSON.", { cause: error });
  }

  const result = storeFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? ` at ${issue.path.join(".") || "(root)"}` : "";
    throw new StoreCorruptError(
      storePath,
      `Highlights file does not match the record format${where}.`,
      { cause: result.error }
    );
  }
  return result.data;
}

export function createJsonHighlightStore(storePath: string): HighlightStore {
  return {
    describe: () => storePath,

    async load(): Promise<StoredHighlight[]> {
      let raw = "";
      try {
        raw = await fs.readFile(storePath, "utf8");
      } catch (error) {
        const code = (error as { code?: string }).code;
        if (code === "ENOENT") {
          return [];
        }
        throw new StoreCorruptError(storePath, "Failed to read highlights file.", { cause: error });
      }
      return parseStoreContent(raw, storePath);
    },

    async save(highlights: StoredHighlight[]): Promise<void> {
      const dir = path.dirname(storePath);
      const tempPath = path.join(dir, `.${path.basename(storePath)}.${uuidv4()}.tmp`);
      await fs.mkdir(dir, { recursive: true });
      try {
        await fs.writeFile(tempPath, `${JSON.stringify(highlights, null, 2)}\n`, "utf8");
        await fs.rename(tempPath, storePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    }
  };
}
