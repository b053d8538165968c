/**
 * Knowledge base: one markdown document per knowledge topic.
 *
 * Reading a topic's document is what studying it means; the tool layer
 * records the topic as studied only after the read succeeded.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { KnowledgeTopic } from "../gate/requirements.js";
import { CollaboratorError } from "./errors.js";

/** The knowledge/ directory shipped beside src/ and dist/. */
export const DEFAULT_KNOWLEDGE_DIR = fileURLToPath(
  new URL("../../knowledge/", import.meta.url),
);

export class KnowledgeBase {
  public readonly directory: string;

  constructor(directory: string = DEFAULT_KNOWLEDGE_DIR) {
    this.directory = directory;
  }

  read(topic: KnowledgeTopic): string {
    const file = join(this.directory, `${topic}.md`);
    if (!existsSync(file)) {
      throw new CollaboratorError(
        `No knowledge document for topic "${topic}"`,
        "knowledge",
        "unavailable",
        { topic, file },
      );
    }
    return readFileSync(file, "utf8");
  }
}
