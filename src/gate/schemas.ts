/**
 * Zod schemas for values that cross the tool boundary into the gate.
 *
 * Names are trimmed here, once; the gate and the tracker compare names
 * exactly as they arrive.
 */

import { z } from "zod";
import { KNOWLEDGE_TOPICS, RESOURCE_KINDS } from "./requirements.js";

export const KnowledgeTopicSchema = z.enum(KNOWLEDGE_TOPICS);

export const ResourceKindSchema = z.enum(RESOURCE_KINDS);

export const ResourceNameSchema = z.string().trim().min(1).max(512);

export const ResourceNamesSchema = z.array(ResourceNameSchema).max(200);

export const SessionIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(200)
  .regex(/^[\w.:@-]+$/, "Session id may only contain letters, digits and . : @ - _");

export const ResourceRefsSchema = z.record(ResourceKindSchema, ResourceNamesSchema);
