/**
 * Record codec registry
 *
 * Maps entity type names (as they appear in remote object keys) to the entity
 * class and a decoder. The sync layer never switches on concrete classes.
 */

import { parseSyncJSON, type EntityClass, type SyncableRecord } from "../schema/record.js";
import { HabitInstance } from "./habit-instance.js";
import { HabitTemplate } from "./habit-template.js";
import { StepInstance } from "./step-instance.js";
import { StepTemplate } from "./step-template.js";

export interface RecordCodec {
  entityType: string;
  entityClass: EntityClass;
  fromDocument: (value: unknown) => SyncableRecord | null;
}

export const RECORD_CODECS: readonly RecordCodec[] = [
  {
    entityType: HabitTemplate.entityType,
    entityClass: "template",
    fromDocument: HabitTemplate.fromDocument,
  },
  {
    entityType: StepTemplate.entityType,
    entityClass: "template",
    fromDocument: StepTemplate.fromDocument,
  },
  {
    entityType: HabitInstance.entityType,
    entityClass: "instance",
    fromDocument: HabitInstance.fromDocument,
  },
  {
    entityType: StepInstance.entityType,
    entityClass: "instance",
    fromDocument: StepInstance.fromDocument,
  },
];

const codecsByType = new Map(RECORD_CODECS.map((codec) => [codec.entityType, codec]));

export function getRecordCodec(entityType: string): RecordCodec | undefined {
  return codecsByType.get(entityType);
}

export function isKnownEntityType(entityType: string): boolean {
  return codecsByType.has(entityType);
}

/**
 * Entity class for a type name; unknown types are treated as templates so they
 * never outrank instance uploads.
 */
export function entityClassOf(entityType: string): EntityClass {
  return codecsByType.get(entityType)?.entityClass ?? "template";
}

/**
 * Decode a record document (JSON text or parsed value) of the given type.
 * Returns null for unknown types and invalid documents.
 */
export function decodeRecord(entityType: string, document: unknown): SyncableRecord | null {
  const codec = codecsByType.get(entityType);
  if (!codec) return null;

  const value = typeof document === "string" ? parseSyncJSON(document) : document;
  return codec.fromDocument(value);
}
