/**
 * HabitInstance - a scheduled occurrence of a habit template.
 *
 * Instance completions are the latency-sensitive records: they upload ahead of
 * template edits when created recently.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import {
  BaseSyncDocumentSchema,
  SyncDateSchema,
  SyncIDSchema,
  encodeSyncDocument,
  formatSyncDate,
  optionalSyncDate,
  type SyncableRecord,
} from "../schema/record.js";

export const HabitInstanceDocumentSchema = BaseSyncDocumentSchema.extend({
  createdAt: SyncDateSchema,
  scheduledDate: SyncDateSchema,
  isCompleted: z.boolean(),
  completedAt: SyncDateSchema.optional(),
  isException: z.boolean().default(false),
  exceptionTitle: z.string().optional(),
  notes: z.string().optional(),
  habitTemplateID: SyncIDSchema.optional(),
  stepInstanceIDs: z.array(SyncIDSchema).default([]),
});

export interface HabitInstanceInit {
  syncID?: string;
  scheduledDate: Date;
  isCompleted?: boolean;
  completedAt?: Date;
  isException?: boolean;
  exceptionTitle?: string;
  notes?: string;
  habitTemplateID?: string;
  stepInstanceIDs?: string[];
  createdAt?: Date;
  lastModified?: Date;
  isDeleted?: boolean;
}

export class HabitInstance implements SyncableRecord {
  static readonly entityType = "HabitInstance";
  readonly entityType = HabitInstance.entityType;

  readonly syncID: string;
  readonly createdAt: Date;
  lastModified: Date;
  isDeleted: boolean;

  scheduledDate: Date;
  isCompleted: boolean;
  completedAt?: Date;
  isException: boolean;
  exceptionTitle?: string;
  notes?: string;
  habitTemplateID?: string;
  stepInstanceIDs: string[];

  constructor(init: HabitInstanceInit) {
    this.syncID = init.syncID ?? randomUUID();
    this.createdAt = init.createdAt ?? new Date();
    this.lastModified = init.lastModified ?? this.createdAt;
    this.isDeleted = init.isDeleted ?? false;
    this.scheduledDate = init.scheduledDate;
    this.isCompleted = init.isCompleted ?? false;
    this.completedAt = init.completedAt;
    this.isException = init.isException ?? false;
    this.exceptionTitle = init.exceptionTitle;
    this.notes = init.notes;
    this.habitTemplateID = init.habitTemplateID;
    this.stepInstanceIDs = init.stepInstanceIDs ?? [];
  }

  toSyncJSON(): string | null {
    return encodeSyncDocument(() => ({
      syncID: this.syncID,
      lastModified: formatSyncDate(this.lastModified),
      isDeleted: this.isDeleted,
      createdAt: formatSyncDate(this.createdAt),
      scheduledDate: formatSyncDate(this.scheduledDate),
      isCompleted: this.isCompleted,
      completedAt: optionalSyncDate(this.completedAt),
      isException: this.isException,
      exceptionTitle: this.exceptionTitle,
      notes: this.notes,
      // Parent and children as UUID references
      habitTemplateID: this.habitTemplateID,
      stepInstanceIDs: this.stepInstanceIDs,
    }));
  }

  static fromDocument(value: unknown): HabitInstance | null {
    const parsed = HabitInstanceDocumentSchema.safeParse(value);
    if (!parsed.success) return null;
    return new HabitInstance(parsed.data);
  }
}
