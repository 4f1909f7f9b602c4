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

export const StepInstanceDocumentSchema = BaseSyncDocumentSchema.extend({
  createdAt: SyncDateSchema,
  title: z.string(),
  order: z.number().int(),
  isCompleted: z.boolean(),
  completedAt: SyncDateSchema.optional(),
  currentValue: z.number().optional(),
  habitInstanceID: SyncIDSchema.optional(),
});

export interface StepInstanceInit {
  syncID?: string;
  title: string;
  order?: number;
  isCompleted?: boolean;
  completedAt?: Date;
  currentValue?: number;
  habitInstanceID?: string;
  createdAt?: Date;
  lastModified?: Date;
  isDeleted?: boolean;
}

export class StepInstance implements SyncableRecord {
  static readonly entityType = "StepInstance";
  readonly entityType = StepInstance.entityType;

  readonly syncID: string;
  readonly createdAt: Date;
  lastModified: Date;
  isDeleted: boolean;

  title: string;
  order: number;
  isCompleted: boolean;
  completedAt?: Date;
  currentValue?: number;
  habitInstanceID?: string;

  constructor(init: StepInstanceInit) {
    this.syncID = init.syncID ?? randomUUID();
    this.createdAt = init.createdAt ?? new Date();
    this.lastModified = init.lastModified ?? this.createdAt;
    this.isDeleted = init.isDeleted ?? false;
    this.title = init.title;
    this.order = init.order ?? 0;
    this.isCompleted = init.isCompleted ?? false;
    this.completedAt = init.completedAt;
    this.currentValue = init.currentValue;
    this.habitInstanceID = init.habitInstanceID;
  }

  toSyncJSON(): string | null {
    return encodeSyncDocument(() => ({
      syncID: this.syncID,
      lastModified: formatSyncDate(this.lastModified),
      isDeleted: this.isDeleted,
      createdAt: formatSyncDate(this.createdAt),
      title: this.title,
      order: this.order,
      isCompleted: this.isCompleted,
      completedAt: optionalSyncDate(this.completedAt),
      currentValue: this.currentValue,
      habitInstanceID: this.habitInstanceID,
    }));
  }

  static fromDocument(value: unknown): StepInstance | null {
    const parsed = StepInstanceDocumentSchema.safeParse(value);
    if (!parsed.success) return null;
    return new StepInstance(parsed.data);
  }
}
