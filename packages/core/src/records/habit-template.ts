/**
 * HabitTemplate - the recurring definition a habit's instances are generated from.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import {
  BaseSyncDocumentSchema,
  SyncDateSchema,
  SyncIDSchema,
  encodeSyncDocument,
  formatSyncDate,
  type SyncableRecord,
} from "../schema/record.js";

export const RecurrenceFrequencySchema = z.enum(["daily", "weekly", "monthly", "custom"]);

export type RecurrenceFrequency = z.infer<typeof RecurrenceFrequencySchema>;

export const HabitTemplateDocumentSchema = BaseSyncDocumentSchema.extend({
  createdAt: SyncDateSchema,
  title: z.string(),
  baseTime: SyncDateSchema,
  recurrenceFreq: RecurrenceFrequencySchema,
  recurrenceDays: z.array(z.number().int()),
  notes: z.string().optional(),
  isArchived: z.boolean().default(false),
  themeColorHex: z.string().default("#007AFF"),
  alertOffsets: z.array(z.number().int()).default([15]),
  stepTemplateIDs: z.array(SyncIDSchema).default([]),
});

export interface HabitTemplateInit {
  syncID?: string;
  title: string;
  baseTime: Date;
  recurrenceFreq?: RecurrenceFrequency;
  recurrenceDays?: number[];
  notes?: string;
  isArchived?: boolean;
  themeColorHex?: string;
  alertOffsets?: number[];
  stepTemplateIDs?: string[];
  createdAt?: Date;
  lastModified?: Date;
  isDeleted?: boolean;
}

export class HabitTemplate implements SyncableRecord {
  static readonly entityType = "HabitTemplate";
  readonly entityType = HabitTemplate.entityType;

  readonly syncID: string;
  readonly createdAt: Date;
  lastModified: Date;
  isDeleted: boolean;

  title: string;
  baseTime: Date;
  recurrenceFreq: RecurrenceFrequency;
  recurrenceDays: number[];
  notes?: string;
  isArchived: boolean;
  themeColorHex: string;
  alertOffsets: number[];
  stepTemplateIDs: string[];

  constructor(init: HabitTemplateInit) {
    const now = new Date();
    this.syncID = init.syncID ?? randomUUID();
    this.createdAt = init.createdAt ?? now;
    this.lastModified = init.lastModified ?? this.createdAt;
    this.isDeleted = init.isDeleted ?? false;
    this.title = init.title;
    this.baseTime = init.baseTime;
    this.recurrenceFreq = init.recurrenceFreq ?? "daily";
    this.recurrenceDays = init.recurrenceDays ?? [];
    this.notes = init.notes;
    this.isArchived = init.isArchived ?? false;
    this.themeColorHex = init.themeColorHex ?? "#007AFF";
    this.alertOffsets = init.alertOffsets ?? [15];
    this.stepTemplateIDs = init.stepTemplateIDs ?? [];
  }

  toSyncJSON(): string | null {
    return encodeSyncDocument(() => ({
      syncID: this.syncID,
      lastModified: formatSyncDate(this.lastModified),
      isDeleted: this.isDeleted,
      createdAt: formatSyncDate(this.createdAt),
      title: this.title,
      baseTime: formatSyncDate(this.baseTime),
      recurrenceFreq: this.recurrenceFreq,
      recurrenceDays: this.recurrenceDays,
      notes: this.notes,
      isArchived: this.isArchived,
      themeColorHex: this.themeColorHex,
      alertOffsets: this.alertOffsets,
      stepTemplateIDs: this.stepTemplateIDs,
    }));
  }

  static fromDocument(value: unknown): HabitTemplate | null {
    const parsed = HabitTemplateDocumentSchema.safeParse(value);
    if (!parsed.success) return null;
    return new HabitTemplate(parsed.data);
  }
}
