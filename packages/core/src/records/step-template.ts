/**
 * StepTemplate - one step of a habit template (e.g. "20 push-ups").
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

export const StepInputTypeSchema = z.enum(["binary", "counter", "value"]);

export type StepInputType = z.infer<typeof StepInputTypeSchema>;

export const StepTemplateDocumentSchema = BaseSyncDocumentSchema.extend({
  createdAt: SyncDateSchema,
  title: z.string(),
  inputType: StepInputTypeSchema,
  targetValue: z.number().optional(),
  unit: z.string().optional(),
  order: z.number().int(),
  isArchived: z.boolean().default(false),
  habitTemplateID: SyncIDSchema.optional(),
});

export interface StepTemplateInit {
  syncID?: string;
  title: string;
  inputType?: StepInputType;
  targetValue?: number;
  unit?: string;
  order?: number;
  isArchived?: boolean;
  habitTemplateID?: string;
  createdAt?: Date;
  lastModified?: Date;
  isDeleted?: boolean;
}

export class StepTemplate implements SyncableRecord {
  static readonly entityType = "StepTemplate";
  readonly entityType = StepTemplate.entityType;

  readonly syncID: string;
  readonly createdAt: Date;
  lastModified: Date;
  isDeleted: boolean;

  title: string;
  inputType: StepInputType;
  targetValue?: number;
  unit?: string;
  order: number;
  isArchived: boolean;
  habitTemplateID?: string;

  constructor(init: StepTemplateInit) {
    this.syncID = init.syncID ?? randomUUID();
    this.createdAt = init.createdAt ?? new Date();
    this.lastModified = init.lastModified ?? this.createdAt;
    this.isDeleted = init.isDeleted ?? false;
    this.title = init.title;
    this.inputType = init.inputType ?? "binary";
    this.targetValue = init.targetValue;
    this.unit = init.unit;
    this.order = init.order ?? 0;
    this.isArchived = init.isArchived ?? false;
    this.habitTemplateID = init.habitTemplateID;
  }

  toSyncJSON(): string | null {
    return encodeSyncDocument(() => ({
      syncID: this.syncID,
      lastModified: formatSyncDate(this.lastModified),
      isDeleted: this.isDeleted,
      createdAt: formatSyncDate(this.createdAt),
      title: this.title,
      inputType: this.inputType,
      targetValue: this.targetValue,
      unit: this.unit,
      order: this.order,
      isArchived: this.isArchived,
      habitTemplateID: this.habitTemplateID,
    }));
  }

  static fromDocument(value: unknown): StepTemplate | null {
    const parsed = StepTemplateDocumentSchema.safeParse(value);
    if (!parsed.success) return null;
    return new StepTemplate(parsed.data);
  }
}
