export {
  HabitTemplate,
  HabitTemplateDocumentSchema,
  RecurrenceFrequencySchema,
  type HabitTemplateInit,
  type RecurrenceFrequency,
} from "./habit-template.js";
export {
  StepTemplate,
  StepTemplateDocumentSchema,
  StepInputTypeSchema,
  type StepTemplateInit,
  type StepInputType,
} from "./step-template.js";
export {
  HabitInstance,
  HabitInstanceDocumentSchema,
  type HabitInstanceInit,
} from "./habit-instance.js";
export {
  StepInstance,
  StepInstanceDocumentSchema,
  type StepInstanceInit,
} from "./step-instance.js";
export {
  RECORD_CODECS,
  getRecordCodec,
  isKnownEntityType,
  entityClassOf,
  decodeRecord,
  type RecordCodec,
} from "./codecs.js";
