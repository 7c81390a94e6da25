/**
 * Validation exports for core
 */

export {
  neoInfoSchema,
  closeApproachInfoSchema,
  neoRecordSchema,
  approachRecordSchema,
  approachDocumentSchema,
  formatZodIssues,
  parseWithSchema,
} from './schemas.js';
export type {
  NeoInfoInput,
  CloseApproachInfoInput,
  NeoRecordOutput,
  ApproachRecordOutput,
} from './schemas.js';
