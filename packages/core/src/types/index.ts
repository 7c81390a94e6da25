export type {
  RawRecord,
  ApproachDocument,
  SkippedRecord,
  NeoSerialized,
  CloseApproachSerialized,
} from './record.js';
