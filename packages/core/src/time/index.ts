export {
  parseInstant,
  formatInstant,
  formatDate,
  unsetInstant,
  isUnsetInstant,
} from './instant.js';
export type { Instant } from './instant.js';
