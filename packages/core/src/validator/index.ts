export { NAME_PATTERN, TASK_RECORD_SCHEMA } from './record-schema.js';
export {
  checkRecord,
  validateRecord,
  describeJsonType,
} from './record-validator.js';
export { validateCollection } from './collection-validator.js';
