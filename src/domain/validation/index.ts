export { RecordValidator, subjectRecordSchema } from './RecordValidator';
