export { createCsvRecordSink } from './csv-sink';
export { CSV_HEADER, encodeCsvRow, escapeCsvField, recordToRow } from './helpers';

export type { ChangeRecord, CsvRecordSinkConfig, RecordKind, RecordSink } from './types';
