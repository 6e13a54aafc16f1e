export { systemClock, sleep } from './time';
export { formatRecordTimestamp, formatFileStamp } from './helpers';
