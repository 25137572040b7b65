export { AActivityLog, type ActivityListener } from './AActivityLog.js';
export { MemoryActivityLog } from './activityLog.js';
