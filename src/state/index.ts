export {
  TRACKING_FILES,
  getTrackingDir,
  getTrackingPath,
  readTrackingFile,
  parseRfc3339,
  readSessionStart,
  readSessionId,
  parseLatency,
  readLatency,
} from './tracking.js';
