// Change capture
export {
  captureVersion,
  captureProjection,
  serializeRecord,
  type CaptureSource,
} from './capture.js';
