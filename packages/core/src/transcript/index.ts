export {
  stepEscapeFilter,
  type EscapeState,
  type KeystrokeAction,
  type FilterStep,
} from "./escape-filter.js";
export { LineBuffer } from "./line-buffer.js";
export {
  TranscriptRecorder,
  type TranscriptRecorderOptions,
} from "./recorder.js";
