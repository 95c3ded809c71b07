/**
 * @chaptify/processing
 *
 * Container rewriting.
 *
 * CRITICAL: audio is always stream-copied, never re-encoded.
 */

export { FFmpeg, type FFmpegOptions } from './ffmpeg.js';
export {
  RemuxInvoker,
  DEFAULT_REMUX_TIMEOUT_MS,
  DEFAULT_OUTPUT_TOLERANCE_MS,
  type RemuxInvokerOptions,
  type EmbedRequest,
  type EmbedResult,
} from './remux.js';
