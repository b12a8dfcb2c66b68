/**
 * @tracksmith/library
 *
 * Library-level orchestration: finding video files, owning the per-run
 * scratch directory and driving the per-file pipeline across a worker pool.
 */

export {
  VIDEO_EXTENSIONS,
  isVideoFile,
  walkLibrary,
  collectLibrary,
} from './walker.js';

export { ScratchDirectory, SCRATCH_PREFIX } from './scratch.js';

export {
  BatchDriver,
  type BatchOptions,
  type BatchStartedEvent,
} from './batch.js';
