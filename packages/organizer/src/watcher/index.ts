/**
 * Watcher Module
 */

export {
  DirectoryWatcher,
  nodeWatchFactory,
  type DirectoryWatcherConfig,
  type WatchFactory,
  type WatchRegistration,
} from './directoryWatcher.js';
