/**
 * Test helpers for localegate unit and integration tests.
 * In-process stand-ins for the filesystem, the pull-request host and the logger.
 */

export { MemoryFileSource, type MemoryEntry } from './memory-file-source';
export { RecordingGateway, type RecordingGatewayOptions } from './recording-gateway';
export { RecordingLogger, type RecordedLine } from './recording-logger';
export { cleanupTempDirectories, createTempDirectory, writeFiles } from './temp-directory';
