/**
 * Repository exports
 */

export { createSqliteNoteRepository } from './note.sqlite.js';
export { createSqliteTranscriptionAssetRepository } from './transcription-asset.sqlite.js';
export { createSqliteTranscriptionJobRepository } from './transcription-job.sqlite.js';
export { createSqliteUploadSessionRepository } from './upload-session.sqlite.js';
