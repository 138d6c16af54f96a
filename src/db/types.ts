/**
 * Manual Database Types for SQLite
 */

import type {
  NoteStatus,
  TranscriptionStatus,
  UploadSessionStatus,
} from '../0_types.js';

export interface DbUploadSession {
  id: string;
  user_id: string | null;
  filename: string;
  total_size: number;
  mime_type: string;
  chunk_size: number;
  content_hash: string | null;
  status: UploadSessionStatus;
  storage_key: string | null;
  created_at: string;
  expires_at: string;
  completed_at: string | null;
}

export interface DbTranscriptionJob {
  id: string;
  user_id: string | null;
  upload_id: string;
  filename: string;
  total_size: number;
  mime_type: string;
  language: string | null;
  enable_diarization: number; // 0 | 1
  model: string;
  output_formats: string; // JSON array
  priority: string;
  status: TranscriptionStatus;
  current_stage: string;
  progress: number;
  stage_progress: string; // JSON
  stage_durations: string; // JSON
  stage_checkpoints: string; // JSON
  detected_language: string | null;
  confidence_score: number | null;
  total_duration: number | null;
  word_count: number | null;
  error_code: string | null;
  error_message: string | null;
  retry_count: number;
  max_retries: number;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
  storage_paths: string; // JSON
}

export interface DbTranscriptionAsset {
  id: string;
  job_id: string;
  kind: string;
  storage_key: string;
  file_size: number;
  mime_type: string;
  created_at: string;
}

export interface DbNote {
  id: string;
  title: string;
  kind: string;
  user_id: string | null;
  status: NoteStatus;
  artifacts: string; // JSON
  metrics: string; // JSON
  transcription_job_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface DbCount {
  count: number;
}
