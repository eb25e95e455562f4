export interface CacheStatus {
  present: boolean;
  path: string;
}

export interface WorkspacePaths {
  audio: string;
  chunks: string;
  transcription: string;
  responses: string;
}

export interface VideoWorkspace {
  sanitizedTitle: string;
  rootPath: string;
  subpaths: WorkspacePaths;
}

export type AudioAsset = CacheStatus;
export type Transcript = CacheStatus;

export interface ChunkBoundary {
  index: number;
  startMs: number;
  endMs: number;
}

export interface AudioChunk {
  // 0-based, dense
  index: number;
  path: string;
  startOffset: number; // seconds
  endOffset: number; // seconds
}

export interface ChunkManifest {
  audioPath: string;
  durationSec: number;
  chunkCount: number;
  chunks: AudioChunk[];
}

export type EngineRole = 'primary' | 'fallback';

export type ChunkStatus = 'ok' | 'failed';

export interface TranscriptionResult {
  chunkIndex: number;
  text: string;
  // On failure: the role of the last engine tried
  engineUsed: EngineRole;
  status: ChunkStatus;
}

export interface AnalysisResponse {
  sequenceNumber: number;
  prompt: string;
  text: string;
  path: string;
}
