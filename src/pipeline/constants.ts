// Workspace layout. These names are persisted on disk; changing them orphans existing caches.
export const AUDIO_DIR = 'base_youtube_audio';
export const CHUNKS_DIR = 'extracted_audio';
export const TRANSCRIPTION_DIR = 'base_transcription';
export const RESPONSES_DIR = 'responses';

export const TRANSCRIPT_FILE = 'transcription.txt';
export const CHUNK_MANIFEST_FILE = 'manifest.json';

export const MAX_TITLE_LENGTH = 100;
export const DEFAULT_CHUNK_COUNT = 30;

// Phrases speech models emit on silence or outros
export const DEFAULT_BOILERPLATE_PHRASES = [
    'thanks for watching',
    'thank you for watching',
    'subscribe to our channel',
    'like and subscribe',
    '© BF-WATCH TV 2021',
    'ご視聴ありがとうございました',
] as const;
