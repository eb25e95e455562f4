import { info } from './log';
import type { FileStore } from './store';
import type { Transcript, TranscriptionResult } from './types';

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove every case-insensitive occurrence of each phrase. Longer phrases go
 * first so a phrase containing another is removed whole.
 */
export function filterBoilerplate(text: string, phrases: readonly string[]): string {
  const ordered = phrases.filter((p) => p.trim()).sort((a, b) => b.length - a.length);
  let out = text;
  for (const phrase of ordered) {
    out = out.replace(new RegExp(escapeRegExp(phrase), 'gi'), '');
  }
  return out.replace(/[ \t]{2,}/g, ' ').trim();
}

export function formatTranscript(
  results: readonly TranscriptionResult[],
  phrases: readonly string[]
): string {
  return [...results]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map((r) => `[Chunk ${r.chunkIndex + 1}]\n${filterBoilerplate(r.text, phrases)}\n\n`)
    .join('');
}

export interface ReassembleOptions {
  phrases: readonly string[];
  transcriptPath: string;
  store: FileStore;
}

export async function reassemble(
  results: readonly TranscriptionResult[],
  opts: ReassembleOptions
): Promise<Transcript & { text: string }> {
  const text = formatTranscript(results, opts.phrases);
  await opts.store.writeFile(opts.transcriptPath, text);
  info('reassemble.complete', { chunks: results.length, chars: text.length, path: opts.transcriptPath });
  return { present: true, path: opts.transcriptPath, text };
}
