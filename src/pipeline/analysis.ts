import path from 'path';
import { AnalysisServiceError, errorMessage } from './errors';
import { error, info, startStep } from './log';
import type { FileStore } from './store';
import type { AnalysisResponse, VideoWorkspace } from './types';

/**
 * The hosted language model. Stateless; one call per AnalysisResponse.
 */
export interface AnalysisClient {
  analyze(prompt: string, transcript: string): Promise<string>;
}

const ANSWER_FILE = /^answer_(\d+)\.txt$/;

export function answerFileName(sequenceNumber: number): string {
  return `answer_${sequenceNumber}.txt`;
}

/**
 * Highest existing answer number + 1. Gaps left by deleted files are never refilled.
 */
export async function nextSequenceNumber(responsesDir: string, store: FileStore): Promise<number> {
  let max = 0;
  for (const name of await store.readdir(responsesDir)) {
    const m = name.match(ANSWER_FILE);
    if (m) max = Math.max(max, Number(m[1]));
  }
  return max + 1;
}

export interface AppendAnalysisDeps {
  analyzer: AnalysisClient;
  store: FileStore;
}

export async function appendAnalysis(
  ws: VideoWorkspace,
  prompt: string,
  transcriptText: string,
  deps: AppendAnalysisDeps
): Promise<AnalysisResponse> {
  const sequenceNumber = await nextSequenceNumber(ws.subpaths.responses, deps.store);
  const timer = startStep('analysis', { sequenceNumber, transcriptChars: transcriptText.length });
  let text: string;
  try {
    text = await deps.analyzer.analyze(prompt, transcriptText);
  } catch (e) {
    const err =
      e instanceof AnalysisServiceError
        ? e
        : new AnalysisServiceError(`Analysis failed: ${errorMessage(e)}`, undefined, { cause: e });
    error('analysis.fail', { sequenceNumber, error: err.message, statusCode: err.statusCode });
    throw err;
  }
  timer.end();

  const outPath = path.join(ws.subpaths.responses, answerFileName(sequenceNumber));
  await deps.store.writeFile(outPath, text);
  info('analysis.saved', { sequenceNumber, path: outPath, chars: text.length });
  return { sequenceNumber, prompt, text, path: outPath };
}
